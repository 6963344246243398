/**
 * Search Result Formatter
 *
 * Utilities for formatting search results for CLI display and JSON output.
 *
 * @example
 * ```typescript
 * formatResult(result);
 * // [0.92] docs/flows.md:12-18
 * //   1. Auth flow 2. Payment flow 3. Notify flow
 *
 * formatResultJSON(result);
 * // { id: "2847740081820437321", score: 0.92, filePath: "docs/flows.md", ... }
 * ```
 *
 * @packageDocumentation
 */

import type { SearchResult } from '../store/types.js';
import type { FormatOptions, FormattedResultJSON } from './types.js';

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

const SNIPPET_INDENT = '  ';

/**
 * Format a similarity score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Collapse whitespace and cut to `maxLength`, adding "..." when cut.
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }
  return normalized.slice(0, maxLength) + '...';
}

/**
 * "start-end", or just "start" for a single line.
 */
export function formatLineRange(start: number, end: number): string {
  if (start === end || end <= start) {
    return String(start);
  }
  return `${start}-${end}`;
}

/**
 * Format a single result:
 *
 * ```
 * [0.92] docs/flows.md:12-18
 *   1. Auth flow 2. Payment flow...
 * ```
 */
export function formatResult(result: SearchResult, options: FormatOptions = {}): string {
  const {
    snippetLength = DEFAULT_SNIPPET_LENGTH,
    showOrigin = false,
    showScore = true,
    showLineNumbers = true,
  } = options;

  const parts: string[] = [];
  if (showScore) {
    parts.push(`[${formatScore(result.score)}]`);
  }
  if (showOrigin) {
    parts.push(`[${result.origin}]`);
  }

  // Standalone entries have no file; the id is all there is to show
  let location = result.filePath !== '' ? result.filePath : `#${result.id}`;
  if (showLineNumbers && result.filePath !== '' && result.lineNumber > 0) {
    location += `:${formatLineRange(result.lineNumber, result.lineEnd)}`;
  }
  parts.push(location);

  return `${parts.join(' ')}\n${SNIPPET_INDENT}${truncateSnippet(result.content, snippetLength)}`;
}

export function formatResults(results: SearchResult[], options: FormatOptions = {}): string {
  return results.map((result) => formatResult(result, options)).join('\n\n');
}

export function formatResultJSON(result: SearchResult): FormattedResultJSON {
  return {
    id: result.id.toString(),
    score: result.score,
    filePath: result.filePath,
    lineStart: result.lineNumber,
    lineEnd: result.lineEnd,
    section: result.section,
    content: result.content,
    language: result.payload.language !== '' ? result.payload.language : null,
    contentType: result.payload.content_type,
    origin: result.origin,
  };
}

export function formatResultsJSON(results: SearchResult[]): FormattedResultJSON[] {
  return results.map(formatResultJSON);
}
