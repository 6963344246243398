/**
 * Citation Formatter
 *
 * Picks the distinct source files behind an answer and renders them for
 * the terminal and for JSON output.
 *
 * @example
 * ```typescript
 * const citations = collectCitations(results);
 * formatCitations(citations);
 * // "[1] docs/flows.md:12-18 (0.95)
 * //  [2] src/auth.ts:42-67 (0.88)"
 * ```
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { formatLineRange, formatScore } from '../search/formatter.js';
import type { SearchResult } from '../store/types.js';
import { normalizePath } from '../utils/path.js';
import type { Citation } from './types.js';

export type { Citation };

/** Distinct files cited under an answer */
export const MAX_CITATIONS = 5;

/**
 * - 'compact': "[1] src/auth.ts:42-67 (0.95)"
 * - 'detailed': location, then language and score on a second line
 * - 'minimal': "[1] src/auth.ts:42-67"
 */
export const CitationStyleSchema = z.enum(['compact', 'detailed', 'minimal']);
export type CitationStyle = z.infer<typeof CitationStyleSchema>;

export const CitationFormatOptionsSchema = z.object({
  style: CitationStyleSchema.optional(),
  /** Cap on displayed citations, 0 for all */
  limit: z.number().int().min(0).optional(),
  /** Append "...and N more" when capped */
  showTruncationHint: z.boolean().optional(),
});

export type CitationFormatOptions = z.infer<typeof CitationFormatOptionsSchema>;

export interface CitationsOutputJSON {
  count: number;
  citations: Citation[];
}

/**
 * One citation per distinct file, in result order, up to `limit` files.
 * Standalone entries have no file and are not cited.
 */
export function collectCitations(results: SearchResult[], limit: number = MAX_CITATIONS): Citation[] {
  const citations: Citation[] = [];
  const seen = new Set<string>();

  for (const result of results) {
    if (citations.length >= limit) break;
    if (result.filePath === '') continue;

    const filePath = normalizePath(result.filePath);
    if (seen.has(filePath)) continue;
    seen.add(filePath);

    citations.push({
      index: citations.length + 1,
      filePath,
      lineNumber: result.lineNumber,
      lineEnd: result.lineEnd,
      score: result.score,
      language: result.payload.language !== '' ? result.payload.language : null,
    });
  }
  return citations;
}

export function formatCitation(citation: Citation, style: CitationStyle = 'compact'): string {
  const location =
    citation.lineNumber > 0
      ? `${citation.filePath}:${formatLineRange(citation.lineNumber, citation.lineEnd)}`
      : citation.filePath;

  switch (style) {
    case 'minimal':
      return `[${citation.index}] ${location}`;
    case 'detailed': {
      const kind = citation.language ?? 'documentation';
      return `[${citation.index}] ${location}\n    ${kind} | score: ${formatScore(citation.score)}`;
    }
    case 'compact':
      return `[${citation.index}] ${location} (${formatScore(citation.score)})`;
  }
}

export function formatCitations(citations: Citation[], options: CitationFormatOptions = {}): string {
  if (citations.length === 0) {
    return '';
  }

  const { style = 'compact', limit = 0, showTruncationHint = true } = CitationFormatOptionsSchema.parse(options);
  const shown = limit > 0 ? citations.slice(0, limit) : citations;
  const lines = shown.map((citation) => formatCitation(citation, style));

  const hidden = citations.length - shown.length;
  if (hidden > 0 && showTruncationHint) {
    lines.push(`...and ${hidden} more`);
  }
  return lines.join('\n');
}

export function formatCitationsJSON(citations: Citation[]): CitationsOutputJSON {
  return { count: citations.length, citations };
}
