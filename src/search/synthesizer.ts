/**
 * Answer Synthesizer
 *
 * Turns retrieved chunks into answer text, one strategy per intent:
 *
 * - enumeration: collect every `<n>. <item>` line, ordered by n
 * - explanation: document order, duplicated chunk boundaries stripped
 * - code_search: code blocks grouped by file, in line order
 * - comparison: one subsection per document section
 * - factual: the best-scoring chunk verbatim
 */

import { SynthesisFailureError } from '../errors/index.js';
import type { SearchResult } from '../store/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/result.js';
import type { QueryIntent } from './types.js';

/** Trailing characters of a chunk checked against the start of the next */
export const OVERLAP_WINDOW = 100;

const NUMBERED_ITEM = /^(\d+)\.\s+(.+)$/gm;

function concatenate(chunks: SearchResult[]): string {
  return chunks.map((chunk) => chunk.content).join('\n\n');
}

function lineRange(chunk: SearchResult): string {
  return chunk.lineEnd > chunk.lineNumber
    ? `${chunk.lineNumber}-${chunk.lineEnd}`
    : String(chunk.lineNumber);
}

function synthesizeEnumeration(chunks: SearchResult[], logger: Logger): string {
  const items = new Map<number, string>();
  for (const chunk of chunks) {
    for (const match of chunk.content.matchAll(NUMBERED_ITEM)) {
      const number = Number(match[1]);
      const item = (match[2] ?? '').trim();
      // Chunks arrive best first, so the first sighting of a number wins
      if (!items.has(number)) {
        items.set(number, item);
      }
    }
  }

  if (items.size === 0) {
    logger.warn('No numbered items found, returning full content');
    return concatenate(chunks);
  }

  const numbers = [...items.keys()].sort((a, b) => a - b);
  const highest = numbers[numbers.length - 1] ?? 0;
  if (highest > numbers.length) {
    logger.warn(
      `List may be incomplete: highest item is ${highest}, but only ${numbers.length} items found`
    );
  }
  return numbers.map((number) => `${number}. ${items.get(number) ?? ''}`).join('\n');
}

function synthesizeExplanation(chunks: SearchResult[]): string {
  const ordered = [...chunks].sort((a, b) =>
    a.filePath === b.filePath ? a.lineNumber - b.lineNumber : a.filePath < b.filePath ? -1 : 1
  );

  const parts: string[] = [];
  let previous = '';
  for (const chunk of ordered) {
    let content = chunk.content;
    if (previous.length > 0 && content.startsWith(previous.slice(-OVERLAP_WINDOW))) {
      content = content.slice(Math.min(OVERLAP_WINDOW, previous.length));
    }
    parts.push(content);
    previous = content;
  }

  return parts
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join('\n\n');
}

function groupBy(chunks: SearchResult[], key: (chunk: SearchResult) => string): Map<string, SearchResult[]> {
  const groups = new Map<string, SearchResult[]>();
  for (const chunk of chunks) {
    const name = key(chunk);
    const group = groups.get(name);
    if (group) {
      group.push(chunk);
    } else {
      groups.set(name, [chunk]);
    }
  }
  return groups;
}

function sortedEntries<T>(groups: Map<string, T>): Array<[string, T]> {
  return [...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function synthesizeCodeSearch(chunks: SearchResult[]): string {
  const sections: string[] = [];
  for (const [filePath, group] of sortedEntries(groupBy(chunks, (chunk) => chunk.filePath))) {
    sections.push(`**File: ${filePath}**`);
    for (const chunk of [...group].sort((a, b) => a.lineNumber - b.lineNumber)) {
      sections.push(`Lines ${lineRange(chunk)}:\n\`\`\`${chunk.payload.language}\n${chunk.content}\n\`\`\``);
    }
  }
  return sections.join('\n\n');
}

function synthesizeComparison(chunks: SearchResult[]): string {
  const groups = groupBy(chunks, (chunk) => chunk.section || 'Other');
  return sortedEntries(groups)
    .map(([section, group]) => [`## ${section}`, ...group.map((chunk) => chunk.content)].join('\n\n'))
    .join('\n\n');
}

function synthesizeFactual(chunks: SearchResult[]): string {
  let best = chunks[0];
  for (const chunk of chunks) {
    if (best === undefined || chunk.score > best.score) {
      best = chunk;
    }
  }
  return best?.content ?? '';
}

/**
 * Build the answer for `intent` from `chunks`.
 *
 * @throws SynthesisFailureError when `chunks` is empty or a strategy fails
 */
export function synthesizeAnswer(
  chunks: SearchResult[],
  intent: QueryIntent,
  query = '',
  logger: Logger = silentLogger
): string {
  if (chunks.length === 0) {
    throw new SynthesisFailureError('Cannot synthesize answer from empty chunks', {
      details: { intent, query },
    });
  }

  try {
    switch (intent) {
      case 'enumeration':
        return synthesizeEnumeration(chunks, logger);
      case 'explanation':
        return synthesizeExplanation(chunks);
      case 'code_search':
        return synthesizeCodeSearch(chunks);
      case 'comparison':
        return synthesizeComparison(chunks);
      case 'factual':
        return synthesizeFactual(chunks);
    }
  } catch (error) {
    throw new SynthesisFailureError(`Answer synthesis failed: ${errorMessage(error)}`, {
      cause: error,
      details: { intent, query },
    });
  }
}
