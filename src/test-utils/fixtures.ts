/**
 * Builders for chunks and points used across tests.
 */

import { pointIdFor, toPayload } from '../store/payload.js';
import type { ChunkInput, PointRecord, SearchResult } from '../store/types.js';

export function makeChunk(overrides: Partial<ChunkInput> & { content: string }): ChunkInput {
  return {
    filePath: 'docs/guide.md',
    lineStart: 1,
    section: 'Introduction',
    contentType: 'text',
    ...overrides,
  };
}

/**
 * A stored point for a chunk, with an explicit vector and optional flags.
 */
export function makePoint(
  chunk: ChunkInput,
  vector: number[],
  options: { deleted?: boolean } = {}
): PointRecord {
  return {
    id: pointIdFor(chunk),
    vector,
    payload: { ...toPayload(chunk), is_deleted: options.deleted ?? false },
  };
}

/**
 * A search hit as the hybrid store would return it.
 */
export function makeResult(
  overrides: Partial<SearchResult> & { content: string; language?: string }
): SearchResult {
  const { language, ...fields } = overrides;
  const filePath = fields.filePath ?? 'docs/guide.md';
  const lineNumber = fields.lineNumber ?? 1;
  const chunk: ChunkInput = {
    content: fields.content,
    filePath,
    lineStart: lineNumber,
    lineEnd: fields.lineEnd ?? lineNumber,
    section: fields.section ?? 'Introduction',
    language,
  };
  return {
    id: pointIdFor(chunk),
    filePath,
    lineNumber,
    lineEnd: lineNumber,
    section: 'Introduction',
    score: 0.5,
    origin: 'cloud',
    payload: toPayload(chunk),
    ...fields,
  };
}
