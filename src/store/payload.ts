/**
 * Chunk to payload conversion and the keys chunks are matched by.
 */

import { normalizePath } from '../utils/path.js';
import { generatePointId } from './ids.js';
import type { ChunkInput, ChunkPayload, ContentCategory } from './types.js';

/**
 * A chunk is file-anchored when it has both a path and a start line.
 */
export function isAnchored(
  chunk: ChunkInput
): chunk is ChunkInput & { filePath: string; lineStart: number } {
  return (
    chunk.filePath !== undefined && chunk.filePath.length > 0 && chunk.lineStart !== undefined
  );
}

export function pointIdFor(chunk: ChunkInput): bigint {
  return isAnchored(chunk)
    ? generatePointId({ filePath: chunk.filePath, lineStart: chunk.lineStart })
    : generatePointId({ content: chunk.content });
}

export function categoryOf(chunk: ChunkInput): ContentCategory {
  return chunk.category ?? (chunk.codeType !== undefined ? 'code' : 'doc');
}

/**
 * Build the stored payload. New points are always live.
 */
export function toPayload(chunk: ChunkInput): ChunkPayload {
  const lineStart = chunk.lineStart ?? 0;
  const payload: ChunkPayload = {
    content: chunk.content,
    file_path: normalizePath(chunk.filePath ?? ''),
    line_start: lineStart,
    line_end: chunk.lineEnd ?? lineStart,
    section: chunk.section ?? '',
    content_type: chunk.contentType ?? 'text',
    category: categoryOf(chunk),
    language: chunk.language ?? '',
    is_deleted: false,
    metadata: chunk.metadata ?? {},
  };
  if (chunk.docType !== undefined) payload.doc_type = chunk.docType;
  if (chunk.codeType !== undefined) payload.code_type = chunk.codeType;
  return payload;
}

/**
 * Merge key shared by the differ and the search merge.
 */
export function locationKey(filePath: string, lineStart: number): string {
  return `${normalizePath(filePath)}:${lineStart}`;
}
