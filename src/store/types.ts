/**
 * Point Store Types
 *
 * Shapes shared by both backends and the hybrid store. Payloads are stored
 * in snake_case, the way they appear in the backends; inputs built by the
 * chunkers use camelCase.
 */

import { z } from 'zod';
import type { JsonObject, JsonValue } from '../utils/json.js';

/** Which of the two backends an operation targets. */
export type BackendTarget = 'cloud' | 'local';

/** Embedding category: documentation text or source code. */
export type ContentCategory = 'doc' | 'code';

export const CONTENT_TYPES = ['text', 'list', 'table', 'code'] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

/**
 * A chunk as produced by the chunkers, before it becomes a point.
 *
 * `filePath` and `lineStart` anchor the chunk to a file. Standalone entries
 * leave them out and are identified by their content instead.
 */
export interface ChunkInput {
  content: string;
  filePath?: string;
  lineStart?: number;
  lineEnd?: number;
  section?: string;
  contentType?: ContentType;
  category?: ContentCategory;
  docType?: string;
  codeType?: string;
  language?: string;
  /** Open extension bag (list_length, imports, signature, ...) */
  metadata?: JsonObject;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Typed core of every stored payload plus the open metadata bag.
 *
 * Defaults let the schema read points written by older indexers.
 */
export const ChunkPayloadSchema = z.object({
  content: z.string(),
  file_path: z.string().default(''),
  line_start: z.number().int().default(0),
  line_end: z.number().int().default(0),
  section: z.string().default(''),
  content_type: z.enum(CONTENT_TYPES).catch('text'),
  category: z.enum(['doc', 'code']).catch('doc'),
  language: z.string().default(''),
  doc_type: z.string().optional(),
  code_type: z.string().optional(),
  is_deleted: z.boolean().default(false),
  metadata: z.record(JsonValueSchema).default({}),
});

export type ChunkPayload = z.infer<typeof ChunkPayloadSchema>;

/**
 * A point as written to a backend.
 */
export interface PointRecord {
  id: bigint;
  vector: number[];
  payload: ChunkPayload;
}

/**
 * A point as read back. `vector` is only present when it was requested.
 */
export interface StoredPoint {
  id: bigint;
  vector?: number[];
  payload: ChunkPayload;
}

export interface ScoredPoint extends StoredPoint {
  score: number;
}

/**
 * One page of a filtered scan. `nextOffset` is opaque to callers and null
 * on the last page.
 */
export interface ScanPage {
  points: StoredPoint[];
  nextOffset: string | null;
}

/**
 * A search hit as returned to callers of the hybrid store.
 */
export interface SearchResult {
  id: bigint;
  content: string;
  filePath: string;
  lineNumber: number;
  lineEnd: number;
  section: string;
  score: number;
  origin: BackendTarget;
  payload: ChunkPayload;
}

/**
 * Per-backend counts reported by collectionStats().
 */
export interface BackendStats {
  count: number;
  deleted: number;
}

export interface CollectionStats {
  cloud: BackendStats;
  local: BackendStats | null;
}
