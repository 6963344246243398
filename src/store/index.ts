/**
 * Point store module
 *
 * @example
 * ```ts
 * import { HybridPointStore, QdrantBackend, SqliteBackend } from './store/index.js';
 * ```
 */

export type {
  BackendTarget,
  ContentCategory,
  ContentType,
  ChunkInput,
  ChunkPayload,
  PointRecord,
  StoredPoint,
  ScoredPoint,
  ScanPage,
  SearchResult,
  BackendStats,
  CollectionStats,
} from './types.js';
export { CONTENT_TYPES, ChunkPayloadSchema, JsonValueSchema } from './types.js';

export { generatePointId, formatPointId, parsePointId, fnv1a64, type PointIdKey } from './ids.js';
export { validateVector, cosineSimilarity } from './vector.js';
export {
  parseFilter,
  matchesFilter,
  fieldEquals,
  getPath,
  FilterRejectedError,
  PointFilterSchema,
  type PointFilter,
  type FieldCondition,
  type FieldMatch,
  type MatchValue,
} from './filter.js';

export {
  scanAll,
  scanMatching,
  SCAN_PAGE_SIZE,
  type PointStoreBackend,
  type ScanOptions,
  type RetrieveOptions,
} from './backend.js';
export { QdrantBackend, pointIdToUuid, uuidToPointId, type QdrantBackendOptions } from './qdrant-backend.js';
export { SqliteBackend, type SqliteBackendOptions } from './sqlite-backend.js';

export { bm25Scores, blendScores, minMaxNormalize, tokenize, type BM25Config, type HybridWeights } from './bm25.js';
export { toPayload, pointIdFor, locationKey, isAnchored } from './payload.js';
export { planDiff, indexFile, formatSummary, type DiffPlan, type FileIndexSummary } from './differ.js';
export {
  cleanupDeletedFiles,
  recoverDeleted,
  permanentDelete,
  setDeletedFlag,
  DEFAULT_BATCH_SIZE,
  type CleanupReport,
  type RecoverReport,
  type PurgeReport,
} from './lifecycle.js';
export {
  HybridPointStore,
  MAX_TOP_K,
  MAX_SCAN_LIMIT,
  type HybridPointStoreOptions,
  type SearchOptions,
  type ExpansionOptions,
  type MetadataSearchOptions,
  type MetadataSearchResult,
  type PointUpdate,
  type DeleteAllResult,
} from './hybrid-store.js';
export { createHybridStore, type HybridStoreRuntime, type CreateHybridStoreOptions } from './factory.js';
