/**
 * Hybrid Point Store
 *
 * One logical store over a primary (`cloud`) and an optional secondary
 * (`local`) backend. Reads merge both, keyed by `(file_path, line_start)`
 * with the primary winning; soft-deleted points are dropped here rather
 * than in the backend query, so neither backend needs an index on
 * `is_deleted`.
 *
 * @example
 * ```typescript
 * const store = new HybridPointStore({ primary, secondary, embedder, weights });
 * await store.upsertChunk({ content: '1. Auth flow', filePath: 'docs/flows.md', lineStart: 3 });
 * const results = await store.searchWithExpansion('list all flows', { topK: 20, limit: 25 });
 * ```
 */

import type { EmbeddingProvider } from '../embeddings/types.js';
import { BackendUnavailableError, PointNotFoundError, ValidationError } from '../errors/index.js';
import type { JsonObject } from '../utils/json.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { normalizePath } from '../utils/path.js';
import { errorMessage, type Result } from '../utils/result.js';
import { scanMatching, type PointStoreBackend } from './backend.js';
import { blendScores, type HybridWeights } from './bm25.js';
import { indexFile, type FileIndexSummary } from './differ.js';
import { FilterRejectedError, matchesFilter, type PointFilter } from './filter.js';
import {
  cleanupDeletedFiles,
  permanentDelete,
  recoverDeleted,
  DEFAULT_BATCH_SIZE,
  type CleanupReport,
  type PurgeReport,
  type RecoverReport,
} from './lifecycle.js';
import { categoryOf, locationKey, pointIdFor, toPayload } from './payload.js';
import type {
  BackendStats,
  BackendTarget,
  ChunkInput,
  ChunkPayload,
  CollectionStats,
  ContentCategory,
  ScoredPoint,
  SearchResult,
  StoredPoint,
} from './types.js';
import { validateVector } from './vector.js';

/** Largest top_k a similarity search accepts; larger requests are clamped */
export const MAX_TOP_K = 100;
/** Largest page a metadata scan returns */
export const MAX_SCAN_LIMIT = 1000;
/** Upper bound on points read when a backend rejects a metadata filter */
const MAX_FALLBACK_SCAN = 10000;

export interface HybridPointStoreOptions {
  primary: PointStoreBackend;
  /** Absent or null when the secondary is disabled */
  secondary?: PointStoreBackend | null;
  embedder: EmbeddingProvider;
  logger?: Logger;
  /** Keyword/vector blend; pure vector when omitted */
  weights?: HybridWeights;
  /** Consult the secondary when a section yields fewer chunks than this */
  expansionThreshold?: number;
  /** Batch size for soft-delete flag updates */
  batchSize?: number;
}

export interface SearchOptions {
  filter?: PointFilter;
  /** Which embedding model embeds the query */
  category?: ContentCategory;
}

export interface ExpansionOptions {
  /** Size of the initial hybrid search */
  topK: number;
  /** Results kept after expansion */
  limit: number;
}

export interface MetadataSearchOptions {
  limit?: number;
  offset?: number;
  target?: BackendTarget;
  includeDeleted?: boolean;
}

export interface MetadataSearchResult {
  points: StoredPoint[];
  hasMore: boolean;
}

export interface PointUpdate {
  content?: string;
  metadata?: JsonObject;
  vector?: unknown;
}

export interface DeleteAllResult {
  target: BackendTarget;
  confirmed: boolean;
  count: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, Math.floor(value)));
}

function toResult(point: StoredPoint & { score?: number }, origin: BackendTarget): SearchResult {
  const { payload } = point;
  return {
    id: point.id,
    content: payload.content,
    filePath: payload.file_path,
    lineNumber: payload.line_start,
    lineEnd: payload.line_end,
    section: payload.section,
    score: point.score ?? 0,
    origin,
    payload,
  };
}

function isLive(result: SearchResult): boolean {
  return !result.payload.is_deleted;
}

function resultKey(result: SearchResult): string {
  // Standalone entries have no location; their id is their identity
  return result.filePath === ''
    ? `id:${result.id}`
    : locationKey(result.filePath, result.lineNumber);
}

/**
 * Append `incoming` results whose key is not taken yet. Existing entries
 * win, so merging primary first gives primary precedence.
 */
function mergeInto(target: SearchResult[], incoming: SearchResult[]): void {
  const seen = new Set(target.map(resultKey));
  for (const result of incoming) {
    const key = resultKey(result);
    if (!seen.has(key)) {
      seen.add(key);
      target.push(result);
    }
  }
}

export class HybridPointStore {
  private readonly primary: PointStoreBackend;
  private readonly secondary: PointStoreBackend | null;
  private readonly embedder: EmbeddingProvider;
  private readonly logger: Logger;
  private readonly weights: HybridWeights;
  private readonly expansionThreshold: number;
  private readonly batchSize: number;

  constructor(options: HybridPointStoreOptions) {
    this.primary = options.primary;
    this.secondary = options.secondary ?? null;
    this.embedder = options.embedder;
    this.logger = options.logger ?? consoleLogger;
    this.weights = options.weights ?? { bm25: 0, vector: 1 };
    this.expansionThreshold = options.expansionThreshold ?? 10;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  get secondaryEnabled(): boolean {
    return this.secondary !== null;
  }

  get dimensions(): number {
    return this.embedder.dimensions;
  }

  /**
   * Resolve a target name to its backend.
   *
   * @throws ValidationError for `local` while the secondary is disabled
   */
  backend(target: BackendTarget): PointStoreBackend {
    if (target === 'cloud') {
      return this.primary;
    }
    if (!this.secondary) {
      throw new ValidationError('Local collection is disabled', [], {
        hint: 'Enable it with: hrag config set secondary.enabled true',
        details: { target },
      });
    }
    return this.secondary;
  }

  // ==========================================================================
  // Write path
  // ==========================================================================

  private async embedChecked(text: string, category: ContentCategory): Promise<number[]> {
    return validateVector(await this.embedder.embed(text, category), this.embedder.dimensions);
  }

  /**
   * Embed (or validate a supplied vector) and write one chunk. Re-writing
   * an unchanged chunk reproduces the same id and payload.
   */
  async upsertChunk(
    chunk: ChunkInput,
    target: BackendTarget = 'cloud',
    vector?: unknown
  ): Promise<{ id: bigint; payload: ChunkPayload }> {
    const backend = this.backend(target);
    if (chunk.content.trim().length === 0) {
      throw new ValidationError('Content cannot be empty', ['content: must not be empty']);
    }

    // Validate before any network call
    const checked =
      vector !== undefined
        ? validateVector(vector, this.embedder.dimensions)
        : await this.embedChecked(chunk.content, categoryOf(chunk));

    const id = pointIdFor(chunk);
    const payload = toPayload(chunk);
    await backend.upsert([{ id, vector: checked, payload }]);
    return { id, payload };
  }

  async getPoint(
    id: bigint,
    target: BackendTarget = 'cloud',
    options: { withVector?: boolean } = {}
  ): Promise<StoredPoint> {
    const [point] = await this.backend(target).retrieve([id], options);
    if (!point) {
      throw new PointNotFoundError(id.toString(), { details: { collection: target } });
    }
    return point;
  }

  /**
   * Change content, metadata or vector of an existing point. Metadata-only
   * updates keep the stored vector.
   */
  async updatePoint(
    id: bigint,
    changes: PointUpdate,
    target: BackendTarget = 'cloud'
  ): Promise<StoredPoint> {
    if (changes.content === undefined && changes.metadata === undefined && changes.vector === undefined) {
      throw new ValidationError('Nothing to update', [
        'Provide at least one of content, metadata or vector',
      ]);
    }
    if (changes.content !== undefined && changes.content.trim().length === 0) {
      throw new ValidationError('Content cannot be empty', ['content: must not be empty']);
    }

    const suppliedVector =
      changes.vector !== undefined ? validateVector(changes.vector, this.embedder.dimensions) : null;

    const existing = await this.getPoint(id, target, { withVector: true });
    const payload: ChunkPayload = {
      ...existing.payload,
      content: changes.content ?? existing.payload.content,
      metadata: changes.metadata
        ? { ...existing.payload.metadata, ...changes.metadata }
        : existing.payload.metadata,
    };

    const contentChanged = payload.content !== existing.payload.content;
    let vector: number[];
    if (suppliedVector) {
      vector = suppliedVector;
    } else if (contentChanged || !existing.vector) {
      vector = await this.embedChecked(payload.content, payload.category);
    } else {
      vector = existing.vector;
    }

    await this.backend(target).upsert([{ id, vector, payload }]);
    return { id, vector, payload };
  }

  /**
   * Soft delete flags the point; hard delete removes it.
   */
  async deletePoint(
    id: bigint,
    options: { soft?: boolean } = {},
    target: BackendTarget = 'cloud'
  ): Promise<{ id: bigint; soft: boolean }> {
    const { soft = true } = options;
    const backend = this.backend(target);
    await this.getPoint(id, target);

    if (soft) {
      await backend.setPayload([id], { is_deleted: true });
    } else {
      await backend.delete([id]);
    }
    return { id, soft };
  }

  /**
   * Incrementally index one file against one backend.
   */
  async indexFile(
    filePath: string,
    chunks: ChunkInput[],
    target: BackendTarget = 'cloud'
  ): Promise<Result<FileIndexSummary>> {
    return indexFile(filePath, chunks, {
      backend: this.backend(target),
      embedder: this.embedder,
      logger: this.logger,
    });
  }

  // ==========================================================================
  // Read path
  // ==========================================================================

  /**
   * Nearest neighbours, falling back to an unfiltered query plus in-process
   * filtering when the backend rejects the filter.
   */
  private async nearest(
    backend: PointStoreBackend,
    vector: number[],
    limit: number,
    filter: PointFilter | undefined
  ): Promise<ScoredPoint[]> {
    try {
      return await backend.nearest(vector, limit, filter);
    } catch (error) {
      if (!(error instanceof FilterRejectedError) || !filter) {
        throw error;
      }
      this.logger.debug?.(`${backend.name} rejected filter, filtering in process`);
      const unfiltered = await backend.nearest(vector, Math.min(limit * 5, MAX_FALLBACK_SCAN));
      return unfiltered.filter((point) => matchesFilter(point.payload, filter)).slice(0, limit);
    }
  }

  /**
   * Over-fetch 2×topK from the primary, top up from the secondary when the
   * primary yields fewer than topK live results, merge, blend, truncate.
   * Soft-deleted points are dropped after the merge so a flagged primary
   * point still shadows its secondary copy.
   */
  private async searchVector(
    vector: number[],
    topK: number,
    query: string | undefined,
    filter: PointFilter | undefined
  ): Promise<SearchResult[]> {
    const fetchLimit = topK * 2;
    const merged: SearchResult[] = [];
    let primaryError: unknown = null;

    try {
      const points = await this.nearest(this.primary, vector, fetchLimit, filter);
      merged.push(...points.map((point) => toResult(point, 'cloud')));
    } catch (error) {
      primaryError = error;
      this.logger.warn(`Primary search failed: ${errorMessage(error)}, using secondary`);
    }

    if (this.secondary && merged.filter(isLive).length < topK) {
      try {
        const points = await this.nearest(this.secondary, vector, fetchLimit, filter);
        mergeInto(merged, points.map((point) => toResult(point, 'local')));
      } catch (error) {
        if (primaryError !== null) {
          throw new BackendUnavailableError(
            'cloud',
            `search failed on both backends: ${errorMessage(primaryError)}; local: ${errorMessage(error)}`,
            { cause: error }
          );
        }
        this.logger.warn(`Secondary search failed: ${errorMessage(error)}`);
      }
    } else if (primaryError !== null) {
      throw new BackendUnavailableError('cloud', `search failed: ${errorMessage(primaryError)}`, {
        cause: primaryError,
      });
    }

    const live = merged.filter(isLive);
    const ranked = query !== undefined ? blendScores(query, live, this.weights) : live;
    return ranked.sort((a, b) => b.score - a.score).slice(0, topK);
  }

  /**
   * Hybrid search: vector recall on both backends, keyword blend, soft
   * deletes dropped.
   */
  async search(query: string, topK: number, options: SearchOptions = {}): Promise<SearchResult[]> {
    if (query.trim().length === 0) {
      throw new ValidationError('Query cannot be empty', ['query: must not be empty']);
    }
    const k = clamp(topK, 1, MAX_TOP_K);
    const vector = await this.embedChecked(query, options.category ?? 'doc');
    return this.searchVector(vector, k, query, options.filter);
  }

  /**
   * Similarity search from query text or a ready vector.
   */
  async searchSimilar(
    input: { query?: string; vector?: unknown },
    topK: number,
    filter?: PointFilter
  ): Promise<SearchResult[]> {
    const k = clamp(topK, 1, MAX_TOP_K);
    if (input.vector !== undefined) {
      return this.searchVector(validateVector(input.vector, this.embedder.dimensions), k, undefined, filter);
    }
    if (input.query !== undefined && input.query.trim().length > 0) {
      return this.search(input.query, k, { filter });
    }
    throw new ValidationError('Either query or vector is required', [
      'query: provide text to embed, or vector: provide an embedding',
    ]);
  }

  /**
   * Every live chunk of one `(file, section)`, read by exact filter from
   * the primary and, when the primary yields fewer than the expansion
   * threshold, from the secondary.
   *
   * @throws BackendUnavailableError when no backend could be read
   */
  async sectionChunks(filePath: string, section: string): Promise<SearchResult[]> {
    const filter: PointFilter = {
      must: [
        { key: 'file_path', match: normalizePath(filePath) },
        { key: 'section', match: section },
      ],
    };

    const chunks: SearchResult[] = [];
    let readable = false;

    try {
      const points = await scanMatching(this.primary, filter);
      chunks.push(...points.map((point) => toResult(point, 'cloud')));
      readable = true;
    } catch (error) {
      this.logger.warn(`Cloud section retrieval failed for ${filePath}:${section}: ${errorMessage(error)}`);
    }

    if (this.secondary && chunks.filter(isLive).length < this.expansionThreshold) {
      try {
        const points = await scanMatching(this.secondary, filter);
        mergeInto(chunks, points.map((point) => toResult(point, 'local')));
        readable = true;
      } catch (error) {
        this.logger.warn(`Local section retrieval failed for ${filePath}:${section}: ${errorMessage(error)}`);
      }
    }

    if (!readable) {
      throw new BackendUnavailableError('cloud', `section retrieval failed for ${filePath}:${section}`);
    }
    return chunks.filter(isLive);
  }

  /**
   * Hybrid search, then widen every hit to its whole section.
   *
   * Expanded chunks take the best score of their group, so groups keep
   * the order of the initial ranking and chunks inside a group stay in
   * line order. A group whose expansion fails or comes back empty keeps
   * its original members.
   */
  async searchWithExpansion(query: string, options: ExpansionOptions): Promise<SearchResult[]> {
    const initial = await this.search(query, options.topK);
    if (initial.length === 0) {
      return [];
    }

    const groups = new Map<string, { filePath: string; section: string; best: number; members: SearchResult[] }>();
    for (const result of initial) {
      const key = `${result.filePath}\u0000${result.section}`;
      const group = groups.get(key);
      if (group) {
        group.members.push(result);
        group.best = Math.max(group.best, result.score);
      } else {
        groups.set(key, {
          filePath: result.filePath,
          section: result.section,
          best: result.score,
          members: [result],
        });
      }
    }

    const expanded: SearchResult[] = [];
    const seen = new Set<string>();

    for (const group of groups.values()) {
      let chunks = group.members;
      // Unsectioned and standalone hits have nothing to widen to
      if (group.filePath !== '' && group.section !== '') {
        try {
          const sectionChunks = await this.sectionChunks(group.filePath, group.section);
          if (sectionChunks.length > 0) {
            chunks = sectionChunks;
          }
        } catch (error) {
          this.logger.warn(
            `Failed to expand section ${group.section} from ${group.filePath}: ${errorMessage(error)}`
          );
        }
      }

      const ordered = [...chunks].sort((a, b) => a.lineNumber - b.lineNumber);
      for (const chunk of ordered) {
        const key = resultKey(chunk);
        if (seen.has(key)) continue;
        seen.add(key);
        expanded.push({ ...chunk, score: group.best });
      }
    }

    return expanded.slice(0, Math.max(1, options.limit));
  }

  /**
   * Page through points matching a metadata filter. On a filter the
   * backend cannot run, reads at most min(limit × 10, 10000) points and
   * filters them here.
   */
  async searchByMetadata(
    filter: PointFilter,
    options: MetadataSearchOptions = {}
  ): Promise<MetadataSearchResult> {
    const limit = clamp(options.limit ?? 100, 1, MAX_SCAN_LIMIT);
    const offset = Math.max(0, Math.floor(options.offset ?? 0));
    const backend = this.backend(options.target ?? 'cloud');
    const keep = (point: StoredPoint): boolean =>
      (options.includeDeleted ?? false) || !point.payload.is_deleted;

    const wanted = offset + limit + 1;
    const collected: StoredPoint[] = [];
    try {
      let cursor: string | null = null;
      do {
        const page = await backend.scan({ filter, limit: Math.min(wanted, MAX_SCAN_LIMIT), offset: cursor });
        collected.push(...page.points.filter(keep));
        cursor = page.nextOffset;
      } while (cursor !== null && collected.length < wanted);
    } catch (error) {
      if (!(error instanceof FilterRejectedError)) {
        throw error;
      }
      this.logger.debug?.(`${backend.name} rejected metadata filter, filtering in process`);
      const page = await backend.scan({ limit: Math.min(limit * 10, MAX_FALLBACK_SCAN) });
      collected.push(...page.points.filter((point) => matchesFilter(point.payload, filter) && keep(point)));
    }

    return {
      points: collected.slice(offset, offset + limit),
      hasMore: collected.length > offset + limit,
    };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async cleanupDeletedFiles(
    existingPaths: Iterable<string>,
    target: BackendTarget,
    dryRun = true
  ): Promise<CleanupReport> {
    return cleanupDeletedFiles(this.backend(target), existingPaths, {
      dryRun,
      batchSize: this.batchSize,
      logger: this.logger,
    });
  }

  async recover(target: BackendTarget, options: { filePath?: string } = {}): Promise<RecoverReport> {
    return recoverDeleted(this.backend(target), {
      ...options,
      batchSize: this.batchSize,
      logger: this.logger,
    });
  }

  async permanentDelete(
    target: BackendTarget,
    options: { confirm?: boolean; filePath?: string } = {}
  ): Promise<PurgeReport> {
    return permanentDelete(this.backend(target), {
      ...options,
      batchSize: this.batchSize,
      logger: this.logger,
    });
  }

  /**
   * Empty a whole collection. Reports the count only unless confirmed.
   */
  async deleteAll(target: BackendTarget, confirm = false): Promise<DeleteAllResult> {
    const backend = this.backend(target);
    const count = await backend.count();
    if (confirm) {
      await backend.deleteAll();
    }
    return { target, confirmed: confirm, count };
  }

  private async backendStats(backend: PointStoreBackend): Promise<BackendStats> {
    const count = await backend.count();
    const deletedFilter: PointFilter = { must: [{ key: 'is_deleted', match: true }] };
    let deleted: number;
    try {
      deleted = await backend.count(deletedFilter);
    } catch (error) {
      if (!(error instanceof FilterRejectedError)) {
        throw error;
      }
      deleted = (await scanMatching(backend, deletedFilter)).length;
    }
    return { count, deleted };
  }

  async collectionStats(): Promise<CollectionStats> {
    return {
      cloud: await this.backendStats(this.primary),
      local: this.secondary ? await this.backendStats(this.secondary) : null,
    };
  }
}
