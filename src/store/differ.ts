/**
 * Incremental Indexer
 *
 * Brings one backend in line with a file's current chunk list, touching
 * only what changed. Chunks are matched by `(file_path, line_start)`:
 *
 * - key only in the new list: add
 * - key in both, content differs: update (re-embedded, is_deleted cleared)
 * - key in both, same content, soft-deleted: restore (payload patch only)
 * - key in both, same content: skip
 * - key only in the backend: delete
 *
 * Only points of this file are read or written. Each backend is diffed on
 * its own.
 */

import type { EmbeddingProvider } from '../embeddings/types.js';
import { ValidationError } from '../errors/index.js';
import { consoleLogger, logError, type Logger } from '../utils/logger.js';
import { normalizePath } from '../utils/path.js';
import { err, errorMessage, ok, type Result } from '../utils/result.js';
import { scanMatching, type PointStoreBackend } from './backend.js';
import { fieldEquals } from './filter.js';
import { categoryOf, locationKey, pointIdFor, toPayload } from './payload.js';
import type { ChunkInput, PointRecord, StoredPoint } from './types.js';
import { validateVector } from './vector.js';

export interface DiffPlan {
  added: ChunkInput[];
  updated: ChunkInput[];
  /** Unchanged chunks whose stored point is soft-deleted */
  restoredIds: bigint[];
  deletedIds: bigint[];
  unchanged: number;
}

export interface FileIndexSummary {
  filePath: string;
  backend: PointStoreBackend['name'];
  added: number;
  updated: number;
  restored: number;
  deleted: number;
  unchanged: number;
  /** Chunks skipped because their embedding failed */
  failedChunks: number;
}

/**
 * Compare stored points of a file with its new chunks.
 */
export function planDiff(filePath: string, existing: StoredPoint[], chunks: ChunkInput[]): DiffPlan {
  const existingByKey = new Map<string, StoredPoint>();
  for (const point of existing) {
    existingByKey.set(locationKey(point.payload.file_path, point.payload.line_start), point);
  }

  const plan: DiffPlan = { added: [], updated: [], restoredIds: [], deletedIds: [], unchanged: 0 };
  const newKeys = new Set<string>();

  for (const chunk of chunks) {
    const key = locationKey(filePath, chunk.lineStart ?? 0);
    if (newKeys.has(key)) {
      continue;
    }
    newKeys.add(key);

    const current = existingByKey.get(key);
    if (!current) {
      plan.added.push(chunk);
    } else if (current.payload.content !== chunk.content) {
      plan.updated.push(chunk);
    } else if (current.payload.is_deleted) {
      plan.restoredIds.push(current.id);
    } else {
      plan.unchanged++;
    }
  }

  for (const [key, point] of existingByKey) {
    if (!newKeys.has(key)) {
      plan.deletedIds.push(point.id);
    }
  }

  return plan;
}

export function formatSummary(summary: FileIndexSummary): string {
  const actions: string[] = [];
  if (summary.updated > 0) actions.push(`${summary.updated} updated`);
  if (summary.added > 0) actions.push(`${summary.added} added`);
  if (summary.restored > 0) actions.push(`${summary.restored} restored`);
  if (summary.deleted > 0) actions.push(`${summary.deleted} deleted`);
  const detail = actions.length > 0 ? actions.join(', ') : 'no changes';
  return `${summary.filePath} (${summary.backend}): ${detail}`;
}

export interface IndexFileOptions {
  backend: PointStoreBackend;
  embedder: EmbeddingProvider;
  logger?: Logger;
}

/**
 * Apply the diff for one file. Never throws: a failure is logged and
 * returned so a batch job can count it and move on.
 */
export async function indexFile(
  filePath: string,
  chunks: ChunkInput[],
  options: IndexFileOptions
): Promise<Result<FileIndexSummary>> {
  const { backend, embedder, logger = consoleLogger } = options;
  const normalized = normalizePath(filePath);

  try {
    if (normalized.length === 0) {
      throw new ValidationError('file_path is required for incremental indexing');
    }

    const existing = await scanMatching(backend, fieldEquals('file_path', normalized));
    const plan = planDiff(normalized, existing, chunks);

    const points: PointRecord[] = [];
    let failedChunks = 0;
    let added = 0;
    let updated = 0;
    const pending = [
      ...plan.updated.map((chunk) => ({ chunk, change: 'updated' as const })),
      ...plan.added.map((chunk) => ({ chunk, change: 'added' as const })),
    ];
    for (const { chunk, change } of pending) {
      const anchored: ChunkInput = { ...chunk, filePath: normalized, lineStart: chunk.lineStart ?? 0 };
      try {
        const vector = validateVector(
          await embedder.embed(anchored.content, categoryOf(anchored)),
          embedder.dimensions
        );
        points.push({ id: pointIdFor(anchored), vector, payload: toPayload(anchored) });
        if (change === 'added') {
          added++;
        } else {
          updated++;
        }
      } catch (error) {
        failedChunks++;
        logError(
          logger,
          `Failed to embed chunk at ${normalized}:${anchored.lineStart}: ${errorMessage(error)}`
        );
      }
    }

    if (points.length > 0) {
      await backend.upsert(points);
    }
    if (plan.restoredIds.length > 0) {
      await backend.setPayload(plan.restoredIds, { is_deleted: false });
    }
    if (plan.deletedIds.length > 0) {
      await backend.delete(plan.deletedIds);
    }

    const summary: FileIndexSummary = {
      filePath: normalized,
      backend: backend.name,
      added,
      updated,
      restored: plan.restoredIds.length,
      deleted: plan.deletedIds.length,
      unchanged: plan.unchanged,
      failedChunks,
    };
    logger.info?.(formatSummary(summary));
    return ok(summary);
  } catch (error) {
    logError(logger, `Indexing failed for ${normalized} (${backend.name}): ${errorMessage(error)}`);
    return err(error instanceof Error ? error : new Error(errorMessage(error)));
  }
}
