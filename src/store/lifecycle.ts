/**
 * Soft-delete lifecycle
 *
 * Points of files that disappeared from the corpus are flagged
 * `is_deleted` rather than removed, so they can be recovered. Flagged
 * points stay out of every search until recovered or purged.
 *
 * Flag changes go out in fixed-size batches. When a batch fails, its ids
 * are retried one at a time so a single bad id only loses itself.
 */

import { ValidationError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { isKnownPath, normalizePath } from '../utils/path.js';
import { errorMessage } from '../utils/result.js';
import { scanAll, scanMatching, type PointStoreBackend } from './backend.js';
import type { PointFilter } from './filter.js';
import type { StoredPoint } from './types.js';

export const DEFAULT_BATCH_SIZE = 1000;

export interface LifecycleOptions {
  batchSize?: number;
  logger?: Logger;
}

export interface FlagUpdateResult {
  updated: number;
  failed: number;
}

export interface CleanupReport {
  backend: PointStoreBackend['name'];
  dryRun: boolean;
  /** Live points examined */
  scanned: number;
  /** Points whose file no longer exists */
  orphaned: number;
  /** Points actually flagged; 0 on a dry run */
  marked: number;
  failed: number;
  /** Distinct missing files, sorted */
  files: string[];
}

export interface RecoverReport {
  backend: PointStoreBackend['name'];
  found: number;
  recovered: number;
  failed: number;
}

export interface PurgeReport {
  backend: PointStoreBackend['name'];
  /** False when nothing was removed because `confirm` was not given */
  confirmed: boolean;
  found: number;
  deleted: number;
  files: string[];
}

const DELETED_FILTER: PointFilter = { must: [{ key: 'is_deleted', match: true }] };

function deletedFilter(filePath?: string): PointFilter {
  if (filePath === undefined) {
    return DELETED_FILTER;
  }
  return {
    must: [
      { key: 'is_deleted', match: true },
      { key: 'file_path', match: normalizePath(filePath) },
    ],
  };
}

function distinctFiles(points: StoredPoint[]): string[] {
  return [...new Set(points.map((point) => point.payload.file_path))].sort();
}

/**
 * Set `is_deleted` on the given ids, batch by batch.
 */
export async function setDeletedFlag(
  backend: PointStoreBackend,
  ids: bigint[],
  deleted: boolean,
  options: LifecycleOptions = {}
): Promise<FlagUpdateResult> {
  const { batchSize = DEFAULT_BATCH_SIZE, logger = silentLogger } = options;
  if (batchSize < 1) {
    throw new ValidationError(`batchSize must be at least 1, got ${batchSize}`);
  }

  const result: FlagUpdateResult = { updated: 0, failed: 0 };

  for (let i = 0; i < ids.length; i += batchSize) {
    const batch = ids.slice(i, i + batchSize);
    try {
      await backend.setPayload(batch, { is_deleted: deleted });
      result.updated += batch.length;
    } catch (error) {
      logger.warn(
        `Batch ${Math.floor(i / batchSize) + 1} failed on ${backend.name} (${errorMessage(error)}), retrying per point`
      );
      for (const id of batch) {
        try {
          await backend.setPayload([id], { is_deleted: deleted });
          result.updated++;
        } catch (itemError) {
          result.failed++;
          logger.warn(`Failed to update point ${id}: ${errorMessage(itemError)}`);
        }
      }
    }
  }

  return result;
}

/**
 * Flag every live point whose file is not in `existingPaths`. Points
 * without a file (standalone entries) are never orphaned.
 *
 * Dry run by default: counts only, writes nothing.
 */
export async function cleanupDeletedFiles(
  backend: PointStoreBackend,
  existingPaths: Iterable<string>,
  options: LifecycleOptions & { dryRun?: boolean } = {}
): Promise<CleanupReport> {
  const { dryRun = true, logger = silentLogger } = options;
  const existing = new Set<string>();
  for (const path of existingPaths) {
    existing.add(normalizePath(path));
  }

  const live = (await scanAll(backend)).filter((point) => !point.payload.is_deleted);
  const orphans = live.filter(
    (point) => point.payload.file_path !== '' && !isKnownPath(point.payload.file_path, existing)
  );

  const report: CleanupReport = {
    backend: backend.name,
    dryRun,
    scanned: live.length,
    orphaned: orphans.length,
    marked: 0,
    failed: 0,
    files: distinctFiles(orphans),
  };

  if (orphans.length === 0) {
    return report;
  }

  if (dryRun) {
    logger.info?.(`Dry run: ${orphans.length} chunks would be marked as deleted (${backend.name})`);
    return report;
  }

  const result = await setDeletedFlag(
    backend,
    orphans.map((point) => point.id),
    true,
    options
  );
  report.marked = result.updated;
  report.failed = result.failed;
  logger.info?.(`Marked ${result.updated} chunks as deleted (${backend.name})`);
  return report;
}

/**
 * Clear the flag on soft-deleted points, optionally for one file.
 * Live points are never touched, so running it twice changes nothing.
 */
export async function recoverDeleted(
  backend: PointStoreBackend,
  options: LifecycleOptions & { filePath?: string } = {}
): Promise<RecoverReport> {
  const flagged = await scanMatching(backend, deletedFilter(options.filePath));
  const result = await setDeletedFlag(
    backend,
    flagged.map((point) => point.id),
    false,
    options
  );
  return {
    backend: backend.name,
    found: flagged.length,
    recovered: result.updated,
    failed: result.failed,
  };
}

/**
 * Physically remove soft-deleted points. Without `confirm` this only
 * reports what would go.
 */
export async function permanentDelete(
  backend: PointStoreBackend,
  options: LifecycleOptions & { confirm?: boolean; filePath?: string } = {}
): Promise<PurgeReport> {
  const { confirm = false, batchSize = DEFAULT_BATCH_SIZE, logger = silentLogger } = options;
  const flagged = await scanMatching(backend, deletedFilter(options.filePath));

  const report: PurgeReport = {
    backend: backend.name,
    confirmed: confirm,
    found: flagged.length,
    deleted: 0,
    files: distinctFiles(flagged),
  };

  if (!confirm || flagged.length === 0) {
    return report;
  }

  for (let i = 0; i < flagged.length; i += batchSize) {
    const batch = flagged.slice(i, i + batchSize).map((point) => point.id);
    await backend.delete(batch);
    report.deleted += batch.length;
  }
  logger.info?.(`Permanently deleted ${report.deleted} chunks (${backend.name})`);
  return report;
}
