/**
 * Point Store Backend
 *
 * The capability both backends expose. The hybrid store never talks to
 * Qdrant or SQLite directly, only through this interface, so tests can
 * swap in an in-process backend.
 */

import { FilterRejectedError, matchesFilter, type PointFilter } from './filter.js';
import type {
  BackendTarget,
  ChunkPayload,
  PointRecord,
  ScanPage,
  ScoredPoint,
  StoredPoint,
} from './types.js';

export interface ScanOptions {
  filter?: PointFilter;
  limit: number;
  /** Opaque cursor from a previous page */
  offset?: string | null;
  withVector?: boolean;
}

export interface RetrieveOptions {
  withVector?: boolean;
}

export interface PointStoreBackend {
  /** `cloud` for the primary, `local` for the secondary */
  readonly name: BackendTarget;

  /** Create the collection if it does not exist yet. */
  ensureCollection(): Promise<void>;

  upsert(points: PointRecord[]): Promise<void>;

  /** Missing ids are skipped, not reported. */
  retrieve(ids: bigint[], options?: RetrieveOptions): Promise<StoredPoint[]>;

  /** Nearest neighbours by cosine similarity, best first. */
  nearest(vector: number[], limit: number, filter?: PointFilter): Promise<ScoredPoint[]>;

  /**
   * Exact filtered scan.
   *
   * @throws FilterRejectedError when the backend cannot evaluate `filter`
   */
  scan(options: ScanOptions): Promise<ScanPage>;

  /** Merge `payload` into the stored payloads of `ids`. */
  setPayload(ids: bigint[], payload: Partial<ChunkPayload>): Promise<void>;

  delete(ids: bigint[]): Promise<void>;

  count(filter?: PointFilter): Promise<number>;

  /** Drop every point in the collection. */
  deleteAll(): Promise<void>;
}

/** Page size used when a caller needs every matching point. */
export const SCAN_PAGE_SIZE = 1000;

/**
 * Page through a scan until the backend reports no next page.
 */
export async function scanAll(
  backend: PointStoreBackend,
  filter?: PointFilter,
  options: { withVector?: boolean } = {}
): Promise<StoredPoint[]> {
  const points: StoredPoint[] = [];
  let offset: string | null = null;

  do {
    const page: ScanPage = await backend.scan({
      filter,
      limit: SCAN_PAGE_SIZE,
      offset,
      withVector: options.withVector,
    });
    points.push(...page.points);
    offset = page.nextOffset;
  } while (offset !== null);

  return points;
}

/**
 * Like scanAll, but when the backend rejects the filter, scan everything
 * and apply the filter in process.
 */
export async function scanMatching(
  backend: PointStoreBackend,
  filter: PointFilter,
  options: { withVector?: boolean } = {}
): Promise<StoredPoint[]> {
  try {
    return await scanAll(backend, filter, options);
  } catch (error) {
    if (!(error instanceof FilterRejectedError)) {
      throw error;
    }
    const everything = await scanAll(backend, undefined, options);
    return everything.filter((point) => matchesFilter(point.payload, filter));
  }
}
