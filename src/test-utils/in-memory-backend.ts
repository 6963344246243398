/**
 * In-process point store for tests.
 *
 * Behaves like the real backends (cosine nearest, id-ordered scans, payload
 * merge) and records every mutating call so tests can assert on write
 * counts. `failOn` makes chosen operations throw; `rejectFilters` makes
 * filtered scans behave like a backend without payload indexes.
 */

import { BackendUnavailableError } from '../errors/index.js';
import type { PointStoreBackend, RetrieveOptions, ScanOptions } from '../store/backend.js';
import { FilterRejectedError, matchesFilter, type PointFilter } from '../store/filter.js';
import type {
  BackendTarget,
  ChunkPayload,
  PointRecord,
  ScanPage,
  ScoredPoint,
  StoredPoint,
} from '../store/types.js';
import { cosineSimilarity } from '../store/vector.js';

export type BackendOperation =
  | 'upsert'
  | 'retrieve'
  | 'nearest'
  | 'scan'
  | 'setPayload'
  | 'delete'
  | 'count'
  | 'deleteAll';

interface Entry {
  vector: number[];
  payload: ChunkPayload;
}

export class InMemoryBackend implements PointStoreBackend {
  readonly upserts: PointRecord[][] = [];
  readonly deletes: bigint[][] = [];
  readonly payloadUpdates: Array<{ ids: bigint[]; payload: Partial<ChunkPayload> }> = [];

  readonly failOn = new Set<BackendOperation>();
  rejectFilters = false;
  /** Fail setPayload for batches that contain this id */
  poisonId: bigint | null = null;

  private readonly points = new Map<bigint, Entry>();

  constructor(public readonly name: BackendTarget = 'cloud') {}

  /** Seed points without recording an upsert call. */
  seed(points: PointRecord[]): void {
    for (const point of points) {
      this.points.set(point.id, { vector: [...point.vector], payload: { ...point.payload } });
    }
  }

  /** Direct view of a stored payload. */
  payloadOf(id: bigint): ChunkPayload | undefined {
    return this.points.get(id)?.payload;
  }

  get size(): number {
    return this.points.size;
  }

  private guard(operation: BackendOperation): void {
    if (this.failOn.has(operation)) {
      throw new BackendUnavailableError(this.name, `${operation} failed`);
    }
  }

  private guardFilter(filter: PointFilter | undefined): void {
    if (this.rejectFilters && filter) {
      throw new FilterRejectedError('Index required but not found');
    }
  }

  private sortedIds(): bigint[] {
    return [...this.points.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  private toStored(id: bigint, entry: Entry, withVector: boolean | undefined): StoredPoint {
    return withVector
      ? { id, vector: [...entry.vector], payload: { ...entry.payload } }
      : { id, payload: { ...entry.payload } };
  }

  async ensureCollection(): Promise<void> {}

  async upsert(points: PointRecord[]): Promise<void> {
    this.guard('upsert');
    this.upserts.push(points);
    this.seed(points);
  }

  async retrieve(ids: bigint[], options: RetrieveOptions = {}): Promise<StoredPoint[]> {
    this.guard('retrieve');
    const found: StoredPoint[] = [];
    for (const id of ids) {
      const entry = this.points.get(id);
      if (entry) found.push(this.toStored(id, entry, options.withVector));
    }
    return found;
  }

  async nearest(vector: number[], limit: number, filter?: PointFilter): Promise<ScoredPoint[]> {
    this.guard('nearest');
    this.guardFilter(filter);
    const scored: ScoredPoint[] = [];
    for (const [id, entry] of this.points) {
      if (!matchesFilter(entry.payload, filter)) continue;
      scored.push({ id, payload: { ...entry.payload }, score: cosineSimilarity(vector, entry.vector) });
    }
    return scored.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  async scan(options: ScanOptions): Promise<ScanPage> {
    this.guard('scan');
    this.guardFilter(options.filter);
    const matching = this.sortedIds().filter((id) => {
      const entry = this.points.get(id);
      return entry !== undefined && matchesFilter(entry.payload, options.filter);
    });

    const start = options.offset ? Number(options.offset) : 0;
    const end = start + options.limit;
    const points: StoredPoint[] = [];
    for (const id of matching.slice(start, end)) {
      const entry = this.points.get(id);
      if (entry) points.push(this.toStored(id, entry, options.withVector));
    }
    return { points, nextOffset: end < matching.length ? String(end) : null };
  }

  async setPayload(ids: bigint[], payload: Partial<ChunkPayload>): Promise<void> {
    this.guard('setPayload');
    if (this.poisonId !== null && ids.includes(this.poisonId)) {
      throw new BackendUnavailableError(this.name, `bad point ${this.poisonId}`);
    }
    this.payloadUpdates.push({ ids: [...ids], payload });
    for (const id of ids) {
      const entry = this.points.get(id);
      if (entry) entry.payload = { ...entry.payload, ...payload };
    }
  }

  async delete(ids: bigint[]): Promise<void> {
    this.guard('delete');
    this.deletes.push([...ids]);
    for (const id of ids) this.points.delete(id);
  }

  async count(filter?: PointFilter): Promise<number> {
    this.guard('count');
    this.guardFilter(filter);
    let total = 0;
    for (const entry of this.points.values()) {
      if (matchesFilter(entry.payload, filter)) total++;
    }
    return total;
  }

  async deleteAll(): Promise<void> {
    this.guard('deleteAll');
    this.points.clear();
  }
}
