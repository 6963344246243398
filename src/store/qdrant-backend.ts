/**
 * Primary backend on a Qdrant server.
 *
 * Point ids are 63-bit integers, which JSON numbers cannot carry exactly,
 * so they travel as UUIDs whose low 64 bits hold the id. The decimal id is
 * also written to the payload as `point_id` for inspection in the Qdrant UI.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { LazyResource } from '../embeddings/lazy.js';
import { BackendUnavailableError, RagError } from '../errors/index.js';
import { errorMessage } from '../utils/result.js';
import type { PointStoreBackend, RetrieveOptions, ScanOptions } from './backend.js';
import { FilterRejectedError, type FieldCondition, type PointFilter } from './filter.js';
import { formatPointId } from './ids.js';
import {
  ChunkPayloadSchema,
  type ChunkPayload,
  type PointRecord,
  type ScanPage,
  type ScoredPoint,
  type StoredPoint,
} from './types.js';

/** Payload fields that get a keyword index when the collection is created */
export const INDEXED_FIELDS = ['file_path', 'section', 'language', 'content_type'] as const;

const UPSERT_BATCH_SIZE = 256;

export interface QdrantBackendOptions {
  url: string;
  apiKey?: string;
  collection: string;
  dimensions: number;
  timeoutMs?: number;
}

// ============================================================================
// Id encoding
// ============================================================================

/**
 * 63-bit id to UUID: `00000000-0000-0000-hhhh-hhhhhhhhhhhh`.
 */
export function pointIdToUuid(id: bigint): string {
  const hex = id.toString(16).padStart(16, '0');
  return `00000000-0000-0000-${hex.slice(0, 4)}-${hex.slice(4)}`;
}

export function uuidToPointId(uuid: string): bigint {
  const hex = uuid.replace(/-/g, '');
  return BigInt(`0x${hex.slice(-16)}`);
}

function decodeId(id: string | number): bigint {
  return typeof id === 'number' ? BigInt(id) : uuidToPointId(id);
}

// ============================================================================
// Filter translation
// ============================================================================

interface QdrantCondition {
  key: string;
  match: { value: string | number | boolean } | { any: string[] | number[] };
}

interface QdrantFilter {
  must?: QdrantCondition[];
  should?: QdrantCondition[];
  must_not?: QdrantCondition[];
}

function toQdrantCondition(condition: FieldCondition): QdrantCondition {
  const { key, match } = condition;
  if (typeof match !== 'object') {
    return { key, match: { value: match } };
  }
  if ('value' in match) {
    return { key, match: { value: match.value } };
  }

  const strings = match.any.filter((value): value is string => typeof value === 'string');
  if (strings.length === match.any.length) {
    return { key, match: { any: strings } };
  }
  const numbers = match.any.filter((value): value is number => typeof value === 'number');
  if (numbers.length === match.any.length) {
    return { key, match: { any: numbers } };
  }
  throw new FilterRejectedError(`Mixed or boolean 'any' values are not supported for ${key}`);
}

export function toQdrantFilter(filter: PointFilter | undefined): QdrantFilter | undefined {
  if (!filter) return undefined;
  const translated: QdrantFilter = {};
  if (filter.must?.length) translated.must = filter.must.map(toQdrantCondition);
  if (filter.should?.length) translated.should = filter.should.map(toQdrantCondition);
  if (filter.must_not?.length) translated.must_not = filter.must_not.map(toQdrantCondition);
  return translated;
}

// ============================================================================
// Response decoding
// ============================================================================

function decodePayload(payload: unknown): ChunkPayload {
  return ChunkPayloadSchema.parse(payload ?? {});
}

function decodeVector(vector: unknown): number[] | undefined {
  if (!Array.isArray(vector)) return undefined;
  const values = vector.filter((value): value is number => typeof value === 'number');
  return values.length === vector.length ? values : undefined;
}

function isBadRequest(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    (error.status === 400 || error.status === 422)
  );
}

/**
 * Qdrant-backed implementation of {@link PointStoreBackend}.
 */
export class QdrantBackend implements PointStoreBackend {
  readonly name = 'cloud' as const;
  private readonly client: QdrantClient;
  private readonly collection: string;
  private readonly dimensions: number;
  /** Resolves once the collection exists on the server */
  private readonly collectionReady = new LazyResource(async () => {
    await this.createCollectionIfMissing();
    return true;
  });

  constructor(options: QdrantBackendOptions) {
    this.client = new QdrantClient({
      url: options.url,
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
    });
    this.collection = options.collection;
    this.dimensions = options.dimensions;
  }

  /**
   * Run a client call, turning transport failures into BackendUnavailableError
   * and filter rejections into FilterRejectedError.
   */
  private async call<T>(
    operation: string,
    run: () => Promise<T>,
    filter?: PointFilter
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof RagError || error instanceof FilterRejectedError) {
        throw error;
      }
      if (filter && isBadRequest(error)) {
        throw new FilterRejectedError(`Qdrant rejected filter: ${errorMessage(error)}`, error);
      }
      throw new BackendUnavailableError('cloud', `${operation} failed: ${errorMessage(error)}`, {
        details: { collection: this.collection, operation },
        cause: error,
      });
    }
  }

  /**
   * Create the collection and its payload indexes unless it exists. Runs
   * once per backend; every other operation waits for it, so a fresh
   * server gets its collection before the first read or write.
   */
  async ensureCollection(): Promise<void> {
    await this.collectionReady.get();
  }

  private async createCollectionIfMissing(): Promise<void> {
    await this.call('ensureCollection', async () => {
      const { collections } = await this.client.getCollections();
      if (collections.some((collection) => collection.name === this.collection)) {
        return;
      }

      await this.client.createCollection(this.collection, {
        vectors: { size: this.dimensions, distance: 'Cosine' },
      });
      for (const field of INDEXED_FIELDS) {
        await this.client.createPayloadIndex(this.collection, {
          field_name: field,
          field_schema: 'keyword',
          wait: true,
        });
      }
    });
  }

  async upsert(points: PointRecord[]): Promise<void> {
    await this.ensureCollection();
    for (let i = 0; i < points.length; i += UPSERT_BATCH_SIZE) {
      const batch = points.slice(i, i + UPSERT_BATCH_SIZE);
      await this.call('upsert', () =>
        this.client.upsert(this.collection, {
          wait: true,
          points: batch.map((point) => ({
            id: pointIdToUuid(point.id),
            vector: point.vector,
            payload: { ...point.payload, point_id: formatPointId(point.id) },
          })),
        })
      );
    }
  }

  async retrieve(ids: bigint[], options: RetrieveOptions = {}): Promise<StoredPoint[]> {
    if (ids.length === 0) return [];
    await this.ensureCollection();
    const records = await this.call('retrieve', () =>
      this.client.retrieve(this.collection, {
        ids: ids.map(pointIdToUuid),
        with_payload: true,
        with_vector: options.withVector ?? false,
      })
    );

    return records.map((record) => {
      const vector = options.withVector ? decodeVector(record.vector) : undefined;
      const point: StoredPoint = { id: decodeId(record.id), payload: decodePayload(record.payload) };
      if (vector) point.vector = vector;
      return point;
    });
  }

  async nearest(vector: number[], limit: number, filter?: PointFilter): Promise<ScoredPoint[]> {
    await this.ensureCollection();
    const hits = await this.call(
      'search',
      () =>
        this.client.search(this.collection, {
          vector,
          limit,
          filter: toQdrantFilter(filter),
          with_payload: true,
        }),
      filter
    );

    return hits.map((hit) => ({
      id: decodeId(hit.id),
      score: hit.score,
      payload: decodePayload(hit.payload),
    }));
  }

  async scan(options: ScanOptions): Promise<ScanPage> {
    await this.ensureCollection();
    const response = await this.call(
      'scroll',
      () =>
        this.client.scroll(this.collection, {
          filter: toQdrantFilter(options.filter),
          limit: options.limit,
          offset: options.offset ?? undefined,
          with_payload: true,
          with_vector: options.withVector ?? false,
        }),
      options.filter
    );

    const next = response.next_page_offset;
    return {
      points: response.points.map((record) => {
        const vector = options.withVector ? decodeVector(record.vector) : undefined;
        const point: StoredPoint = {
          id: decodeId(record.id),
          payload: decodePayload(record.payload),
        };
        if (vector) point.vector = vector;
        return point;
      }),
      nextOffset: typeof next === 'string' || typeof next === 'number' ? String(next) : null,
    };
  }

  async setPayload(ids: bigint[], payload: Partial<ChunkPayload>): Promise<void> {
    if (ids.length === 0) return;
    await this.ensureCollection();
    await this.call('setPayload', () =>
      this.client.setPayload(this.collection, {
        payload,
        points: ids.map(pointIdToUuid),
        wait: true,
      })
    );
  }

  async delete(ids: bigint[]): Promise<void> {
    if (ids.length === 0) return;
    await this.ensureCollection();
    await this.call('delete', () =>
      this.client.delete(this.collection, { points: ids.map(pointIdToUuid), wait: true })
    );
  }

  async count(filter?: PointFilter): Promise<number> {
    await this.ensureCollection();
    const result = await this.call(
      'count',
      () => this.client.count(this.collection, { filter: toQdrantFilter(filter), exact: true }),
      filter
    );
    return result.count;
  }

  async deleteAll(): Promise<void> {
    await this.ensureCollection();
    await this.call('deleteAll', async () => {
      await this.client.deleteCollection(this.collection);
    });
    this.collectionReady.clear();
    await this.ensureCollection();
  }
}
