import { describe, it, expect, beforeEach, vi } from 'vitest';
import { makeChunk, makePoint } from '../../test-utils/index.js';
import { BackendUnavailableError } from '../../errors/index.js';
import { FilterRejectedError } from '../filter.js';

const client = vi.hoisted(() => ({
  getCollections: vi.fn(),
  createCollection: vi.fn(),
  createPayloadIndex: vi.fn(),
  upsert: vi.fn(),
  retrieve: vi.fn(),
  search: vi.fn(),
  scroll: vi.fn(),
  setPayload: vi.fn(),
  delete: vi.fn(),
  count: vi.fn(),
  deleteCollection: vi.fn(),
}));

vi.mock('@qdrant/js-client-rest', () => ({
  QdrantClient: vi.fn(function () {
    return client;
  }),
}));

import {
  QdrantBackend,
  INDEXED_FIELDS,
  pointIdToUuid,
  toQdrantFilter,
  uuidToPointId,
} from '../qdrant-backend.js';

describe('id encoding', () => {
  it('puts the id in the low 64 bits of a UUID', () => {
    expect(pointIdToUuid(255n)).toBe('00000000-0000-0000-0000-0000000000ff');
    expect(pointIdToUuid(0x7fffffffffffffffn)).toBe('00000000-0000-0000-7fff-ffffffffffff');
  });

  it('decodes what it encodes', () => {
    expect(uuidToPointId(pointIdToUuid(2847740081820437321n))).toBe(2847740081820437321n);
  });
});

describe('toQdrantFilter', () => {
  it('wraps bare values and keeps empty clauses out', () => {
    expect(
      toQdrantFilter({
        must: [{ key: 'file_path', match: 'docs/a.md' }],
        should: [],
        must_not: [{ key: 'is_deleted', match: { value: true } }],
      })
    ).toEqual({
      must: [{ key: 'file_path', match: { value: 'docs/a.md' } }],
      must_not: [{ key: 'is_deleted', match: { value: true } }],
    });
  });

  it('passes homogeneous any-lists through', () => {
    expect(toQdrantFilter({ must: [{ key: 'language', match: { any: ['ts', 'py'] } }] })).toEqual({
      must: [{ key: 'language', match: { any: ['ts', 'py'] } }],
    });
  });

  it('rejects mixed any-lists', () => {
    expect(() => toQdrantFilter({ must: [{ key: 'x', match: { any: ['a', 1] } }] })).toThrow(
      FilterRejectedError
    );
  });
});

describe('QdrantBackend', () => {
  let backend: QdrantBackend;
  const point = makePoint(makeChunk({ content: 'alpha', filePath: 'docs/a.md', lineStart: 3 }), [0.1, 0.2]);

  beforeEach(() => {
    for (const fn of Object.values(client)) {
      fn.mockReset();
    }
    client.getCollections.mockResolvedValue({ collections: [{ name: 'docs' }] });
    backend = new QdrantBackend({
      url: 'http://localhost:6333',
      apiKey: 'test-secret',
      collection: 'docs',
      dimensions: 2,
    });
  });

  it('creates the collection with payload indexes when missing', async () => {
    client.getCollections.mockResolvedValue({ collections: [{ name: 'other' }] });

    await backend.ensureCollection();

    expect(client.createCollection).toHaveBeenCalledWith('docs', {
      vectors: { size: 2, distance: 'Cosine' },
    });
    expect(client.createPayloadIndex).toHaveBeenCalledTimes(INDEXED_FIELDS.length);
  });

  it('leaves an existing collection alone', async () => {
    client.getCollections.mockResolvedValue({ collections: [{ name: 'docs' }] });

    await backend.ensureCollection();

    expect(client.createCollection).not.toHaveBeenCalled();
  });

  it('creates a missing collection before the first read', async () => {
    client.getCollections.mockResolvedValue({ collections: [] });
    client.scroll.mockResolvedValue({ points: [], next_page_offset: null });
    client.count.mockResolvedValue({ count: 0 });

    await backend.scan({ limit: 10 });
    await backend.count();

    expect(client.getCollections).toHaveBeenCalledTimes(1);
    expect(client.createCollection).toHaveBeenCalledTimes(1);
    expect(client.createCollection.mock.invocationCallOrder[0]).toBeLessThan(
      client.scroll.mock.invocationCallOrder[0] ?? 0
    );
  });

  it('checks the collection again after a failed attempt', async () => {
    client.getCollections
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED'))
      .mockResolvedValue({ collections: [{ name: 'docs' }] });
    client.count.mockResolvedValue({ count: 4 });

    await expect(backend.count()).rejects.toThrow(
      new BackendUnavailableError('cloud', 'ensureCollection failed: connect ECONNREFUSED')
    );
    expect(await backend.count()).toBe(4);
    expect(client.getCollections).toHaveBeenCalledTimes(2);
  });

  it('recreates the collection after deleting it', async () => {
    client.getCollections
      .mockResolvedValueOnce({ collections: [{ name: 'docs' }] })
      .mockResolvedValue({ collections: [] });
    client.deleteCollection.mockResolvedValue(true);

    await backend.deleteAll();

    expect(client.deleteCollection).toHaveBeenCalledWith('docs');
    expect(client.createCollection).toHaveBeenCalledTimes(1);
  });

  it('writes UUID ids and the decimal id in the payload', async () => {
    client.upsert.mockResolvedValue({});

    await backend.upsert([point]);

    expect(client.upsert).toHaveBeenCalledWith('docs', {
      wait: true,
      points: [
        {
          id: pointIdToUuid(point.id),
          vector: [0.1, 0.2],
          payload: { ...point.payload, point_id: point.id.toString() },
        },
      ],
    });
  });

  it('decodes search hits', async () => {
    client.search.mockResolvedValue([
      { id: pointIdToUuid(point.id), score: 0.9, payload: { ...point.payload, point_id: 'x' } },
    ]);

    const hits = await backend.nearest([0.1, 0.2], 5);

    expect(hits).toEqual([{ id: point.id, score: 0.9, payload: point.payload }]);
  });

  it('turns the scroll cursor into an opaque offset', async () => {
    client.scroll.mockResolvedValue({
      points: [{ id: pointIdToUuid(point.id), payload: point.payload }],
      next_page_offset: pointIdToUuid(7n),
    });

    const page = await backend.scan({ limit: 1 });

    expect(page.points.map((p) => p.id)).toEqual([point.id]);
    expect(page.nextOffset).toBe(pointIdToUuid(7n));
  });

  it('reports a rejected filter as FilterRejectedError', async () => {
    client.scroll.mockRejectedValue(Object.assign(new Error('Bad Request'), { status: 400 }));

    await expect(
      backend.scan({ limit: 10, filter: { must: [{ key: 'metadata.owner', match: 'a' }] } })
    ).rejects.toThrow(FilterRejectedError);
  });

  it('reports transport failures as BackendUnavailableError', async () => {
    client.count.mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(backend.count()).rejects.toThrow(
      new BackendUnavailableError('cloud', 'count failed: connect ECONNREFUSED')
    );
  });

  it('does not call the server for empty id lists', async () => {
    await backend.delete([]);
    await backend.setPayload([], { is_deleted: true });

    expect(client.delete).not.toHaveBeenCalled();
    expect(client.setPayload).not.toHaveBeenCalled();
  });
});
