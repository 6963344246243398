import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

interface ServerPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

// A Qdrant server that starts without any collection and answers 404
// until one is created
const server = vi.hoisted(() => {
  const collections = new Set<string>();
  const points = new Map<string, ServerPoint>();
  const requireCollection = (name: string) => {
    if (!collections.has(name)) {
      throw Object.assign(new Error(`Collection ${name} not found`), { status: 404 });
    }
  };

  const client = {
    getCollections: vi.fn(async () => ({ collections: [...collections].map((name) => ({ name })) })),
    createCollection: vi.fn(async (name: string) => {
      collections.add(name);
      return true;
    }),
    createPayloadIndex: vi.fn(async () => ({})),
    upsert: vi.fn(async (name: string, body: { points: ServerPoint[] }) => {
      requireCollection(name);
      for (const point of body.points) {
        points.set(point.id, point);
      }
      return {};
    }),
    scroll: vi.fn(async (name: string) => {
      requireCollection(name);
      return { points: [...points.values()], next_page_offset: null };
    }),
    count: vi.fn(async (name: string, body: { filter?: unknown }) => {
      requireCollection(name);
      return { count: body.filter ? 0 : points.size };
    }),
  };

  return { collections, points, client };
});

vi.mock('@qdrant/js-client-rest', () => ({
  QdrantClient: vi.fn(function () {
    return server.client;
  }),
}));

import { createHybridStore } from '../factory.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { indexRepository } from '../../indexer/repository.js';
import { FakeEmbedder } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';

describe('createHybridStore', () => {
  let root: string;

  beforeEach(() => {
    server.collections.clear();
    server.points.clear();
    for (const fn of Object.values(server.client)) {
      fn.mockClear();
    }
    root = mkdtempSync(join(tmpdir(), 'hrag-fresh-'));
    writeFileSync(join(root, 'README.md'), '# Guide\nAuth flow uses short-lived tokens');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('indexes into a server that has no collection yet', async () => {
    const { store } = createHybridStore(DEFAULT_CONFIG, {
      embedder: new FakeEmbedder(),
      logger: silentLogger,
    });

    const report = await indexRepository(store, { root }, silentLogger);

    expect(report).toMatchObject({
      docsIndexed: 1,
      filesProcessed: 1,
      errors: 0,
      failures: [],
      stats: { cloud: { count: 1, deleted: 0 }, local: null },
    });
    expect(server.client.createCollection).toHaveBeenCalledTimes(1);
    expect(server.client.createCollection).toHaveBeenCalledWith(DEFAULT_CONFIG.primary.collection, {
      vectors: { size: DEFAULT_CONFIG.embedding.dimensions, distance: 'Cosine' },
    });
    expect(server.client.getCollections).toHaveBeenCalledTimes(1);
  });
});
