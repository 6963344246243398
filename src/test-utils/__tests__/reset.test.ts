/**
 * Tests for the unified reset utility and the in-process backend
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { resetAll } from '../reset.js';
import { InMemoryBackend } from '../in-memory-backend.js';
import { FakeEmbedder } from '../fake-embedder.js';
import { makeChunk, makePoint } from '../fixtures.js';
import { _clearEnvCache } from '../../config/env.js';
import { closeAllDatabases } from '../../database/connection.js';
import { FilterRejectedError } from '../../store/filter.js';

vi.mock('../../config/env.js', () => ({
  _clearEnvCache: vi.fn(),
}));

vi.mock('../../database/connection.js', () => ({
  closeAllDatabases: vi.fn(),
}));

describe('resetAll', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('closes cached databases and clears the env cache', () => {
    resetAll();

    expect(closeAllDatabases).toHaveBeenCalledTimes(1);
    expect(_clearEnvCache).toHaveBeenCalledTimes(1);
  });
});

describe('InMemoryBackend', () => {
  it('pages scans in id order', async () => {
    const backend = new InMemoryBackend();
    backend.seed([
      makePoint(makeChunk({ content: 'a', lineStart: 1 }), [1, 0]),
      makePoint(makeChunk({ content: 'b', lineStart: 2 }), [0, 1]),
      makePoint(makeChunk({ content: 'c', lineStart: 3 }), [1, 1]),
    ]);

    const first = await backend.scan({ limit: 2 });
    const second = await backend.scan({ limit: 2, offset: first.nextOffset });

    expect(first.points).toHaveLength(2);
    expect(first.nextOffset).toBe('2');
    expect(second.points).toHaveLength(1);
    expect(second.nextOffset).toBeNull();
    const ids = [...first.points, ...second.points].map((point) => point.id);
    expect([...ids].sort((a, b) => (a < b ? -1 : 1))).toEqual(ids);
  });

  it('rejects filtered scans when asked to', async () => {
    const backend = new InMemoryBackend();
    backend.rejectFilters = true;

    await expect(
      backend.scan({ limit: 10, filter: { must: [{ key: 'section', match: 'x' }] } })
    ).rejects.toBeInstanceOf(FilterRejectedError);
    await expect(backend.scan({ limit: 10 })).resolves.toEqual({ points: [], nextOffset: null });
  });
});

describe('FakeEmbedder', () => {
  it('gives texts without shared words orthogonal vectors', async () => {
    const embedder = new FakeEmbedder(8);
    const a = await embedder.embed('alpha beta', 'doc');
    const b = await embedder.embed('gamma', 'doc');

    expect(a).toEqual([1, 1, 0, 0, 0, 0, 0, 0]);
    expect(b).toEqual([0, 0, 1, 0, 0, 0, 0, 0]);
    expect(await embedder.rerankScore('alpha', 'gamma')).toBe(0);
  });
});
