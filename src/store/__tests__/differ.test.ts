import { describe, it, expect, beforeEach, vi } from 'vitest';
import { formatSummary, indexFile, planDiff } from '../differ.js';
import { generatePointId } from '../ids.js';
import { FakeEmbedder, InMemoryBackend, makeChunk, makePoint } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';
import type { ChunkInput } from '../types.js';
import type { EmbeddingProvider } from '../../embeddings/types.js';

const FILE = 'docs/flows.md';

function chunk(lineStart: number, content: string): ChunkInput {
  return makeChunk({ filePath: FILE, lineStart, lineEnd: lineStart + 3, content });
}

const idAt = (lineStart: number): bigint => generatePointId({ filePath: FILE, lineStart });

describe('indexFile', () => {
  let backend: InMemoryBackend;
  let embedder: FakeEmbedder;

  beforeEach(() => {
    backend = new InMemoryBackend('cloud');
    embedder = new FakeEmbedder();
  });

  const run = (chunks: ChunkInput[]) =>
    indexFile(FILE, chunks, { backend, embedder, logger: silentLogger });

  it('adds every chunk of a new file in one upsert', async () => {
    const result = await run([chunk(1, 'A'), chunk(5, 'B'), chunk(9, 'C')]);

    expect(result.ok && result.value.added).toBe(3);
    expect(backend.upserts).toHaveLength(1);
    expect(backend.upserts[0]?.map((point) => point.id)).toEqual([idAt(1), idAt(5), idAt(9)]);
    expect(backend.payloadOf(idAt(1))?.is_deleted).toBe(false);
  });

  it('writes nothing when the same content is indexed twice', async () => {
    const chunks = [chunk(1, 'A'), chunk(5, 'B'), chunk(9, 'C')];
    await run(chunks);
    const second = await run(chunks);

    expect(backend.upserts).toHaveLength(1);
    expect(backend.deletes).toHaveLength(0);
    expect(backend.payloadUpdates).toHaveLength(0);
    expect(second.ok && second.value).toMatchObject({ added: 0, updated: 0, deleted: 0, unchanged: 3 });
  });

  it('upserts exactly the changed and new chunks and deletes the removed one', async () => {
    await run([chunk(1, 'A'), chunk(5, 'B'), chunk(9, 'C')]);
    const result = await run([chunk(1, 'A'), chunk(5, "B'"), chunk(12, 'D')]);

    expect(backend.upserts).toHaveLength(2);
    expect(backend.upserts[1]?.map((point) => point.id)).toEqual([idAt(5), idAt(12)]);
    expect(backend.deletes).toEqual([[idAt(9)]]);
    expect(backend.payloadOf(idAt(1))?.content).toBe('A');
    expect(backend.payloadOf(idAt(5))?.content).toBe("B'");
    expect(result.ok && result.value).toMatchObject({ added: 1, updated: 1, deleted: 1, unchanged: 1 });
  });

  it('clears the deleted flag when a flagged chunk is updated', async () => {
    backend.seed([makePoint(chunk(1, 'old'), embedder.vectorFor('old'), { deleted: true })]);

    await run([chunk(1, 'new')]);

    expect(backend.payloadOf(idAt(1))).toMatchObject({ content: 'new', is_deleted: false });
  });

  it('restores a flagged chunk whose content reappears without re-embedding', async () => {
    backend.seed([makePoint(chunk(1, 'same'), embedder.vectorFor('same'), { deleted: true })]);

    const result = await run([chunk(1, 'same')]);

    expect(embedder.embedded).toHaveLength(0);
    expect(backend.payloadUpdates).toEqual([{ ids: [idAt(1)], payload: { is_deleted: false } }]);
    expect(result.ok && result.value.restored).toBe(1);
  });

  it('never touches chunks of other files', async () => {
    const other = makeChunk({ filePath: 'docs/other.md', lineStart: 9, content: 'C' });
    backend.seed([makePoint(other, [1])]);

    await run([chunk(1, 'A')]);

    expect(backend.deletes).toHaveLength(0);
    expect(backend.payloadOf(generatePointId({ filePath: 'docs/other.md', lineStart: 9 }))).toBeDefined();
  });

  it('finds existing chunks when the backend rejects the file filter', async () => {
    await run([chunk(1, 'A')]);
    backend.rejectFilters = true;

    const result = await run([chunk(1, 'A')]);

    expect(result.ok && result.value.unchanged).toBe(1);
    expect(backend.upserts).toHaveLength(1);
  });

  it('skips chunks whose embedding fails and still reports success', async () => {
    embedder.failEmbed = true;
    const logger = { ...silentLogger, error: vi.fn() };

    const result = await indexFile(FILE, [chunk(1, 'A')], { backend, embedder, logger });

    expect(result.ok && result.value).toMatchObject({ added: 0, failedChunks: 1 });
    expect(backend.upserts).toHaveLength(0);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to embed chunk at docs/flows.md:1: embedding backend unavailable: fake embedder offline'
    );
  });

  it('counts only the chunks that were written', async () => {
    await run([chunk(1, 'A'), chunk(5, 'B')]);
    const flaky: EmbeddingProvider = {
      dimensions: embedder.dimensions,
      embed: async (text, category) => {
        if (text.startsWith('B')) {
          throw new Error('model busy');
        }
        return embedder.embed(text, category);
      },
      rerankScore: (query, candidate) => embedder.rerankScore(query, candidate),
      clear: () => embedder.clear(),
    };

    const result = await indexFile(FILE, [chunk(1, "A'"), chunk(5, "B'"), chunk(9, 'C'), chunk(12, 'B2')], {
      backend,
      embedder: flaky,
      logger: silentLogger,
    });

    expect(result.ok && result.value).toMatchObject({ added: 1, updated: 1, failedChunks: 2 });
    expect(backend.upserts[1]?.map((point) => point.id)).toEqual([idAt(1), idAt(9)]);
    if (result.ok) {
      expect(formatSummary(result.value)).toBe('docs/flows.md (cloud): 1 updated, 1 added');
    }
  });

  it('returns an error result when the backend cannot be read', async () => {
    backend.failOn.add('scan');

    const result = await run([chunk(1, 'A')]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('cloud backend unavailable: scan failed');
    }
  });
});

describe('planDiff', () => {
  it('keeps the first of two chunks sharing a start line', () => {
    const plan = planDiff(FILE, [], [chunk(1, 'first'), chunk(1, 'second')]);
    expect(plan.added.map((c) => c.content)).toEqual(['first']);
  });
});

describe('formatSummary', () => {
  it('lists only non-zero actions', () => {
    expect(
      formatSummary({
        filePath: FILE,
        backend: 'cloud',
        added: 1,
        updated: 2,
        restored: 0,
        deleted: 1,
        unchanged: 4,
        failedChunks: 0,
      })
    ).toBe('docs/flows.md (cloud): 2 updated, 1 added, 1 deleted');
  });

  it('reports an untouched file', () => {
    expect(
      formatSummary({
        filePath: FILE,
        backend: 'local',
        added: 0,
        updated: 0,
        restored: 0,
        deleted: 0,
        unchanged: 3,
        failedChunks: 0,
      })
    ).toBe('docs/flows.md (local): no changes');
  });
});
