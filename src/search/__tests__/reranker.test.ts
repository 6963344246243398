import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Reranker } from '../reranker.js';
import { RerankFailureError, ValidationError } from '../../errors/index.js';
import { FakeEmbedder, makeResult } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';

describe('Reranker', () => {
  let embedder: FakeEmbedder;
  let reranker: Reranker;

  const billing = makeResult({ content: 'billing invoice', lineNumber: 1, score: 0.9 });
  const refresh = makeResult({ content: 'token refresh flow', lineNumber: 5, score: 0.5 });
  const expiry = makeResult({ content: 'token expiry', lineNumber: 9, score: 0.4 });

  beforeEach(() => {
    embedder = new FakeEmbedder();
    reranker = new Reranker({ embedder, logger: silentLogger });
  });

  it('should return a list within topK untouched without scoring', async () => {
    const results = [expiry, billing];

    expect(await reranker.rerank('token refresh', results, 2)).toBe(results);
    expect(embedder.rerankCalls).toBe(0);
  });

  it('should reorder by scorer relevance and keep topK', async () => {
    const reranked = await reranker.rerank('token refresh', [billing, expiry, refresh], 2);

    expect(reranked.map((r) => r.content)).toEqual(['token refresh flow', 'token expiry']);
    expect(reranked[0]?.score).toBeCloseTo(2 / Math.sqrt(6));
    expect(reranked[1]?.score).toBeCloseTo(0.5);
  });

  it('should fall back to vector-score order when the scorer fails', async () => {
    embedder.failRerank = true;
    const logger = { ...silentLogger, warn: vi.fn() };
    reranker = new Reranker({ embedder, logger });

    const reranked = await reranker.rerank('token refresh', [expiry, billing, refresh], 2);

    expect(reranked).toEqual([billing, refresh]);
    expect(logger.warn).toHaveBeenCalledWith(
      'Reranking failed: rerank model unavailable, falling back to vector scores'
    );
  });

  it('should raise RerankFailureError from score()', async () => {
    embedder.failRerank = true;

    await expect(reranker.score('token', [billing])).rejects.toThrow(RerankFailureError);
  });

  it('should rerank each list of a batch independently', async () => {
    const batch = await reranker.batchRerank('token refresh', [[], [billing, expiry, refresh]], 1);

    expect(batch).toHaveLength(2);
    expect(batch[0]).toEqual([]);
    expect(batch[1]?.map((r) => r.content)).toEqual(['token refresh flow']);
  });

  it('should reject an empty batch', async () => {
    await expect(reranker.batchRerank('q', [], 3)).rejects.toThrow(ValidationError);
  });

  it('should clear the scorer on clear()', () => {
    reranker.clear();
    expect(embedder.clearCalls).toBe(1);
  });
});
