import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { AskPipeline, noAnswerText } from '../ask-pipeline.js';
import type { AskSettings } from '../types.js';
import { BackendUnavailableError, ValidationError } from '../../errors/index.js';
import type { SearchResult } from '../../store/types.js';
import { FakeEmbedder, makeResult } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';

const synth = vi.hoisted(() => ({ fail: false }));

vi.mock('../../search/synthesizer.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../search/synthesizer.js')>();
  return {
    ...actual,
    synthesizeAnswer: (...args: Parameters<typeof actual.synthesizeAnswer>) => {
      if (synth.fail) {
        throw new Error('boom');
      }
      return actual.synthesizeAnswer(...args);
    },
  };
});

describe('AskPipeline', () => {
  let embedder: FakeEmbedder;
  let hits: SearchResult[];
  let store: {
    search: Mock<() => Promise<SearchResult[]>>;
    searchWithExpansion: Mock<() => Promise<SearchResult[]>>;
  };

  beforeEach(() => {
    synth.fail = false;
    embedder = new FakeEmbedder();
    hits = [];
    store = {
      search: vi.fn(async () => hits),
      searchWithExpansion: vi.fn(async () => hits),
    };
  });

  const pipeline = (settings: Partial<AskSettings> = {}) => new AskPipeline({ store, embedder, settings, logger: silentLogger });

  const tokenHits = () => [
    makeResult({ content: 'billing export', filePath: 'docs/billing.md', score: 0.9 }),
    makeResult({ content: 'token refresh flow', filePath: 'docs/auth.md', score: 0.5 }),
    makeResult({ content: 'token expiry', filePath: 'docs/auth.md', lineNumber: 7, score: 0.4 }),
  ];

  it('should reject an empty question', async () => {
    const result = await pipeline().ask('   ');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ValidationError);
    }
    expect(store.search).not.toHaveBeenCalled();
  });

  it('should expand enumerations and list items in order with sources', async () => {
    hits = [
      makeResult({ content: '1. Auth flow\n3. Payment flow', filePath: 'docs/flows.md', section: 'Flows' }),
      makeResult({ content: 'More:\n2. Notify flow', filePath: 'docs/flows.md', lineNumber: 5, section: 'Flows' }),
    ];

    const result = await pipeline().ask('List all flows');

    expect(store.searchWithExpansion).toHaveBeenCalledWith('List all flows', { topK: 20, limit: 25 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.intent).toBe('enumeration');
    expect(result.value.answer).toBe('1. Auth flow\n2. Notify flow\n3. Payment flow');
    expect(result.value.text).toBe(
      '**Answer to: List all flows**\n\n1. Auth flow\n2. Notify flow\n3. Payment flow\n\n---\n\n**Sources:**\n[1] docs/flows.md:1'
    );
    expect(result.value.stages).toEqual({ expanded: true, reranked: false, synthesized: true });
  });

  it('should run a plain search for factual questions', async () => {
    hits = [makeResult({ content: 'The timeout is 30s.' })];

    const result = await pipeline().ask('retry timeout value');

    expect(store.search).toHaveBeenCalledWith('retry timeout value', 20);
    expect(store.searchWithExpansion).not.toHaveBeenCalled();
    expect(result.ok && result.value.answer).toBe('The timeout is 30s.');
  });

  it('should append context to the search query', async () => {
    await pipeline().ask('Describe retries', 'backoff');

    expect(store.searchWithExpansion).toHaveBeenCalledWith('Describe retries backoff', { topK: 20, limit: 25 });
  });

  it('should answer "not found" when nothing matches', async () => {
    const result = await pipeline().ask('retry timeout value');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.text).toBe(noAnswerText('retry timeout value'));
    expect(result.value.citations).toEqual([]);
  });

  it('should treat a retrieval failure as no results', async () => {
    store.search.mockRejectedValue(new BackendUnavailableError('cloud', 'down'));

    const result = await pipeline().ask('retry timeout value');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.answer).toBe(noAnswerText('retry timeout value'));
    expect(result.value.warnings).toEqual(['Retrieval failed: cloud backend unavailable: down']);
  });

  it('should rerank when more results than rerank_top_k come back', async () => {
    hits = tokenHits();

    const result = await pipeline({ rerank_top_k: 2 }).ask('token refresh');

    expect(embedder.rerankCalls).toBe(3);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.results.map((r) => r.content)).toEqual(['token refresh flow', 'token expiry']);
    expect(result.value.answer).toBe('token refresh flow');
    expect(result.value.citations.map((c) => c.filePath)).toEqual(['docs/auth.md']);
    expect(result.value.stages.reranked).toBe(true);
  });

  it('should keep vector order when the reranker fails', async () => {
    hits = tokenHits();
    embedder.failRerank = true;

    const result = await pipeline({ rerank_top_k: 2 }).ask('token refresh');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.results.map((r) => r.content)).toEqual(['billing export', 'token refresh flow']);
    expect(result.value.answer).toBe('billing export');
    expect(result.value.warnings).toEqual([
      'Reranking failed: rerank model unavailable, falling back to vector scores',
    ]);
  });

  it('should skip reranking within rerank_top_k', async () => {
    hits = tokenHits();

    await pipeline().ask('token refresh');

    expect(embedder.rerankCalls).toBe(0);
  });

  it('should concatenate chunks when synthesis fails', async () => {
    synth.fail = true;
    hits = tokenHits();

    const result = await pipeline({ max_results: 2 }).ask('token refresh');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.answer).toBe('billing export\n\ntoken refresh flow');
    expect(result.value.stages.synthesized).toBe(false);
    expect(result.value.warnings).toEqual(['Synthesis failed, using concatenation: boom']);
  });

  it('should log the intent once per question', async () => {
    const debug = vi.fn();
    const logger = { ...silentLogger, debug };

    await new AskPipeline({ store, embedder, settings: {}, logger }).ask('token refresh');

    const intentLines = debug.mock.calls.filter(([message]) => String(message).startsWith('Query intent'));
    expect(intentLines).toHaveLength(1);
  });
});
