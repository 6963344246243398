import { describe, it, expect } from 'vitest';
import { blendScores, bm25Scores, minMaxNormalize, tokenize } from '../bm25.js';

describe('tokenize', () => {
  it('lowercases and splits on punctuation', () => {
    expect(tokenize('Auth-Flow: retry_policy v2!')).toEqual(['auth', 'flow', 'retry_policy', 'v2']);
  });
});

describe('bm25Scores', () => {
  it('scores documents without query terms as zero', () => {
    const scores = bm25Scores('payment', ['payment retry', 'auth login']);
    expect(scores[0]).toBeGreaterThan(0);
    expect(scores[1]).toBe(0);
  });

  it('favours the shorter of two documents with one occurrence', () => {
    const [short, long] = bm25Scores('token', [
      'token refresh',
      'token refresh happens after the session expires and the client retries',
    ]);
    expect(short).toBeGreaterThan(long ?? 0);
  });

  it('returns zeros for an empty query', () => {
    expect(bm25Scores('  ', ['a', 'b'])).toEqual([0, 0]);
  });
});

describe('minMaxNormalize', () => {
  it('maps to [0, 1]', () => {
    expect(minMaxNormalize([2, 4, 6])).toEqual([0, 0.5, 1]);
  });

  it('maps a flat positive list to ones and a flat zero list to zeros', () => {
    expect(minMaxNormalize([3, 3])).toEqual([1, 1]);
    expect(minMaxNormalize([0, 0])).toEqual([0, 0]);
  });
});

describe('blendScores', () => {
  const candidates = [
    { content: 'general overview of the system', score: 0.9 },
    { content: 'payment retry policy', score: 0.8 },
  ];

  it('keeps vector order with a zero keyword weight', () => {
    expect(blendScores('payment', candidates, { bm25: 0, vector: 1 })).toBe(candidates);
  });

  it('lets keyword matches overtake a close vector score', () => {
    const blended = blendScores('payment', candidates, { bm25: 0.3, vector: 0.7 });

    expect(blended[0]?.content).toBe('payment retry policy');
    expect(blended[0]?.score).toBeCloseTo(0.7 * 0.8 + 0.3 * 1);
    expect(blended[1]?.score).toBeCloseTo(0.7 * 0.9);
  });
});
