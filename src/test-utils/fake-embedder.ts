/**
 * Deterministic embedder for tests.
 *
 * Each distinct lowercase token gets its own dimension the first time it is
 * seen, so texts sharing words have positive cosine similarity and texts
 * with no words in common score 0.
 */

import { BackendUnavailableError } from '../errors/index.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import type { ContentCategory } from '../store/types.js';
import { cosineSimilarity } from '../store/vector.js';

export class FakeEmbedder implements EmbeddingProvider {
  readonly dimensions: number;

  /** Texts passed to embed(), in call order */
  readonly embedded: Array<{ text: string; category: ContentCategory }> = [];
  rerankCalls = 0;
  clearCalls = 0;

  failEmbed = false;
  failRerank = false;

  private readonly vocabulary = new Map<string, number>();

  constructor(dimensions = 64) {
    this.dimensions = dimensions;
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().split(/[^a-z0-9]+/)) {
      if (token.length === 0) continue;
      let slot = this.vocabulary.get(token);
      if (slot === undefined) {
        slot = this.vocabulary.size % this.dimensions;
        this.vocabulary.set(token, slot);
      }
      vector[slot] = (vector[slot] ?? 0) + 1;
    }
    return vector;
  }

  async embed(text: string, category: ContentCategory): Promise<number[]> {
    if (this.failEmbed) {
      throw new BackendUnavailableError('embedding', 'fake embedder offline');
    }
    this.embedded.push({ text, category });
    return this.vectorFor(text);
  }

  async rerankScore(query: string, candidate: string): Promise<number> {
    this.rerankCalls++;
    if (this.failRerank) {
      throw new Error('rerank model unavailable');
    }
    return cosineSimilarity(this.vectorFor(query), this.vectorFor(candidate));
  }

  clear(): void {
    this.clearCalls++;
  }
}
