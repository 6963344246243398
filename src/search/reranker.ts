/**
 * Reranker
 *
 * Re-scores a result list with the embedding provider's pairwise scorer
 * and keeps the top K. The scorer is never allowed to fail the caller:
 * when it throws, the list comes back in vector-score order instead.
 *
 * @example
 * ```typescript
 * const reranker = new Reranker({ embedder });
 * const top = await reranker.rerank('token refresh', results, 10);
 * ```
 */

import type { EmbeddingProvider } from '../embeddings/types.js';
import { RerankFailureError, ValidationError } from '../errors/index.js';
import type { SearchResult } from '../store/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/result.js';

export interface RerankerOptions {
  embedder: EmbeddingProvider;
  logger?: Logger;
}

function byScore(a: SearchResult, b: SearchResult): number {
  return b.score - a.score;
}

export class Reranker {
  private readonly embedder: EmbeddingProvider;
  private readonly logger: Logger;

  constructor(options: RerankerOptions) {
    this.embedder = options.embedder;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Score every candidate against the query.
   *
   * @throws RerankFailureError when the scorer fails on any candidate
   */
  async score(query: string, results: SearchResult[]): Promise<SearchResult[]> {
    const scored: SearchResult[] = [];
    for (const result of results) {
      try {
        scored.push({ ...result, score: await this.embedder.rerankScore(query, result.content) });
      } catch (error) {
        throw new RerankFailureError(`Reranking failed: ${errorMessage(error)}`, {
          cause: error,
          details: { candidates: results.length },
        });
      }
    }
    return scored.sort(byScore);
  }

  /**
   * Reorder by relevance and keep `topK`. A list already within `topK`
   * is returned as is, without scoring.
   */
  async rerank(query: string, results: SearchResult[], topK: number): Promise<SearchResult[]> {
    if (results.length <= topK) {
      return results;
    }

    try {
      const reranked = (await this.score(query, results)).slice(0, topK);
      this.logger.debug?.(`Reranked ${results.length} results, kept ${reranked.length}`);
      return reranked;
    } catch (error) {
      this.logger.warn(`${errorMessage(error)}, falling back to vector scores`);
      return [...results].sort(byScore).slice(0, topK);
    }
  }

  /**
   * Rerank several independent lists against one query. Empty lists stay
   * empty.
   *
   * @throws ValidationError when no lists are given
   */
  async batchRerank(
    query: string,
    lists: SearchResult[][],
    topK: number
  ): Promise<SearchResult[][]> {
    if (lists.length === 0) {
      throw new ValidationError('Cannot rerank an empty batch', ['lists: must not be empty']);
    }
    const reranked: SearchResult[][] = [];
    for (const results of lists) {
      reranked.push(results.length === 0 ? [] : await this.rerank(query, results, topK));
    }
    return reranked;
  }

  /** Drop the scorer's cached model handles. */
  clear(): void {
    this.embedder.clear();
  }
}
