/**
 * Ollama Embedding Provider
 *
 * Embeds documentation with `doc_model` and source code with `code_model`.
 * Ollama has no pairwise scorer, so rerank scores are the cosine
 * similarity of query and candidate under `rerank_model`.
 *
 * The client is created lazily; the first load also probes the doc model
 * once so a model of the wrong width is caught before any write.
 */

import { Ollama } from 'ollama';
import { BackendUnavailableError, DimensionMismatchError } from '../errors/index.js';
import { errorMessage } from '../utils/result.js';
import type { ContentCategory } from '../store/types.js';
import { cosineSimilarity } from '../store/vector.js';
import { LazyResource } from './lazy.js';
import type { EmbeddingProvider, OllamaEmbeddingOptions } from './types.js';

const PROBE_TEXT = 'dimension probe';

/**
 * Raised when the model server does not answer within `timeoutMs`.
 */
export class EmbeddingTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Embedding request timed out after ${timeoutMs}ms`);
    this.name = 'EmbeddingTimeoutError';
  }
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new EmbeddingTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;
  private readonly options: OllamaEmbeddingOptions;
  private readonly client: LazyResource<Ollama>;

  constructor(options: OllamaEmbeddingOptions) {
    this.options = options;
    this.dimensions = options.dimensions;
    this.client = new LazyResource(async () => {
      const client = new Ollama({ host: options.host });
      const [probe] = await this.request(client, options.docModel, [PROBE_TEXT]);
      this.checkWidth(probe, options.docModel);
      return client;
    });
  }

  private checkWidth(vector: number[] | undefined, model: string): number[] {
    if (!vector || vector.length !== this.dimensions) {
      const actual = vector?.length ?? 0;
      throw new DimensionMismatchError(
        `Model ${model} returned ${actual}-dimensional embeddings, expected ${this.dimensions}`,
        {
          details: { model, expected: this.dimensions, actual },
          hint: 'Set embedding.dimensions to the width of the configured model',
        }
      );
    }
    return vector;
  }

  private async request(client: Ollama, model: string, input: string[]): Promise<number[][]> {
    try {
      const response = await withTimeout(client.embed({ model, input }), this.options.timeoutMs);
      return response.embeddings;
    } catch (error) {
      throw new BackendUnavailableError('embedding', `${model}: ${errorMessage(error)}`, {
        details: { host: this.options.host, model },
        cause: error,
      });
    }
  }

  private async embedMany(model: string, input: string[]): Promise<number[][]> {
    const client = await this.client.get();
    const embeddings = await this.request(client, model, input);
    if (embeddings.length !== input.length) {
      throw new BackendUnavailableError(
        'embedding',
        `${model} returned ${embeddings.length} embeddings for ${input.length} inputs`
      );
    }
    return embeddings.map((vector) => this.checkWidth(vector, model));
  }

  async embed(text: string, category: ContentCategory): Promise<number[]> {
    const model = category === 'code' ? this.options.codeModel : this.options.docModel;
    const [vector] = await this.embedMany(model, [text]);
    return this.checkWidth(vector, model);
  }

  async rerankScore(query: string, candidate: string): Promise<number> {
    const [a, b] = await this.embedMany(this.options.rerankModel, [query, candidate]);
    return cosineSimilarity(a ?? [], b ?? []);
  }

  clear(): void {
    this.client.clear();
  }
}
