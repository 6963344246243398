/**
 * Embedding Types
 */

import type { ContentCategory } from '../store/types.js';

/**
 * Maps text to fixed-width vectors and scores (query, candidate) pairs.
 *
 * Both methods may throw BackendUnavailableError when the model server is
 * unreachable. Callers on the read path treat that as recoverable.
 */
export interface EmbeddingProvider {
  /** Vector width every embedding has */
  readonly dimensions: number;

  embed(text: string, category: ContentCategory): Promise<number[]>;

  /** Higher is more relevant. */
  rerankScore(query: string, candidate: string): Promise<number>;

  /** Drop cached model handles; the next call loads them again. */
  clear(): void;
}

/**
 * Settings for the Ollama-backed provider, mirroring `[embedding]`.
 */
export interface OllamaEmbeddingOptions {
  host: string;
  docModel: string;
  codeModel: string;
  rerankModel: string;
  dimensions: number;
  timeoutMs: number;
}
