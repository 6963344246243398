/**
 * Build a HybridPointStore and its embedder from configuration.
 *
 * The CLI and tool registry both start here.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const { store } = createHybridStore(config);
 * const results = await store.search('how are tokens refreshed?', 10);
 * ```
 */

import type { Config } from '../config/schema.js';
import { getEnv } from '../config/env.js';
import { expandHome } from '../config/paths.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import { OllamaEmbeddingProvider } from '../embeddings/ollama-provider.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { HybridPointStore } from './hybrid-store.js';
import { QdrantBackend } from './qdrant-backend.js';
import { SqliteBackend } from './sqlite-backend.js';

export interface HybridStoreRuntime {
  store: HybridPointStore;
  embedder: EmbeddingProvider;
}

export interface CreateHybridStoreOptions {
  logger?: Logger;
  /** Replaces the Ollama provider the config describes */
  embedder?: EmbeddingProvider;
}

export function createHybridStore(
  config: Config,
  options: CreateHybridStoreOptions = {}
): HybridStoreRuntime {
  const embedder =
    options.embedder ??
    new OllamaEmbeddingProvider({
      host: config.embedding.host,
      docModel: config.embedding.doc_model,
      codeModel: config.embedding.code_model,
      rerankModel: config.embedding.rerank_model,
      dimensions: config.embedding.dimensions,
      timeoutMs: config.embedding.timeout_ms,
    });

  const primary = new QdrantBackend({
    url: config.primary.url,
    apiKey: getEnv('QDRANT_API_KEY'),
    collection: config.primary.collection,
    dimensions: config.embedding.dimensions,
    timeoutMs: config.primary.timeout_ms,
  });

  const secondary = config.secondary.enabled
    ? new SqliteBackend({
        path: expandHome(config.secondary.path),
        collection: config.secondary.collection,
      })
    : null;

  const store = new HybridPointStore({
    primary,
    secondary,
    embedder,
    logger: options.logger ?? consoleLogger,
    weights: config.hybrid_retrieval.hybrid_weights,
    expansionThreshold: config.hybrid_retrieval.expansion_threshold,
  });

  return { store, embedder };
}
