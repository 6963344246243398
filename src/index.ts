/**
 * hybrid-rag - Library Entry Point
 *
 * The CLI (`hrag`) covers day-to-day use:
 * ```bash
 * hrag index ./my-repo                 # Index docs and code
 * hrag search "token refresh"          # Hybrid search
 * hrag ask "List all payment flows"    # Answer with sources
 * ```
 *
 * This module exposes the same pieces for embedding in another service:
 * the hybrid point store, the indexer, the ask pipeline and the tool
 * registry an agent calls into.
 *
 * @example Serving tools to an agent
 * ```typescript
 * import { loadConfig, createHybridStore, createToolRegistry } from 'hybrid-rag';
 *
 * const config = loadConfig();
 * const { store, embedder } = createHybridStore(config);
 * const tools = createToolRegistry({ store, embedder, ask: config.hybrid_retrieval });
 *
 * const response = await tools.call('search', { query: 'token refresh', content_type: 'code' });
 * ```
 *
 * @example Indexing from a script
 * ```typescript
 * import { loadConfig, createHybridStore, indexRepository } from 'hybrid-rag';
 *
 * const { store } = createHybridStore(loadConfig());
 * const report = await indexRepository(store, { root: '/srv/repos/payments' });
 * ```
 *
 * @packageDocumentation
 */

export * from './config/index.js';
export * from './errors/index.js';
export * from './embeddings/index.js';
export * from './store/index.js';
export * from './search/index.js';
export * from './agent/index.js';

export {
  indexRepository,
  listRepositoryFiles,
  resolveTargets,
  scanRepository,
  chunkMarkdown,
  chunkCode,
  parseCode,
  createIgnoreFilter,
  DEFAULT_DOC_PATTERNS,
  DEFAULT_CODE_PATTERNS,
  DEFAULT_IGNORE_PATTERNS,
} from './indexer/index.js';
export type {
  ChunkingOptions,
  CodeElement,
  CollectionChoice,
  IndexRepositoryOptions,
  IndexRepositoryReport,
  IndexProgress,
  IndexFailure,
} from './indexer/index.js';

export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';
export { ok, err, attempt, errorMessage, type Result } from './utils/result.js';
export type { JsonValue, JsonObject } from './utils/json.js';
