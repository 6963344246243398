export type { EmbeddingProvider, OllamaEmbeddingOptions } from './types.js';
export { LazyResource } from './lazy.js';
export { OllamaEmbeddingProvider, EmbeddingTimeoutError } from './ollama-provider.js';
