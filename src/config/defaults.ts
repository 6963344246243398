/**
 * Default Configuration Values
 *
 * Used when no config.toml exists (first run) and for every field a user's
 * config.toml leaves out. The loader merges user config ON TOP of these.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  // nomic-embed-text produces 768-dimensional vectors
  embedding: {
    host: 'http://localhost:11434',
    doc_model: 'nomic-embed-text',
    code_model: 'nomic-embed-text',
    rerank_model: 'nomic-embed-text',
    dimensions: 768,
    timeout_ms: 120000,
  },

  primary: {
    url: 'http://localhost:6333',
    collection: 'rag_docs',
    timeout_ms: 30000,
  },

  // The local fallback is opt-in
  secondary: {
    enabled: false,
    path: '~/.hrag/points.db',
    collection: 'rag_docs_local',
  },

  hybrid_retrieval: {
    search_top_k: 20,
    rerank_top_k: 10,
    max_results: 25,
    expansion_threshold: 10,
    hybrid_weights: {
      bm25: 0.3,
      vector: 0.7,
    },
  },

  chunking: {
    chunk_size: 1000,
    chunk_overlap: 100,
  },

  indexing: {
    doc_patterns: ['**/*.md'],
    code_patterns: ['**/*.py', '**/*.ts', '**/*.tsx', '**/*.js', '**/*.jsx'],
    ignore_patterns: [],
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.hrag/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# hybrid-rag configuration
# Location: ~/.hrag/config.toml
# Environment overrides: QDRANT_URL, QDRANT_API_KEY, QDRANT_COLLECTION,
# OLLAMA_HOST, HRAG_SECONDARY_ENABLED

[embedding]
host = "${DEFAULT_CONFIG.embedding.host}"
doc_model = "${DEFAULT_CONFIG.embedding.doc_model}"
code_model = "${DEFAULT_CONFIG.embedding.code_model}"
rerank_model = "${DEFAULT_CONFIG.embedding.rerank_model}"
# Must match the models above; changing it requires re-indexing
dimensions = ${DEFAULT_CONFIG.embedding.dimensions}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

[primary]
url = "${DEFAULT_CONFIG.primary.url}"
collection = "${DEFAULT_CONFIG.primary.collection}"
timeout_ms = ${DEFAULT_CONFIG.primary.timeout_ms}

[secondary]
enabled = ${DEFAULT_CONFIG.secondary.enabled}
path = "${DEFAULT_CONFIG.secondary.path}"
collection = "${DEFAULT_CONFIG.secondary.collection}"

[hybrid_retrieval]
search_top_k = ${DEFAULT_CONFIG.hybrid_retrieval.search_top_k}
rerank_top_k = ${DEFAULT_CONFIG.hybrid_retrieval.rerank_top_k}
max_results = ${DEFAULT_CONFIG.hybrid_retrieval.max_results}
expansion_threshold = ${DEFAULT_CONFIG.hybrid_retrieval.expansion_threshold}

# Must sum to 1.0; bm25 = 0 disables the keyword blend
[hybrid_retrieval.hybrid_weights]
bm25 = ${DEFAULT_CONFIG.hybrid_retrieval.hybrid_weights.bm25}
vector = ${DEFAULT_CONFIG.hybrid_retrieval.hybrid_weights.vector}

[chunking]
chunk_size = ${DEFAULT_CONFIG.chunking.chunk_size}
chunk_overlap = ${DEFAULT_CONFIG.chunking.chunk_overlap}

[indexing]
doc_patterns = ["**/*.md"]
code_patterns = ["**/*.py", "**/*.ts", "**/*.tsx", "**/*.js", "**/*.jsx"]
# Additional gitignore-style patterns, e.g. ["*.generated.ts", "fixtures/"]
ignore_patterns = []
`;
