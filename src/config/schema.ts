/**
 * Configuration Schema
 *
 * Defines the shape of ~/.hrag/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Embedding models served by an Ollama host.
 * `doc` and `code` texts are embedded with different models.
 */
export const EmbeddingConfigSchema = z.object({
  host: z.string().url().describe('Ollama host URL'),
  doc_model: z.string().min(1).describe('Model for documentation text'),
  code_model: z.string().min(1).describe('Model for source code'),
  rerank_model: z.string().min(1).describe('Model used to score (query, candidate) pairs'),
  dimensions: z.number().int().min(1).max(8192).describe('Vector width of the embedding models'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout in milliseconds for embedding requests'),
});

/**
 * Primary ("cloud") backend: a Qdrant server.
 */
export const PrimaryBackendConfigSchema = z.object({
  url: z.string().url().describe('Qdrant server URL'),
  collection: z.string().min(1).describe('Collection name'),
  timeout_ms: z.number().int().min(100).max(600000).describe('Request timeout in milliseconds'),
});

/**
 * Secondary ("local") backend: a SQLite file, disabled by default.
 */
export const SecondaryBackendConfigSchema = z.object({
  enabled: z.boolean().describe('Whether the local fallback backend is used'),
  path: z.string().min(1).describe('SQLite database path'),
  collection: z.string().min(1).describe('Logical collection name inside the database'),
});

export const HybridWeightsSchema = z.object({
  bm25: z.number().min(0).max(1),
  vector: z.number().min(0).max(1),
});

/**
 * Retrieval pipeline sizes and the keyword/vector score blend.
 */
export const HybridRetrievalConfigSchema = z.object({
  search_top_k: z.number().int().min(1).max(100).describe('Initial retrieval count'),
  rerank_top_k: z.number().int().min(1).max(100).describe('Rerank when more results than this'),
  max_results: z.number().int().min(1).max(1000).describe('Results kept after section expansion'),
  expansion_threshold: z
    .number()
    .int()
    .min(0)
    .describe('Consult the secondary backend when a section yields fewer chunks than this'),
  hybrid_weights: HybridWeightsSchema,
});

export const ChunkingConfigSchema = z.object({
  chunk_size: z.number().int().min(100).max(100000),
  chunk_overlap: z.number().int().min(0).max(10000),
});

export const IndexingConfigSchema = z.object({
  doc_patterns: z.array(z.string()),
  code_patterns: z.array(z.string()),
  ignore_patterns: z
    .array(z.string())
    .describe('Additional gitignore-style patterns to ignore during indexing'),
});

/**
 * True when the two weights sum to 1 within 0.01.
 */
export function weightsSumToOne(weights: { bm25: number; vector: number }): boolean {
  return Math.abs(weights.bm25 + weights.vector - 1) <= 0.01;
}

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z
  .object({
    embedding: EmbeddingConfigSchema,
    primary: PrimaryBackendConfigSchema,
    secondary: SecondaryBackendConfigSchema,
    hybrid_retrieval: HybridRetrievalConfigSchema,
    chunking: ChunkingConfigSchema,
    indexing: IndexingConfigSchema,
  })
  .superRefine((config, ctx) => {
    const weights = config.hybrid_retrieval.hybrid_weights;
    if (!weightsSumToOne(weights)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['hybrid_retrieval', 'hybrid_weights'],
        message: `Weights must sum to 1.0, got ${weights.bm25 + weights.vector}`,
      });
    }
    if (config.chunking.chunk_overlap >= config.chunking.chunk_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunking', 'chunk_overlap'],
        message: 'chunk_overlap must be smaller than chunk_size',
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults.
 * Every field becomes optional, allowing sparse config files.
 */
export const PartialConfigSchema = z
  .object({
    embedding: EmbeddingConfigSchema.partial(),
    primary: PrimaryBackendConfigSchema.partial(),
    secondary: SecondaryBackendConfigSchema.partial(),
    hybrid_retrieval: HybridRetrievalConfigSchema.extend({
      hybrid_weights: HybridWeightsSchema.partial(),
    }).partial(),
    chunking: ChunkingConfigSchema.partial(),
    indexing: IndexingConfigSchema.partial(),
  })
  .partial();

export type PartialConfig = z.infer<typeof PartialConfigSchema>;
