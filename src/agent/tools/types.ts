/**
 * Tool-call boundary types.
 *
 * Every tool answers with the same envelope. Point ids leave as decimal
 * strings because JSON numbers cannot carry 63-bit integers exactly.
 */

import type { z } from 'zod';
import type { ToolError } from '../../errors/index.js';
import type { EmbeddingProvider } from '../../embeddings/types.js';
import type { ChunkingOptions } from '../../indexer/types.js';
import type { HybridPointStore } from '../../store/hybrid-store.js';
import type { Logger } from '../../utils/logger.js';
import type { AskSettings } from '../types.js';

export interface ToolMetadata {
  timing_ms: number;
  operation: string;
}

export interface ToolResponse<T = unknown> {
  success: boolean;
  data: T | null;
  metadata: ToolMetadata;
  errors: ToolError[];
}

/**
 * A tool before registration. `execute` receives input already validated
 * against `inputSchema`.
 */
export interface ToolDefinition<TSchema extends z.ZodTypeAny, TData> {
  name: string;
  description: string;
  inputSchema: TSchema;
  execute: (input: z.output<TSchema>) => Promise<TData>;
}

/**
 * A registered tool with its input type erased.
 */
export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  run: (input: unknown) => Promise<unknown>;
}

/**
 * Where index_repository and cleanup_deleted look for files when the
 * caller does not say.
 */
export interface IndexingDefaults {
  docPatterns: string[];
  codePatterns: string[];
  ignorePatterns: string[];
  chunking: ChunkingOptions;
}

export interface ToolDeps {
  store: HybridPointStore;
  embedder: EmbeddingProvider;
  ask?: Partial<AskSettings>;
  indexing?: Partial<IndexingDefaults>;
  logger?: Logger;
}
