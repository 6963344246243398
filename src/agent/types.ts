/**
 * Ask Pipeline Types
 *
 * Settings, citations and the answer shape returned by the ask pipeline.
 */

import { z } from 'zod';
import type { QueryIntent } from '../search/types.js';
import type { SearchResult } from '../store/types.js';

// ============================================================================
// SETTINGS
// ============================================================================

/**
 * Retrieval sizes the pipeline runs with. Mirrors the
 * `[hybrid_retrieval]` section of config.toml.
 */
export const AskSettingsSchema = z.object({
  /** Candidates fetched by the initial hybrid search */
  search_top_k: z.number().int().min(1).max(100).default(20),
  /** Rerank only when more results than this came back; also the kept count */
  rerank_top_k: z.number().int().min(1).max(100).default(10),
  /** Results kept after section expansion, and the fallback dump size */
  max_results: z.number().int().min(1).max(1000).default(25),
});

export type AskSettings = z.infer<typeof AskSettingsSchema>;

// ============================================================================
// RESULT TYPES
// ============================================================================

/**
 * One cited source file. Numbered from 1 in answer order.
 */
export interface Citation {
  index: number;
  filePath: string;
  /** First line of the best chunk from this file */
  lineNumber: number;
  lineEnd: number;
  score: number;
  /** Programming language, or null for documentation */
  language: string | null;
}

/**
 * Which optional stages actually ran for a question.
 */
export interface AskStages {
  expanded: boolean;
  reranked: boolean;
  /** False when synthesis failed and raw chunks were concatenated */
  synthesized: boolean;
}

export interface AskAnswer {
  question: string;
  intent: QueryIntent;
  confidence: number;
  /** Synthesized body without header or sources */
  answer: string;
  /** Full answer text: header, body and sources */
  text: string;
  citations: Citation[];
  /** Chunks the answer was built from, best first */
  results: SearchResult[];
  stages: AskStages;
  /** Degradations met on the way (failed retrieval, rerank fallback, gaps) */
  warnings: string[];
  timing_ms: number;
}
