/**
 * Search Module Types
 */

import type { ContentCategory } from '../store/types.js';

export const QUERY_INTENTS = [
  'enumeration',
  'explanation',
  'code_search',
  'comparison',
  'factual',
] as const;

/**
 * What a question is after. Drives retrieval (expansion, reranking) and
 * how the answer is put together.
 */
export type QueryIntent = (typeof QUERY_INTENTS)[number];

export interface QueryAnalysis {
  intent: QueryIntent;
  /** 0-1, how sure the classifier is */
  confidence: number;
  /** Phrases of the query that triggered the intent */
  keywords: string[];
  /** Content categories worth searching, most useful first */
  contentTypes: ContentCategory[];
  /** Widen hits to their whole section */
  needsExpansion: boolean;
  needsReranking: boolean;
}

/**
 * Options for formatting search results for display.
 */
export interface FormatOptions {
  /** Maximum snippet length in characters (default: 200) */
  snippetLength?: number;
  /** Prefix each result with the backend it came from (default: false) */
  showOrigin?: boolean;
  /** Show relevance score (default: true) */
  showScore?: boolean;
  /** Show line numbers in file:start-end format (default: true) */
  showLineNumbers?: boolean;
}

/**
 * JSON-serializable search result (`--json` output and tool responses).
 */
export interface FormattedResultJSON {
  /** Decimal point id */
  id: string;
  score: number;
  filePath: string;
  lineStart: number;
  lineEnd: number;
  section: string;
  content: string;
  /** null for documentation */
  language: string | null;
  contentType: string;
  origin: 'cloud' | 'local';
}
