/**
 * Search Module
 *
 * Query intent classification, reranking, answer synthesis and result
 * formatting. Retrieval itself lives in the hybrid point store.
 *
 * @example
 * ```typescript
 * import { analyzeQuery, Reranker, synthesizeAnswer } from './search/index.js';
 *
 * const analysis = analyzeQuery(question);
 * const results = await store.searchWithExpansion(question, { topK: 20, limit: 25 });
 * const top = await new Reranker({ embedder }).rerank(question, results, 10);
 * const answer = synthesizeAnswer(top, analysis.intent, question);
 * ```
 *
 * @packageDocumentation
 */

export { QUERY_INTENTS, type QueryIntent, type QueryAnalysis, type FormatOptions, type FormattedResultJSON } from './types.js';
export { analyzeQuery } from './query-analyzer.js';
export { Reranker, type RerankerOptions } from './reranker.js';
export { synthesizeAnswer, OVERLAP_WINDOW } from './synthesizer.js';
export {
  formatScore,
  truncateSnippet,
  formatLineRange,
  formatResult,
  formatResults,
  formatResultJSON,
  formatResultsJSON,
} from './formatter.js';
