/**
 * Ask Pipeline
 *
 * Answers a question from the indexed corpus:
 *
 * ```
 * question
 *   │
 *   ├── analyzeQuery          intent + retrieval hints
 *   ├── searchWithExpansion   (needsExpansion)  or plain hybrid search
 *   ├── Reranker.rerank       (needsReranking and more than rerank_top_k hits)
 *   ├── synthesizeAnswer      falls back to concatenating the top chunks
 *   └── collectCitations      up to 5 distinct files
 * ```
 *
 * Only an empty question is an error. Every later stage degrades instead:
 * a retrieval failure reads as "nothing found", a failed rerank keeps the
 * vector order, a failed synthesis returns the raw chunks.
 *
 * @example
 * ```typescript
 * const pipeline = new AskPipeline({ store, embedder, settings: config.hybrid_retrieval });
 * const result = await pipeline.ask('List all payment flows');
 * if (result.ok) console.log(result.value.text);
 * ```
 */

import type { EmbeddingProvider } from '../embeddings/types.js';
import { ValidationError } from '../errors/index.js';
import { analyzeQuery } from '../search/query-analyzer.js';
import { Reranker } from '../search/reranker.js';
import { synthesizeAnswer } from '../search/synthesizer.js';
import type { HybridPointStore } from '../store/hybrid-store.js';
import type { SearchResult } from '../store/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { err, errorMessage, ok, type Result } from '../utils/result.js';
import { collectCitations, formatCitations } from './citations.js';
import { AskSettingsSchema, type AskAnswer, type AskSettings, type AskStages, type Citation } from './types.js';

/** The part of the store the pipeline reads through */
export type AskRetriever = Pick<HybridPointStore, 'search' | 'searchWithExpansion'>;

export interface AskPipelineOptions {
  store: AskRetriever;
  /** Scores (query, candidate) pairs for reranking */
  embedder: EmbeddingProvider;
  settings?: Partial<AskSettings>;
  logger?: Logger;
}

export function noAnswerText(question: string): string {
  return `I couldn't find relevant information to answer: '${question}'. Please try rephrasing your question.`;
}

/**
 * Header, body and a sources block.
 */
export function formatAnswerText(question: string, body: string, citations: Citation[]): string {
  const sections = [`**Answer to: ${question}**`, body];
  if (citations.length > 0) {
    sections.push('---', `**Sources:**\n${formatCitations(citations, { style: 'minimal' })}`);
  }
  return sections.join('\n\n');
}

export class AskPipeline {
  private readonly store: AskRetriever;
  private readonly embedder: EmbeddingProvider;
  private readonly settings: AskSettings;
  private readonly logger: Logger;

  constructor(options: AskPipelineOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.settings = AskSettingsSchema.parse(options.settings ?? {});
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Answer `question`, optionally narrowed by extra `context` text that is
   * appended to the search query.
   */
  async ask(question: string, context = ''): Promise<Result<AskAnswer, ValidationError>> {
    const started = Date.now();
    const query = `${question} ${context}`.trim();
    if (query.length === 0) {
      return err(new ValidationError('Question cannot be empty', ['question: must not be empty']));
    }

    const warnings: string[] = [];
    const log: Logger = {
      ...this.logger,
      warn: (message) => {
        warnings.push(message);
        this.logger.warn(message);
      },
    };

    const analysis = analyzeQuery(query, log);

    const stages: AskStages = { expanded: false, reranked: false, synthesized: false };
    const { search_top_k, rerank_top_k, max_results } = this.settings;

    let results: SearchResult[] = [];
    try {
      if (analysis.needsExpansion) {
        results = await this.store.searchWithExpansion(query, { topK: search_top_k, limit: max_results });
        stages.expanded = true;
      } else {
        results = await this.store.search(query, search_top_k);
      }
    } catch (error) {
      log.warn(`Retrieval failed: ${errorMessage(error)}`);
    }

    const answer = (body: string, used: SearchResult[], citations: Citation[]): AskAnswer => ({
      question,
      intent: analysis.intent,
      confidence: analysis.confidence,
      answer: body,
      text: used.length > 0 ? formatAnswerText(question, body, citations) : body,
      citations,
      results: used,
      stages,
      warnings,
      timing_ms: Date.now() - started,
    });

    if (results.length === 0) {
      return ok(answer(noAnswerText(question), [], []));
    }

    if (analysis.needsReranking && results.length > rerank_top_k) {
      // Reranker falls back to vector order on its own failures
      const reranker = new Reranker({ embedder: this.embedder, logger: log });
      results = await reranker.rerank(query, results, rerank_top_k);
      stages.reranked = true;
    }

    let body: string;
    try {
      body = synthesizeAnswer(results, analysis.intent, question, log);
      stages.synthesized = true;
    } catch (error) {
      log.warn(`Synthesis failed, using concatenation: ${errorMessage(error)}`);
      body = results
        .slice(0, max_results)
        .map((result) => result.content)
        .join('\n\n');
    }

    const citations = collectCitations(results);
    log.info?.(`Answered with ${results.length} chunks, intent=${analysis.intent}`);
    return ok(answer(body, results, citations));
  }
}
