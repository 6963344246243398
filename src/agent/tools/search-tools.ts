/**
 * Search Tools
 *
 * search, search_code and ask: the retrieval pipeline as seen by a
 * calling agent.
 */

import { z } from 'zod';
import { formatResultsJSON } from '../../search/formatter.js';
import { synthesizeAnswer } from '../../search/synthesizer.js';
import type { FieldCondition, PointFilter } from '../../store/filter.js';
import type { SearchResult } from '../../store/types.js';
import { silentLogger } from '../../utils/logger.js';
import { AskPipeline } from '../ask-pipeline.js';
import type { ToolRegistry } from './registry.js';
import type { ToolDeps } from './types.js';

const ALL = 'all';

/**
 * `must` conditions for every filter value other than "all".
 */
export function equalityFilter(fields: Record<string, string | undefined>): PointFilter | undefined {
  const must: FieldCondition[] = Object.entries(fields)
    .filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== ALL)
    .map(([key, value]) => ({ key, match: value }));
  return must.length > 0 ? { must } : undefined;
}

function resultsJSON(results: SearchResult[]) {
  return formatResultsJSON(results).map(({ id, ...rest }) => ({ vector_id: id, ...rest }));
}

export function registerSearchTools(registry: ToolRegistry, deps: ToolDeps): void {
  const { store, embedder } = deps;
  const logger = deps.logger ?? silentLogger;

  registry.register({
    name: 'search',
    description:
      'Hybrid search over indexed documentation and code, optionally narrowed to one ' +
      'content category or language.',
    inputSchema: z.object({
      query: z.string().min(1).describe('What to look for'),
      content_type: z.enum(['doc', 'code', ALL]).default(ALL),
      language: z.string().default(ALL).describe('e.g. "python", "typescript" or "all"'),
      top_k: z.number().int().min(1).default(10),
    }),
    execute: async (input) => {
      const results = await store.search(input.query, input.top_k, {
        filter: equalityFilter({ category: input.content_type, language: input.language }),
        category: input.content_type === 'code' ? 'code' : 'doc',
      });
      return {
        query: input.query,
        content_type: input.content_type,
        language: input.language,
        count: results.length,
        results: resultsJSON(results),
      };
    },
  });

  registry.register({
    name: 'search_code',
    description: 'Search indexed source code by language and element type; results are grouped by file.',
    inputSchema: z.object({
      query: z.string().min(1),
      language: z.string().default(ALL),
      code_type: z.enum(['function', 'class', 'method', 'module', ALL]).default(ALL),
      top_k: z.number().int().min(1).default(10),
    }),
    execute: async (input) => {
      const results = await store.search(input.query, input.top_k, {
        filter: equalityFilter({ category: 'code', language: input.language, code_type: input.code_type }),
        category: 'code',
      });
      return {
        query: input.query,
        count: results.length,
        text:
          results.length > 0
            ? synthesizeAnswer(results, 'code_search', input.query, logger)
            : `No code found matching: '${input.query}'`,
        results: resultsJSON(results),
      };
    },
  });

  registry.register({
    name: 'ask',
    description:
      'Answer a question from the indexed corpus: intent analysis, section expansion, ' +
      'reranking and synthesis, with cited sources.',
    inputSchema: z.object({
      question: z.string().describe('The question to answer'),
      context: z.string().default('').describe('Extra text appended to the retrieval query'),
    }),
    execute: async (input) => {
      const pipeline = new AskPipeline({ store, embedder, settings: deps.ask, logger });
      const result = await pipeline.ask(input.question, input.context);
      if (!result.ok) {
        throw result.error;
      }
      const answer = result.value;
      return {
        question: answer.question,
        intent: answer.intent,
        confidence: answer.confidence,
        answer: answer.answer,
        text: answer.text,
        citations: answer.citations,
        stages: answer.stages,
        warnings: answer.warnings,
        results: resultsJSON(answer.results),
      };
    },
  });
}
