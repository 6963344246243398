/**
 * Ask Command
 *
 * Answers a question from the indexed corpus with cited sources.
 *
 *   hrag ask "How does token refresh work?"
 *   hrag ask "List all payment flows" --context "checkout service"
 *   hrag ask "What is the retry policy?" --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openRuntime } from '../runtime.js';
import { AskPipeline } from '../../agent/ask-pipeline.js';
import { formatCitationsJSON } from '../../agent/citations.js';
import { formatResultsJSON } from '../../search/formatter.js';
import { CLIError } from '../../errors/index.js';

interface AskCommandOptions {
  context: string;
}

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question to answer')
    .description('Answer a question from the indexed documentation and code')
    .option('--context <text>', 'Extra text to narrow retrieval', '')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      if (!question.trim()) {
        throw new CLIError('Question cannot be empty', 'Provide a question, e.g.: hrag ask "How does auth work?"');
      }

      const { config, store, embedder } = openRuntime(ctx);
      const pipeline = new AskPipeline({
        store,
        embedder,
        settings: config.hybrid_retrieval,
        logger: ctx,
      });

      const result = await pipeline.ask(question.trim(), cmdOptions.context);
      if (!result.ok) {
        throw result.error;
      }
      const answer = result.value;
      ctx.debug(
        `Intent: ${answer.intent} (${answer.confidence.toFixed(2)}), ` +
          `expanded ${answer.stages.expanded}, reranked ${answer.stages.reranked}, ` +
          `synthesized ${answer.stages.synthesized}, ${answer.timing_ms}ms`
      );

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              question: answer.question,
              intent: answer.intent,
              confidence: answer.confidence,
              answer: answer.answer,
              citations: formatCitationsJSON(answer.citations),
              stages: answer.stages,
              warnings: answer.warnings,
              results: formatResultsJSON(answer.results),
              timing_ms: answer.timing_ms,
            },
            null,
            2
          )
        );
        return;
      }

      ctx.log(answer.text);
      if (answer.results.length === 0) {
        ctx.log('');
        ctx.log(chalk.dim('Check the repository has been indexed: hrag stats'));
      }
    });
}
