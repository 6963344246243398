/**
 * Search Command
 *
 * Hybrid search (keyword + vector blend) over the indexed corpus.
 *
 *   hrag search "token refresh"
 *   hrag search "retry policy" --type code --language python -k 5
 *   hrag search "payment flows" --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openRuntime } from '../runtime.js';
import { parseTopK } from '../utils/options.js';
import { formatResults, formatResultsJSON } from '../../search/formatter.js';
import { equalityFilter } from '../../agent/tools/search-tools.js';
import { CLIError } from '../../errors/index.js';

interface SearchCommandOptions {
  topK: string;
  type: string;
  language?: string;
}

const DEFAULT_TOP_K = 10;
const CONTENT_TYPES = ['doc', 'code', 'all'];

function displayEmptyResults(ctx: CommandContext, query: string): void {
  ctx.log(chalk.yellow(`No results found for "${query}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Try different keywords or phrasing'));
  ctx.log(chalk.dim('  - Drop --type or --language filters'));
  ctx.log(chalk.dim('  - Check the repository has been indexed: hrag stats'));
}

export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Hybrid search across indexed documentation and code')
    .option('-k, --top-k <number>', 'Number of results to return', String(DEFAULT_TOP_K))
    .option('-t, --type <type>', 'Content category: doc, code or all', 'all')
    .option('-l, --language <language>', 'Only results in this language (e.g. python)')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      const trimmedQuery = query.trim();
      if (!trimmedQuery) {
        throw new CLIError('Search query cannot be empty', 'Provide a search term, e.g.: hrag search "authentication"');
      }
      if (!CONTENT_TYPES.includes(cmdOptions.type)) {
        throw new CLIError(`Invalid --type value: "${cmdOptions.type}"`, `Must be one of: ${CONTENT_TYPES.join(', ')}`);
      }
      const topK = parseTopK(cmdOptions.topK);
      ctx.debug(`Query: "${trimmedQuery}", top-k ${topK}, type ${cmdOptions.type}`);

      const { store } = openRuntime(ctx);
      const results = await store.search(trimmedQuery, topK, {
        filter: equalityFilter({ category: cmdOptions.type, language: cmdOptions.language }),
        category: cmdOptions.type === 'code' ? 'code' : 'doc',
      });
      ctx.debug(`Found ${results.length} results`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            { query: trimmedQuery, count: results.length, results: formatResultsJSON(results) },
            null,
            2
          )
        );
        return;
      }

      if (results.length === 0) {
        displayEmptyResults(ctx, trimmedQuery);
        return;
      }

      ctx.log(
        chalk.bold(`Found ${results.length} result${results.length === 1 ? '' : 's'}`) +
          chalk.dim(` for "${trimmedQuery}"`)
      );
      ctx.log('');
      ctx.log(formatResults(results, { showOrigin: store.secondaryEnabled, snippetLength: 200 }));
    });
}
