/**
 * Index Command
 *
 * Indexes (or refreshes) a repository into the configured collections.
 *
 * Usage:
 *   hrag index <path>                    Index docs and code into cloud
 *   hrag index . --collection both       Also write the local collection
 *   hrag index . --no-code               Documentation only
 *   hrag index . --json                  Output progress as NDJSON
 *
 * Re-running is cheap: a chunk whose content at the same file and start
 * line is unchanged is skipped, and chunks of files that disappeared are
 * soft-deleted.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { existsSync, statSync } from 'node:fs';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { parseCollectionChoice } from '../utils/options.js';
import { openRuntime } from '../runtime.js';
import { indexRepository, resolveTargets } from '../../indexer/index.js';
import { CLIError } from '../../errors/index.js';

interface IndexCommandOptions {
  collection: string;
  docs: boolean;
  code: boolean;
}

export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .argument('<path>', 'Path to the repository to index')
    .description('Index a repository, re-embedding only what changed')
    .option('-c, --collection <name>', 'Target collection: cloud, local or both', 'cloud')
    .option('--no-docs', 'Skip documentation files')
    .option('--no-code', 'Skip source code files')
    .action(async (pathArg: string, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();

      const root = resolve(pathArg);
      if (!existsSync(root)) {
        throw new CLIError(`Path does not exist: ${root}`, 'Check the path and try again', 3);
      }
      if (!statSync(root).isDirectory()) {
        throw new CLIError(`Not a directory: ${root}`, 'Provide a path to a repository directory');
      }
      if (!cmdOptions.docs && !cmdOptions.code) {
        throw new CLIError('Nothing to index', 'Drop --no-docs or --no-code');
      }

      const collection = parseCollectionChoice(cmdOptions.collection);
      const { config, store } = openRuntime(ctx);
      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });
      const log = { ...ctx, warn: (message: string) => reporter.warn(message) };

      // Resolved up front so a disabled local collection fails before the spinner starts
      const targets = resolveTargets(collection, store.secondaryEnabled, log);
      ctx.debug(`Targets: ${targets.join(', ')}`);

      const started = performance.now();
      reporter.start(root, targets);

      const report = await indexRepository(
        store,
        {
          root,
          indexDocs: cmdOptions.docs,
          indexCode: cmdOptions.code,
          collection: targets.length === 2 ? 'both' : targets[0],
          docPatterns: config.indexing.doc_patterns,
          codePatterns: config.indexing.code_patterns,
          ignorePatterns: config.indexing.ignore_patterns,
          chunking: {
            chunkSize: config.chunking.chunk_size,
            overlap: config.chunking.chunk_overlap,
          },
          onFile: (event) => reporter.file(event),
        },
        log
      );

      reporter.showSummary(report, Math.round(performance.now() - started));

      if (report.errors > 0) {
        process.exitCode = 1;
      }
    });
}
