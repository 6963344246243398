/**
 * Cleanup Command
 *
 * Soft-deletes chunks whose source file no longer exists in the repository.
 * Previews by default; --commit applies the change.
 *
 *   hrag cleanup .                 Show what would be removed
 *   hrag cleanup . --commit        Mark those chunks as deleted
 *   hrag cleanup . -c local        Check the local collection instead
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openRuntime } from '../runtime.js';
import { parseBackendTarget } from '../utils/options.js';
import { listRepositoryFiles } from '../../indexer/repository.js';

interface CleanupCommandOptions {
  commit: boolean;
  collection: string;
}

const MAX_LISTED_FILES = 20;

export function createCleanupCommand(getContext: () => CommandContext): Command {
  return new Command('cleanup')
    .argument('<path>', 'Repository whose files are still current')
    .description('Soft-delete chunks of files that no longer exist')
    .option('--commit', 'Apply the changes (default is a dry run)', false)
    .option('-c, --collection <name>', 'Collection to clean: cloud or local', 'cloud')
    .action(async (pathArg: string, cmdOptions: CleanupCommandOptions) => {
      const ctx = getContext();
      const target = parseBackendTarget(cmdOptions.collection);
      const root = resolve(pathArg);

      const { config, store } = openRuntime(ctx);
      const files = await listRepositoryFiles(root, {
        docPatterns: config.indexing.doc_patterns,
        codePatterns: config.indexing.code_patterns,
        ignorePatterns: config.indexing.ignore_patterns,
      });
      const existing = [...files.docs, ...files.code];
      ctx.debug(`${existing.length} files still exist under ${root}`);

      const report = await store.cleanupDeletedFiles(existing, target, !cmdOptions.commit);

      if (ctx.options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      if (report.orphaned === 0) {
        ctx.log(`${chalk.green('✓')} No chunks of deleted files in ${chalk.cyan(target)} (${report.scanned} checked)`);
        return;
      }

      const verb = report.dryRun ? 'Would remove' : 'Removed';
      const count = report.dryRun ? report.orphaned : report.marked;
      ctx.log(chalk.bold(`${verb} ${count} chunks from ${report.files.length} deleted files in ${target}:`));
      for (const file of report.files.slice(0, MAX_LISTED_FILES)) {
        ctx.log(`  ${chalk.dim('-')} ${file}`);
      }
      if (report.files.length > MAX_LISTED_FILES) {
        ctx.log(chalk.dim(`  ... and ${report.files.length - MAX_LISTED_FILES} more`));
      }

      if (report.failed > 0) {
        ctx.warn(`${report.failed} chunks could not be marked`);
        process.exitCode = 1;
      }

      if (report.dryRun) {
        ctx.log('');
        ctx.log(`Run with ${chalk.cyan('--commit')} to apply.`);
      }
    });
}
