/**
 * Purge Command
 *
 * Physically removes soft-deleted chunks. Irreversible, so it only reports
 * what it would remove unless --confirm is given.
 *
 *   hrag purge
 *   hrag purge --file docs/old-guide.md --confirm
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openRuntime } from '../runtime.js';
import { parseBackendTarget } from '../utils/options.js';

interface PurgeCommandOptions {
  file?: string;
  confirm: boolean;
  collection: string;
}

export function createPurgeCommand(getContext: () => CommandContext): Command {
  return new Command('purge')
    .description('Permanently delete soft-deleted chunks')
    .option('-f, --file <path>', 'Only chunks of this file (repository-relative)')
    .option('--confirm', 'Actually delete (default only reports)', false)
    .option('-c, --collection <name>', 'Collection: cloud or local', 'cloud')
    .action(async (cmdOptions: PurgeCommandOptions) => {
      const ctx = getContext();
      const target = parseBackendTarget(cmdOptions.collection);

      const { store } = openRuntime(ctx);
      const report = await store.permanentDelete(target, {
        confirm: cmdOptions.confirm,
        filePath: cmdOptions.file,
      });

      if (ctx.options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      if (report.found === 0) {
        ctx.log(`No deleted chunks to purge in ${chalk.cyan(target)}`);
        return;
      }

      if (!report.confirmed) {
        ctx.log(chalk.yellow(`${report.found} deleted chunks from ${report.files.length} files would be removed permanently.`));
        ctx.log(`Run with ${chalk.cyan('--confirm')} to proceed.`);
        return;
      }

      ctx.log(`${chalk.green('✓')} Permanently deleted ${report.deleted} chunks from ${report.files.length} files`);
    });
}
