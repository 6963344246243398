/**
 * Recover Command
 *
 * Clears the soft-delete flag, for every chunk or for one file.
 *
 *   hrag recover
 *   hrag recover --file docs/old-guide.md
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openRuntime } from '../runtime.js';
import { parseBackendTarget } from '../utils/options.js';

interface RecoverCommandOptions {
  file?: string;
  collection: string;
}

export function createRecoverCommand(getContext: () => CommandContext): Command {
  return new Command('recover')
    .description('Restore soft-deleted chunks')
    .option('-f, --file <path>', 'Only chunks of this file (repository-relative)')
    .option('-c, --collection <name>', 'Collection: cloud or local', 'cloud')
    .action(async (cmdOptions: RecoverCommandOptions) => {
      const ctx = getContext();
      const target = parseBackendTarget(cmdOptions.collection);

      const { store } = openRuntime(ctx);
      const report = await store.recover(target, { filePath: cmdOptions.file });

      if (ctx.options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      const scope = cmdOptions.file ? ` of ${cmdOptions.file}` : '';
      if (report.found === 0) {
        ctx.log(`No deleted chunks${scope} in ${chalk.cyan(target)}`);
        return;
      }

      ctx.log(`${chalk.green('✓')} Recovered ${report.recovered} of ${report.found} chunks${scope}`);
      if (report.failed > 0) {
        ctx.warn(`${report.failed} chunks could not be recovered`);
        process.exitCode = 1;
      }
    });
}
