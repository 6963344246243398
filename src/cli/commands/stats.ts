/**
 * Stats Command
 *
 * Point counts per collection, with soft-deleted points counted separately.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openRuntime } from '../runtime.js';
import type { BackendStats } from '../../store/types.js';

function formatStats(name: string, location: string, stats: BackendStats | null): string[] {
  if (!stats) {
    return [`  ${chalk.cyan(name.padEnd(8))} ${chalk.dim('disabled')}`];
  }
  const live = stats.count - stats.deleted;
  return [
    `  ${chalk.cyan(name.padEnd(8))} ${chalk.dim(location)}`,
    `    ${chalk.dim('Chunks:')}   ${live.toLocaleString()}`,
    `    ${chalk.dim('Deleted:')}  ${stats.deleted.toLocaleString()}`,
  ];
}

export function createStatsCommand(getContext: () => CommandContext): Command {
  return new Command('stats')
    .description('Show point counts for each collection')
    .action(async () => {
      const ctx = getContext();
      const { config, store } = openRuntime(ctx);
      const stats = await store.collectionStats();

      if (ctx.options.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      ctx.log(chalk.bold('Collections:'));
      ctx.log('');
      for (const line of formatStats('cloud', `${config.primary.url} / ${config.primary.collection}`, stats.cloud)) {
        ctx.log(line);
      }
      for (const line of formatStats('local', config.secondary.path, stats.local)) {
        ctx.log(line);
      }
    });
}
