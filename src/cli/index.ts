#!/usr/bin/env node
/**
 * hybrid-rag CLI entry point
 *
 * Sets up Commander.js with the global options and registers every
 * subcommand of `hrag`.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createCleanupCommand } from './commands/cleanup.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { createPurgeCommand } from './commands/purge.js';
import { createRecoverCommand } from './commands/recover.js';
import { createSearchCommand } from './commands/search.js';
import { createStatsCommand } from './commands/stats.js';
import { createToolCommand } from './commands/tool.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

const VERSION = process.env.HRAG_VERSION ?? '0.1.0';

const program = new Command();

program
  .name('hrag')
  .description('Hybrid retrieval over documentation and code, indexed incrementally')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('hrag index ./my-repo')}                    Index docs and code
  ${chalk.cyan('hrag search "token refresh" --type code')}  Hybrid search
  ${chalk.cyan('hrag ask "List all payment flows"')}        Answer with sources
  ${chalk.cyan('hrag cleanup ./my-repo --commit')}         Drop chunks of deleted files
  ${chalk.cyan('hrag stats')}                              Point counts per collection
  ${chalk.cyan('hrag config set secondary.enabled true')}  Turn on the local collection
`);

/**
 * Logging utilities handed to every command. stdout carries command output
 * only; warnings and errors go to stderr.
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Commander stores global options on the root program after parsing.
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<GlobalOptions>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createIndexCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createCleanupCommand(getContext));
program.addCommand(createRecoverCommand(getContext));
program.addCommand(createPurgeCommand(getContext));
program.addCommand(createStatsCommand(getContext));
program.addCommand(createConfigCommand(getContext));
program.addCommand(createToolCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: hrag --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catches errors that escape every try/catch
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
