/**
 * Tool Command
 *
 * Calls a registered tool with a JSON input and prints the response
 * envelope, the same one an agent receives.
 *
 *   hrag tool --list
 *   hrag tool search '{"query": "token refresh", "content_type": "code"}'
 *   hrag tool delete_all '{"collection": "local", "confirm": true}'
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openRuntime } from '../runtime.js';
import { createToolRegistry } from '../../agent/tools/index.js';
import { CLIError } from '../../errors/index.js';

interface ToolCommandOptions {
  list: boolean;
}

export function parseToolInput(raw: string | undefined): unknown {
  if (raw === undefined || raw.trim() === '') {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CLIError(`Tool input is not valid JSON: ${message}`, `Quote the input, e.g.: hrag tool search '{"query": "auth"}'`);
  }
}

export function createToolCommand(getContext: () => CommandContext): Command {
  return new Command('tool')
    .argument('[name]', 'Tool to call')
    .argument('[input]', 'Tool input as a JSON object')
    .description('Call a tool from the agent tool registry')
    .option('--list', 'List available tools', false)
    .action(async (name: string | undefined, rawInput: string | undefined, cmdOptions: ToolCommandOptions) => {
      const ctx = getContext();
      const { config, store, embedder } = openRuntime(ctx);
      const registry = createToolRegistry({
        store,
        embedder,
        ask: config.hybrid_retrieval,
        indexing: {
          docPatterns: config.indexing.doc_patterns,
          codePatterns: config.indexing.code_patterns,
          ignorePatterns: config.indexing.ignore_patterns,
          chunking: { chunkSize: config.chunking.chunk_size, overlap: config.chunking.chunk_overlap },
        },
        logger: ctx,
      });

      if (cmdOptions.list || name === undefined) {
        const tools = registry.list().sort((a, b) => a.name.localeCompare(b.name));
        if (ctx.options.json) {
          console.log(JSON.stringify(tools, null, 2));
          return;
        }
        for (const tool of tools) {
          ctx.log(`  ${chalk.cyan(tool.name.padEnd(20))} ${tool.description}`);
        }
        return;
      }

      const input = parseToolInput(rawInput);
      const response = await registry.call(name, input);

      // The envelope is the output in both modes
      console.log(JSON.stringify(response, null, 2));
      if (!response.success) {
        process.exitCode = 1;
      }
    });
}
