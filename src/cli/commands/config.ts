/**
 * Config Command
 *
 * Manages ~/.hrag/config.toml:
 *   hrag config get <key>          - Get a specific value
 *   hrag config set <key> <value>  - Set a value (validated before writing)
 *   hrag config list               - Show all configuration
 *   hrag config env                - Show environment overrides
 *   hrag config path               - Show config file location
 *   hrag config reset --force      - Restore the template
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, unlinkSync } from 'node:fs';
import {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigPath,
} from '../../config/loader.js';
import { loadEnv, type EnvVars } from '../../config/env.js';
import type { CommandContext } from '../types.js';

/** Variables whose values are never printed */
const SECRET_VARIABLES: ReadonlySet<keyof EnvVars> = new Set(['QDRANT_API_KEY']);

const ENV_TARGETS: Record<keyof EnvVars, string> = {
  QDRANT_URL: 'primary.url',
  QDRANT_API_KEY: '(api key)',
  QDRANT_COLLECTION: 'primary.collection',
  OLLAMA_HOST: 'embedding.host',
  HRAG_SECONDARY_ENABLED: 'secondary.enabled',
};

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., hrag config get embedding.doc_model)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('hrag config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value }));
        } else {
          ctx.log(formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., hrag config set hybrid_retrieval.search_top_k 30)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
        } else {
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values (environment overrides applied)')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold('Configuration:'));
        let currentSection = '';
        for (const [key, value] of entries) {
          const section = key.split('.')[0] ?? '';
          if (section !== currentSection) {
            ctx.log('');
            ctx.log(chalk.dim(`[${section}]`));
            currentSection = section;
          }
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('env')
    .description('Show which environment variables override the config file')
    .action(() => {
      const ctx = getContext();
      const env = loadEnv();
      const rows = describeEnv(env);

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(rows.map((row) => [row.name, row.value])), null, 2));
        return;
      }

      for (const row of rows) {
        const value = row.value === null ? chalk.dim('not set') : chalk.yellow(row.value);
        ctx.log(`  ${chalk.cyan(row.name.padEnd(24))} ${value}  ${chalk.dim(`→ ${row.target}`)}`);
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = getConfigPath();
        if (existsSync(configPath)) {
          unlinkSync(configPath);
        }
        // Rewrites the commented template
        loadConfig({ createIfMissing: true });

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, message: 'Configuration reset to defaults' }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

export interface EnvRow {
  name: keyof EnvVars;
  /** Printable value; secrets read "(set)" and unset variables null */
  value: string | null;
  target: string;
}

export function describeEnv(env: EnvVars): EnvRow[] {
  const names = Object.keys(ENV_TARGETS).filter((name): name is keyof EnvVars => name in ENV_TARGETS);
  return names.map((name) => {
    const raw = env[name];
    let value: string | null = null;
    if (raw !== undefined) {
      value = SECRET_VARIABLES.has(name) ? '(set)' : String(raw);
    }
    return { name, value, target: ENV_TARGETS[name] };
  });
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }

  process.exitCode = 1;
}
