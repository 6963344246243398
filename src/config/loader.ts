/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.hrag)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Apply environment overrides
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath, expandHome } from './paths.js';
import { loadEnv, type EnvVars } from './env.js';
import { ConfigError } from '../errors/index.js';

export { getConfigPath } from './paths.js';

/**
 * Options for loading the configuration. Tests point `configPath` at a
 * temporary file.
 */
export interface LoadConfigOptions {
  createIfMissing?: boolean;
  configPath?: string;
  /** Environment overrides; defaults to loadEnv() */
  env?: EnvVars;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Merge a sparse user config over a complete one, section by section.
 */
export function mergeConfig(base: Config, user: PartialConfig): Config {
  const retrieval = user.hybrid_retrieval ?? {};
  return {
    embedding: { ...base.embedding, ...user.embedding },
    primary: { ...base.primary, ...user.primary },
    secondary: { ...base.secondary, ...user.secondary },
    hybrid_retrieval: {
      ...base.hybrid_retrieval,
      ...retrieval,
      hybrid_weights: {
        ...base.hybrid_retrieval.hybrid_weights,
        ...retrieval.hybrid_weights,
      },
    },
    chunking: { ...base.chunking, ...user.chunking },
    indexing: { ...base.indexing, ...user.indexing },
  };
}

/**
 * Environment values win over config.toml.
 */
export function applyEnvOverrides(config: Config, env: EnvVars): Config {
  return {
    ...config,
    embedding: { ...config.embedding, host: env.OLLAMA_HOST ?? config.embedding.host },
    primary: {
      ...config.primary,
      url: env.QDRANT_URL ?? config.primary.url,
      collection: env.QDRANT_COLLECTION ?? config.primary.collection,
    },
    secondary: {
      ...config.secondary,
      enabled: env.HRAG_SECONDARY_ENABLED ?? config.secondary.enabled,
      path: expandHome(config.secondary.path),
    },
  };
}

function parseToml(content: string, configPath: string): TOML.JsonMap {
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }
}

/**
 * Validate a parsed TOML document and merge it over the defaults.
 */
function resolveConfig(document: unknown, errorPrefix: string, hint: string): Config {
  const partial = PartialConfigSchema.safeParse(document);
  if (!partial.success) {
    throw new ConfigError(`${errorPrefix}:\n${formatIssues(partial.error.issues)}`, hint);
  }

  const merged = ConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(`${errorPrefix}:\n${formatIssues(merged.error.issues)}`, hint);
  }
  return merged.data;
}

/**
 * Load and parse the config file.
 * Returns the merged config (defaults + user overrides + environment).
 *
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { createIfMissing = true } = options;
  const configPath = options.configPath ?? getConfigPath();
  const env = options.env ?? loadEnv();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return applyEnvOverrides(DEFAULT_CONFIG, env);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  const config = resolveConfig(
    parseToml(content, configPath),
    'Invalid configuration',
    `Fix ${configPath} or delete it to restore defaults`
  );
  return applyEnvOverrides(config, env);
}

/**
 * Get a specific config value by dot-notation path.
 * Example: getConfigValue('hybrid_retrieval.search_top_k') => 20
 */
export function getConfigValue(key: string, options: LoadConfigOptions = {}): unknown {
  let current: unknown = loadConfig(options);
  for (const part of key.split('.')) {
    if (current === null || typeof current !== 'object' || !(part in current)) {
      return undefined;
    }
    current = Object.entries(current).find(([name]) => name === part)?.[1];
  }
  return current;
}

function isTable(value: TOML.AnyJson | undefined): value is TOML.JsonMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Parse a CLI string into a boolean, number or string.
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Set a config value by dot-notation path and write it back to the file.
 * The whole config is re-validated before anything is written.
 */
export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = options.configPath ?? getConfigPath();
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key', 'Run: hrag config list  to see available keys');
  }

  const document: TOML.JsonMap = fs.existsSync(configPath)
    ? parseToml(fs.readFileSync(configPath, 'utf-8'), configPath)
    : {};

  let current = document;
  for (const part of parts) {
    const next = current[part];
    if (isTable(next)) {
      current = next;
    } else {
      const table: TOML.JsonMap = {};
      current[part] = table;
      current = table;
    }
  }
  current[lastPart] = parseValue(value);

  resolveConfig(document, `Invalid value for '${key}'`, 'Run: hrag config list  to see current values and types');

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, TOML.stringify(document), 'utf-8');
}

/**
 * List all config values in a flat format, e.g. ['primary.url', 'http://…'].
 */
export function listConfig(options: LoadConfigOptions = {}): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  const flatten = (obj: object, prefix = ''): void => {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  };

  flatten(loadConfig(options));
  return entries;
}
