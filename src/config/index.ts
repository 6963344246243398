/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `hrag config` commands.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  HybridRetrievalConfigSchema,
  weightsSumToOne,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export {
  loadConfig,
  mergeConfig,
  applyEnvOverrides,
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigPath,
  type LoadConfigOptions,
} from './loader.js';

export { HRAG_DIR, CONFIG_PATH, POINTS_DB_PATH, getHragDir, expandHome } from './paths.js';

export { loadEnv, getEnv, hasQdrantApiKey, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
