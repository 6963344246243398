/**
 * Environment Variable Handler
 *
 * Loads connection settings from the environment, with .env support for
 * local development via dotenv. The Qdrant API key is never logged and never
 * included in error messages.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

/**
 * Every variable is optional; config.toml supplies the defaults.
 */
export const EnvSchema = z.object({
  QDRANT_URL: z.string().url().optional(),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION: z.string().min(1).optional(),
  OLLAMA_HOST: z.string().url().optional(),
  HRAG_SECONDARY_ENABLED: booleanFlag.optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Access through loadEnv(); tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * Invalid values are dropped one variable at a time rather than failing the
 * whole load.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    QDRANT_URL: process.env.QDRANT_URL || undefined,
    QDRANT_API_KEY: process.env.QDRANT_API_KEY || undefined,
    QDRANT_COLLECTION: process.env.QDRANT_COLLECTION || undefined,
    OLLAMA_HOST: process.env.OLLAMA_HOST || undefined,
    HRAG_SECONDARY_ENABLED: process.env.HRAG_SECONDARY_ENABLED?.toLowerCase() || undefined,
  };

  const result = EnvSchema.safeParse(raw);
  if (result.success) {
    _envCache = result.data;
    return _envCache;
  }

  const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
  const retry = EnvSchema.safeParse(
    Object.fromEntries(Object.entries(raw).filter(([key]) => !invalid.has(key)))
  );
  _envCache = retry.success ? retry.data : {};
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check whether a Qdrant API key is configured, without exposing it.
 */
export function hasQdrantApiKey(): boolean {
  return Boolean(loadEnv().QDRANT_API_KEY?.trim());
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
