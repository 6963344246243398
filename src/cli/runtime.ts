/**
 * Opens the configured store for a command. Commands go through this one
 * function so tests can swap the whole runtime with vi.mock.
 */

import { loadConfig, type Config } from '../config/index.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import { createHybridStore } from '../store/factory.js';
import type { HybridPointStore } from '../store/hybrid-store.js';
import type { CommandContext } from './types.js';

export interface CommandRuntime {
  config: Config;
  store: HybridPointStore;
  embedder: EmbeddingProvider;
}

export function openRuntime(ctx: CommandContext): CommandRuntime {
  const config = loadConfig();
  ctx.debug(`Primary: ${config.primary.url} (${config.primary.collection})`);
  ctx.debug(`Secondary: ${config.secondary.enabled ? config.secondary.path : 'disabled'}`);

  const { store, embedder } = createHybridStore(config, { logger: ctx });
  return { config, store, embedder };
}
