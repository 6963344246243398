/**
 * Test Utilities - Unified Reset
 *
 * Clears process-level caches between tests: cached SQLite connections and
 * the parsed environment.
 *
 * @example
 * ```typescript
 * afterEach(() => {
 *   resetAll();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/env.js';
import { closeAllDatabases } from '../database/connection.js';

export function resetAll(): void {
  closeAllDatabases();
  _clearEnvCache();
}
