/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.hrag/
 * ├── config.toml     (User configuration)
 * └── points.db       (Secondary point store, SQLite)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const HRAG_DIR = join(homedir(), '.hrag');
export const CONFIG_PATH = join(HRAG_DIR, 'config.toml');
export const POINTS_DB_PATH = join(HRAG_DIR, 'points.db');

export function getHragDir(): string {
  return HRAG_DIR;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}
