/**
 * File Scanner
 *
 * Finds the files an indexing run covers with fast-glob, then drops what
 * the ignore filter (defaults, .gitignore, extra patterns) rules out.
 * Paths come back relative to the root, with forward slashes, sorted.
 */

import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError } from '../errors/index.js';
import { normalizePath } from '../utils/path.js';
import { createIgnoreFilter } from './ignore.js';
import type { ScanOptions } from './types.js';

/**
 * Scan `rootPath` for files matching `options.patterns`.
 *
 * @throws FileNotFoundError when the root is missing or not a directory
 *
 * @example
 * ```ts
 * const docs = await scanRepository('/path/to/project', { patterns: ['**\/*.md'] });
 * // ['README.md', 'docs/flows.md']
 * ```
 */
export async function scanRepository(rootPath: string, options: ScanOptions): Promise<string[]> {
  const absoluteRoot = resolve(rootPath);
  if (!existsSync(absoluteRoot) || !statSync(absoluteRoot).isDirectory()) {
    throw new FileNotFoundError(absoluteRoot);
  }
  if (options.patterns.length === 0) {
    return [];
  }

  const shouldIgnore = createIgnoreFilter({
    rootPath: absoluteRoot,
    additionalPatterns: options.ignorePatterns,
  });

  const entries = await fg(options.patterns, {
    cwd: absoluteRoot,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: options.followSymlinks ?? false,
    // Unreadable directories below the root are skipped
    suppressErrors: true,
  });

  const files = new Set<string>();
  for (const entry of entries) {
    const relativePath = normalizePath(entry);
    if (!shouldIgnore(relativePath)) {
      files.add(relativePath);
    }
  }
  return [...files].sort();
}
