/**
 * Gitignore Pattern Handling
 *
 * Builds the ignore filter the scanner applies: default patterns, then
 * the root .gitignore, then caller patterns. Uses the 'ignore' package,
 * which implements the full gitignore spec.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import ignore from 'ignore';

import { normalizePath } from '../utils/path.js';
import { DEFAULT_IGNORE_PATTERNS } from './types.js';

/**
 * Returns true when a root-relative path should be skipped.
 */
export type IgnoreFilter = (relativePath: string) => boolean;

export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore */
  rootPath: string;
  additionalPatterns?: string[];
  useDefaults?: boolean;
}

/**
 * Non-empty, non-comment lines of a gitignore file. Negations (`!`) stay.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

export function loadGitignoreFile(gitignorePath: string): string[] {
  if (!existsSync(gitignorePath)) {
    return [];
  }
  return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
}

export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true } = options;

  const ig = ignore();
  if (useDefaults) {
    ig.add(DEFAULT_IGNORE_PATTERNS);
  }
  ig.add(loadGitignoreFile(join(rootPath, '.gitignore')));
  ig.add(additionalPatterns);

  return (relativePath: string): boolean => {
    const path = normalizePath(relativePath).replace(/^\.\//, '');
    // The root itself is never ignored
    return path !== '' && ig.ignores(path);
  };
}
