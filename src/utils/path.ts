/**
 * Corpus path helpers.
 *
 * Stored file paths are corpus-relative and use forward slashes; callers may
 * hand in Windows-style separators.
 */

export function normalizePath(path: string): string {
  return path.replace(/\\/g, '/');
}

/**
 * All spellings a stored path may have been written with.
 */
export function pathVariants(path: string): Set<string> {
  return new Set([path, normalizePath(path), path.replace(/\//g, '\\')]);
}

/**
 * True when `candidate` names the same file as any entry of `paths`.
 */
export function isKnownPath(candidate: string, paths: ReadonlySet<string>): boolean {
  for (const variant of pathVariants(candidate)) {
    if (paths.has(variant)) {
      return true;
    }
  }
  return false;
}
