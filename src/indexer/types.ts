/**
 * Indexer Types
 *
 * Shapes for scanning a repository, chunking its files and reporting an
 * indexing run.
 */

import type { CleanupReport } from '../store/lifecycle.js';
import type { BackendTarget, CollectionStats } from '../store/types.js';

/** Languages the code parser has grammars for */
export type CodeLanguage = 'typescript' | 'tsx' | 'javascript' | 'python';

/**
 * Extension (without dot) to parser language.
 */
export const CODE_EXTENSIONS: Record<string, CodeLanguage> = {
  ts: 'typescript',
  mts: 'typescript',
  cts: 'typescript',
  tsx: 'tsx',
  js: 'javascript',
  jsx: 'javascript',
  mjs: 'javascript',
  cjs: 'javascript',
  py: 'python',
};

export type CodeElementType = 'function' | 'class' | 'method';

/**
 * A function, class or method found by the code parser.
 */
export interface CodeElement {
  type: CodeElementType;
  name: string;
  /** First line of the definition, trimmed */
  signature: string;
  content: string;
  startLine: number;
  endLine: number;
  /** JSDoc block or Python docstring */
  docComment: string | null;
  /** Enclosing class for methods */
  classContext: string | null;
}

export interface ChunkingOptions {
  /** Characters per chunk before it is closed */
  chunkSize: number;
  /** Characters of trailing lines repeated at the start of the next chunk */
  overlap: number;
}

/**
 * Options for configuring the file scanner.
 */
export interface ScanOptions {
  /** Glob patterns, relative to the root */
  patterns: string[];

  /**
   * Additional gitignore-style patterns (merged with defaults and .gitignore).
   * @example ['*.log', 'temp/']
   */
  ignorePatterns?: string[];

  /**
   * Whether to follow symlinks.
   * @default false
   */
  followSymlinks?: boolean;
}

/** Where an indexing run writes: one backend or both */
export type CollectionChoice = BackendTarget | 'both';

export interface IndexRepositoryOptions {
  /** Repository root; indexed paths are relative to it */
  root: string;
  indexDocs?: boolean;
  indexCode?: boolean;
  collection?: CollectionChoice;
  docPatterns?: string[];
  codePatterns?: string[];
  ignorePatterns?: string[];
  chunking?: ChunkingOptions;
  /** Called after each file with its position in the run */
  onFile?: (progress: IndexProgress) => void;
}

export interface IndexProgress {
  filePath: string;
  kind: 'doc' | 'code';
  processed: number;
  total: number;
  ok: boolean;
}

export interface IndexFailure {
  filePath: string;
  backend: BackendTarget | null;
  message: string;
}

export interface IndexRepositoryReport {
  /** Chunks written or confirmed for documentation files */
  docsIndexed: number;
  /** Chunks written or confirmed for code files */
  codeIndexed: number;
  filesProcessed: number;
  /** Code files with no grammar for their extension */
  filesSkipped: number;
  errors: number;
  failures: IndexFailure[];
  /** Cleanup of points whose files no longer exist, per backend */
  cleanup: Partial<Record<BackendTarget, CleanupReport>>;
  stats: CollectionStats;
}

/**
 * Default patterns to always ignore during scanning.
 * These are in addition to .gitignore patterns.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  '.git',
  '.svn',
  '.hg',
  'node_modules',
  'vendor',
  'venv',
  '.venv',
  '__pycache__',
  '.tox',
  'dist',
  'build',
  'out',
  'target',
  '.next',
  '.cache',
  '.idea',
  '.vscode',
  'coverage',
  '*.min.js',
  '*.d.ts',
];
