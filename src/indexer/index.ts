/**
 * Indexer Module
 *
 * Repository scanning, markdown and code chunking, and the incremental
 * indexing run that writes chunks into the hybrid point store.
 *
 * @example
 * ```ts
 * import { indexRepository } from './indexer/index.js';
 *
 * const report = await indexRepository(store, { root: '/path/to/project', collection: 'both' });
 * console.log(`${report.docsIndexed} doc chunks, ${report.errors} errors`);
 * ```
 */

export type {
  CodeLanguage,
  CodeElement,
  CodeElementType,
  ChunkingOptions,
  ScanOptions,
  CollectionChoice,
  IndexRepositoryOptions,
  IndexRepositoryReport,
  IndexProgress,
  IndexFailure,
} from './types.js';
export { CODE_EXTENSIONS, DEFAULT_IGNORE_PATTERNS } from './types.js';

export {
  createIgnoreFilter,
  loadGitignoreFile,
  parseGitignoreContent,
  type IgnoreFilter,
  type IgnoreFilterOptions,
} from './ignore.js';
export { scanRepository } from './scanner.js';

export {
  chunkMarkdown,
  classifyMarkdown,
  detectDocType,
  INTRODUCTION_SECTION,
  parseCode,
  chunkCode,
  extractImports,
  MAX_IMPORTS,
} from './chunker/index.js';

export {
  indexRepository,
  listRepositoryFiles,
  resolveTargets,
  chunkCodeFile,
  DEFAULT_DOC_PATTERNS,
  DEFAULT_CODE_PATTERNS,
} from './repository.js';
