/**
 * Repository Indexer
 *
 * Scans a repository, chunks every documentation and code file, runs the
 * incremental differ per file against each target backend, then flags
 * points of files that no longer exist. A failing file is logged, counted
 * and skipped; the run always completes.
 */

import { readFile } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

import { ValidationError } from '../errors/index.js';
import type { HybridPointStore } from '../store/hybrid-store.js';
import type { BackendTarget, ChunkInput } from '../store/types.js';
import { consoleLogger, logError, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/result.js';
import { chunkCode, chunkMarkdown, parseCode } from './chunker/index.js';
import { scanRepository } from './scanner.js';
import {
  CODE_EXTENSIONS,
  type ChunkingOptions,
  type CollectionChoice,
  type IndexRepositoryOptions,
  type IndexRepositoryReport,
} from './types.js';

export const DEFAULT_DOC_PATTERNS = ['**/*.md'];
export const DEFAULT_CODE_PATTERNS = ['**/*.py', '**/*.ts', '**/*.tsx', '**/*.js', '**/*.jsx'];
const DEFAULT_CHUNKING: ChunkingOptions = { chunkSize: 1000, overlap: 100 };

/**
 * Backends a run writes to. `local` needs the secondary; `both` without
 * it falls back to `cloud` alone.
 *
 * @throws ValidationError for `local` while the secondary is disabled
 */
export function resolveTargets(
  choice: CollectionChoice,
  secondaryEnabled: boolean,
  logger: Logger = consoleLogger
): BackendTarget[] {
  if (choice === 'cloud') {
    return ['cloud'];
  }
  if (secondaryEnabled) {
    return choice === 'both' ? ['cloud', 'local'] : ['local'];
  }
  if (choice === 'local') {
    throw new ValidationError('Local collection is disabled', ['collection: local requires secondary.enabled'], {
      hint: 'Enable it with: hrag config set secondary.enabled true',
    });
  }
  logger.warn('Local collection is disabled, indexing cloud only');
  return ['cloud'];
}

/**
 * Chunks for one code file, or null when no grammar covers its extension.
 */
export function chunkCodeFile(filePath: string, content: string): ChunkInput[] | null {
  const language = CODE_EXTENSIONS[extname(filePath).slice(1).toLowerCase()];
  if (!language) {
    return null;
  }
  return chunkCode(parseCode(content, language), content, language, filePath);
}

/**
 * Documentation and code files under `root`. A file matching both pattern
 * sets counts as documentation.
 */
export async function listRepositoryFiles(
  root: string,
  patterns: { docPatterns?: string[]; codePatterns?: string[]; ignorePatterns?: string[] } = {}
): Promise<{ docs: string[]; code: string[] }> {
  const { docPatterns = DEFAULT_DOC_PATTERNS, codePatterns = DEFAULT_CODE_PATTERNS, ignorePatterns = [] } = patterns;
  const docs = await scanRepository(root, { patterns: docPatterns, ignorePatterns });
  const docSet = new Set(docs);
  const code = (await scanRepository(root, { patterns: codePatterns, ignorePatterns })).filter(
    (file) => !docSet.has(file)
  );
  return { docs, code };
}

export async function indexRepository(
  store: HybridPointStore,
  options: IndexRepositoryOptions,
  logger: Logger = consoleLogger
): Promise<IndexRepositoryReport> {
  const {
    indexDocs = true,
    indexCode = true,
    collection = 'cloud',
    docPatterns = DEFAULT_DOC_PATTERNS,
    codePatterns = DEFAULT_CODE_PATTERNS,
    ignorePatterns = [],
    chunking = DEFAULT_CHUNKING,
    onFile,
  } = options;

  const targets = resolveTargets(collection, store.secondaryEnabled, logger);
  const root = resolve(options.root);

  // Both kinds are scanned even when one is not indexed: cleanup must
  // see every file that still exists
  const { docs: docFiles, code: codeFiles } = await listRepositoryFiles(root, {
    docPatterns,
    codePatterns,
    ignorePatterns,
  });

  const work = [
    ...(indexDocs ? docFiles.map((filePath) => ({ filePath, kind: 'doc' as const })) : []),
    ...(indexCode ? codeFiles.map((filePath) => ({ filePath, kind: 'code' as const })) : []),
  ];

  const report: IndexRepositoryReport = {
    docsIndexed: 0,
    codeIndexed: 0,
    filesProcessed: 0,
    filesSkipped: 0,
    errors: 0,
    failures: [],
    cleanup: {},
    stats: { cloud: { count: 0, deleted: 0 }, local: null },
  };

  const fail = (filePath: string, backend: BackendTarget | null, message: string) => {
    report.errors++;
    report.failures.push({ filePath, backend, message });
  };

  for (const [position, { filePath, kind }] of work.entries()) {
    let fileOk = true;
    let chunks: ChunkInput[] | null;
    try {
      const content = await readFile(join(root, filePath), 'utf-8');
      chunks = kind === 'doc' ? chunkMarkdown(content, filePath, chunking) : chunkCodeFile(filePath, content);
    } catch (error) {
      logError(logger, `Failed to chunk ${filePath}: ${errorMessage(error)}`);
      fail(filePath, null, errorMessage(error));
      onFile?.({ filePath, kind, processed: position + 1, total: work.length, ok: false });
      continue;
    }

    if (chunks === null) {
      logger.debug?.(`Skipping ${filePath}: no parser for this file type`);
      report.filesSkipped++;
      onFile?.({ filePath, kind, processed: position + 1, total: work.length, ok: true });
      continue;
    }

    report.filesProcessed++;
    // Chunks that made it into every target
    let indexed = chunks.length;
    for (const target of targets) {
      const result = await store.indexFile(filePath, chunks, target);
      if (!result.ok) {
        fileOk = false;
        indexed = 0;
        fail(filePath, target, errorMessage(result.error));
        continue;
      }
      if (result.value.failedChunks > 0) {
        fileOk = false;
        fail(filePath, target, `${result.value.failedChunks} chunk(s) failed to embed`);
      }
      indexed = Math.min(indexed, chunks.length - result.value.failedChunks);
    }

    if (kind === 'doc') {
      report.docsIndexed += indexed;
    } else {
      report.codeIndexed += indexed;
    }
    onFile?.({ filePath, kind, processed: position + 1, total: work.length, ok: fileOk });
  }

  const existing = [...docFiles, ...codeFiles];
  for (const target of targets) {
    try {
      report.cleanup[target] = await store.cleanupDeletedFiles(existing, target, false);
    } catch (error) {
      logError(logger, `Cleanup failed on ${target}: ${errorMessage(error)}`);
      fail('', target, `cleanup failed: ${errorMessage(error)}`);
    }
  }

  try {
    report.stats = await store.collectionStats();
  } catch (error) {
    logError(logger, `Collection stats failed: ${errorMessage(error)}`);
    fail('', null, `stats failed: ${errorMessage(error)}`);
  }
  logger.info?.(
    `Indexed ${report.docsIndexed} doc chunks and ${report.codeIndexed} code chunks from ` +
      `${report.filesProcessed} files (${report.errors} errors, ${report.filesSkipped} skipped)`
  );
  return report;
}
