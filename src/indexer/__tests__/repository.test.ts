import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';

import { chunkCodeFile, indexRepository, resolveTargets } from '../repository.js';
import { HybridPointStore } from '../../store/hybrid-store.js';
import { ValidationError } from '../../errors/index.js';
import { FakeEmbedder, InMemoryBackend } from '../../test-utils/index.js';
import { silentLogger } from '../../utils/logger.js';
import type { IndexProgress } from '../types.js';

const DOC = '# Guide\nAuth flow uses short-lived tokens';
const CODE = 'export function add(a: number, b: number): number {\n  return a + b;\n}\n';

describe('resolveTargets', () => {
  it('maps collection choices to backends', () => {
    expect(resolveTargets('cloud', false, silentLogger)).toEqual(['cloud']);
    expect(resolveTargets('local', true, silentLogger)).toEqual(['local']);
    expect(resolveTargets('both', true, silentLogger)).toEqual(['cloud', 'local']);
  });

  it('rejects local while the secondary is disabled', () => {
    expect(() => resolveTargets('local', false, silentLogger)).toThrow(ValidationError);
  });

  it('falls back to cloud for both while the secondary is disabled', () => {
    const warn = vi.fn();

    expect(resolveTargets('both', false, { warn })).toEqual(['cloud']);
    expect(warn).toHaveBeenCalledWith('Local collection is disabled, indexing cloud only');
  });
});

describe('chunkCodeFile', () => {
  it('returns null for unsupported extensions', () => {
    expect(chunkCodeFile('cmd/main.go', 'package main')).toBeNull();
  });

  it('picks the grammar from the extension', () => {
    expect(chunkCodeFile('src/math.ts', CODE)?.map((c) => [c.language, c.codeType])).toEqual([
      ['typescript', 'function'],
    ]);
  });
});

describe('indexRepository', () => {
  let root: string;
  let primary: InMemoryBackend;
  let embedder: FakeEmbedder;
  let store: HybridPointStore;

  const write = (relativePath: string, content: string) => {
    const target = join(root, relativePath);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'hrag-index-'));
    write('README.md', DOC);
    write('src/math.ts', CODE);
    primary = new InMemoryBackend('cloud');
    embedder = new FakeEmbedder();
    store = new HybridPointStore({ primary, embedder, logger: silentLogger });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('indexes docs and code', async () => {
    const progress: IndexProgress[] = [];

    const report = await indexRepository(
      store,
      { root, onFile: (event) => progress.push(event) },
      silentLogger
    );

    expect(report).toMatchObject({
      docsIndexed: 1,
      codeIndexed: 1,
      filesProcessed: 2,
      filesSkipped: 0,
      errors: 0,
      failures: [],
      stats: { cloud: { count: 2, deleted: 0 }, local: null },
    });
    expect(report.cleanup.cloud).toMatchObject({ scanned: 2, orphaned: 0, marked: 0 });
    expect(progress.map((p) => [p.filePath, p.kind, p.processed, p.total, p.ok])).toEqual([
      ['README.md', 'doc', 1, 2, true],
      ['src/math.ts', 'code', 2, 2, true],
    ]);
  });

  it('flags chunks of files removed since the last run', async () => {
    await indexRepository(store, { root }, silentLogger);
    unlinkSync(join(root, 'README.md'));

    const report = await indexRepository(store, { root }, silentLogger);

    expect(report.cleanup.cloud).toMatchObject({
      dryRun: false,
      orphaned: 1,
      marked: 1,
      files: ['README.md'],
    });
    expect(report.stats.cloud).toEqual({ count: 2, deleted: 1 });
    expect(report.docsIndexed).toBe(0);
    expect(report.codeIndexed).toBe(1);
  });

  it('still counts removed files as existing when their kind is not indexed', async () => {
    await indexRepository(store, { root }, silentLogger);

    const report = await indexRepository(store, { root, indexCode: false }, silentLogger);

    expect(report.filesProcessed).toBe(1);
    expect(report.cleanup.cloud?.orphaned).toBe(0);
  });

  it('reports chunks that fail to embed and keeps going', async () => {
    embedder.failEmbed = true;

    const report = await indexRepository(store, { root }, silentLogger);

    expect(report.docsIndexed).toBe(0);
    expect(report.codeIndexed).toBe(0);
    expect(report.errors).toBe(2);
    expect(report.failures).toEqual([
      { filePath: 'README.md', backend: 'cloud', message: '1 chunk(s) failed to embed' },
      { filePath: 'src/math.ts', backend: 'cloud', message: '1 chunk(s) failed to embed' },
    ]);
  });

  it('returns the report when the primary is down', async () => {
    primary.failOn.add('scan');
    primary.failOn.add('upsert');
    primary.failOn.add('count');

    const report = await indexRepository(store, { root }, silentLogger);

    expect(report.filesProcessed).toBe(2);
    expect(report.errors).toBe(4);
    expect(report.failures).toEqual([
      { filePath: 'README.md', backend: 'cloud', message: 'cloud backend unavailable: scan failed' },
      { filePath: 'src/math.ts', backend: 'cloud', message: 'cloud backend unavailable: scan failed' },
      { filePath: '', backend: 'cloud', message: 'cleanup failed: cloud backend unavailable: scan failed' },
      { filePath: '', backend: null, message: 'stats failed: cloud backend unavailable: count failed' },
    ]);
    expect(report.stats).toEqual({ cloud: { count: 0, deleted: 0 }, local: null });
  });

  it('skips files no parser covers', async () => {
    write('cmd/main.go', 'package main\n');

    const report = await indexRepository(store, { root, codePatterns: ['**/*.go'] }, silentLogger);

    expect(report.filesSkipped).toBe(1);
    expect(report.codeIndexed).toBe(0);
    expect(report.docsIndexed).toBe(1);
  });

  it('writes to both backends when a secondary is configured', async () => {
    const secondary = new InMemoryBackend('local');
    const both = new HybridPointStore({ primary, secondary, embedder, logger: silentLogger });

    const report = await indexRepository(both, { root, collection: 'both' }, silentLogger);

    expect(report.docsIndexed).toBe(1);
    expect(report.stats).toEqual({
      cloud: { count: 2, deleted: 0 },
      local: { count: 2, deleted: 0 },
    });
  });

  it('rejects the local collection while it is disabled', async () => {
    await expect(indexRepository(store, { root, collection: 'local' }, silentLogger)).rejects.toThrow(
      'Local collection is disabled'
    );
  });
});
