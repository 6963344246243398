import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';

import { scanRepository } from '../scanner.js';
import { createIgnoreFilter, parseGitignoreContent } from '../ignore.js';
import { FileNotFoundError } from '../../errors/index.js';

function write(root: string, relativePath: string, content = 'x'): void {
  const target = join(root, relativePath);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, content);
}

describe('parseGitignoreContent', () => {
  it('drops blanks and comments and keeps negations', () => {
    expect(parseGitignoreContent('# build output\n\nfoo/\n!keep.md\r\n  bar  ')).toEqual([
      'foo/',
      '!keep.md',
      'bar',
    ]);
  });
});

describe('createIgnoreFilter', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'hrag-ignore-'));
    write(root, '.gitignore', '*.log\n');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('combines defaults, .gitignore and extra patterns', () => {
    const shouldIgnore = createIgnoreFilter({ rootPath: root, additionalPatterns: ['secret/'] });

    expect(shouldIgnore('debug.log')).toBe(true);
    expect(shouldIgnore('node_modules/pkg/index.js')).toBe(true);
    expect(shouldIgnore('secret/notes.md')).toBe(true);
    expect(shouldIgnore('./src/app.ts')).toBe(false);
    expect(shouldIgnore('src\\app.ts')).toBe(false);
  });

  it('never ignores the root', () => {
    expect(createIgnoreFilter({ rootPath: root })('')).toBe(false);
  });

  it('can leave the defaults out', () => {
    const shouldIgnore = createIgnoreFilter({ rootPath: root, useDefaults: false });

    expect(shouldIgnore('node_modules/pkg/index.js')).toBe(false);
    expect(shouldIgnore('debug.log')).toBe(true);
  });
});

describe('scanRepository', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'hrag-scan-'));
    write(root, 'README.md');
    write(root, 'docs/flows.md');
    write(root, 'docs/notes.txt');
    write(root, 'node_modules/pkg/README.md');
    write(root, 'generated/api.md');
    write(root, '.github/issue.md');
    write(root, '.gitignore', 'generated/\n');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('returns sorted relative paths outside ignored and hidden directories', async () => {
    expect(await scanRepository(root, { patterns: ['**/*.md'] })).toEqual(['README.md', 'docs/flows.md']);
  });

  it('applies extra ignore patterns', async () => {
    expect(await scanRepository(root, { patterns: ['**/*.md'], ignorePatterns: ['docs/'] })).toEqual([
      'README.md',
    ]);
  });

  it('returns nothing for an empty pattern list', async () => {
    expect(await scanRepository(root, { patterns: [] })).toEqual([]);
  });

  it('rejects a missing root', async () => {
    await expect(scanRepository(join(root, 'missing'), { patterns: ['**/*.md'] })).rejects.toThrow(
      FileNotFoundError
    );
  });

  it('rejects a root that is a file', async () => {
    await expect(scanRepository(join(root, 'README.md'), { patterns: ['**/*.md'] })).rejects.toThrow(
      FileNotFoundError
    );
  });
});
