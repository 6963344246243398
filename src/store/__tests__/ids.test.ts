import { describe, it, expect } from 'vitest';
import { fnv1a64, formatPointId, generatePointId, normalizeContent, parsePointId } from '../ids.js';
import { ValidationError } from '../../errors/index.js';

describe('fnv1a64', () => {
  it('matches the published FNV-1a 64 vectors', () => {
    expect(fnv1a64('')).toBe(0xcbf29ce484222325n);
    expect(fnv1a64('a')).toBe(0xaf63dc4c8601ec8cn);
  });
});

describe('generatePointId', () => {
  it('is stable across calls and processes', () => {
    expect(generatePointId({ filePath: 'docs/a.md', lineStart: 1 })).toBe(2847740081820437321n);
    expect(generatePointId({ filePath: 'docs/a.md', lineStart: 1 })).toBe(
      generatePointId({ filePath: 'docs/a.md', lineStart: 1 })
    );
  });

  it('treats backslash paths as the same file', () => {
    expect(generatePointId({ filePath: 'docs\\a.md', lineStart: 1 })).toBe(
      generatePointId({ filePath: 'docs/a.md', lineStart: 1 })
    );
  });

  it('distinguishes lines of the same file', () => {
    expect(generatePointId({ filePath: 'docs/a.md', lineStart: 1 })).not.toBe(
      generatePointId({ filePath: 'docs/a.md', lineStart: 2 })
    );
  });

  it('hashes standalone content after collapsing whitespace', () => {
    expect(generatePointId({ content: '  hello \n\t world ' })).toBe(405816449784318158n);
    expect(normalizeContent('  hello \n\t world ')).toBe('hello world');
  });

  it('always fits in 63 bits', () => {
    for (let line = 0; line < 50; line++) {
      const id = generatePointId({ filePath: 'src/x.ts', lineStart: line });
      expect(id >= 0n && id < 1n << 63n).toBe(true);
    }
  });
});

describe('parsePointId', () => {
  it('accepts bigint, safe integers and decimal strings', () => {
    expect(parsePointId(42n)).toBe(42n);
    expect(parsePointId(42)).toBe(42n);
    expect(parsePointId(' 2847740081820437321 ')).toBe(2847740081820437321n);
  });

  it('round-trips through formatPointId', () => {
    expect(parsePointId(formatPointId(2847740081820437321n))).toBe(2847740081820437321n);
  });

  it.each([-1, 1.5, 'abc', '', '9223372036854775808', null, {}])('rejects %s', (value) => {
    expect(() => parsePointId(value)).toThrow(ValidationError);
  });
});
