import { describe, it, expect } from 'vitest';
import { attempt, err, errorMessage, ok } from '../result.js';
import { isKnownPath, normalizePath, pathVariants } from '../path.js';

describe('Result helpers', () => {
  it('builds ok and err variants', () => {
    expect(ok(3)).toEqual({ ok: true, value: 3 });
    expect(err('bad')).toEqual({ ok: false, error: 'bad' });
  });

  it('captures a rejection as an error result', async () => {
    const result = await attempt(async () => {
      throw new Error('boom');
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(errorMessage(result.error)).toBe('boom');
    }
  });

  it('wraps a resolved value', async () => {
    await expect(attempt(async () => 'done')).resolves.toEqual({ ok: true, value: 'done' });
  });

  it('stringifies non-Error throwables', () => {
    expect(errorMessage(42)).toBe('42');
  });
});

describe('path helpers', () => {
  it('normalizes backslashes', () => {
    expect(normalizePath('docs\\guide\\intro.md')).toBe('docs/guide/intro.md');
  });

  it('lists every separator spelling', () => {
    expect([...pathVariants('docs/a.md')].sort()).toEqual(['docs/a.md', 'docs\\a.md']);
  });

  it('matches a path whatever separator was stored', () => {
    const existing = new Set(['docs/a.md']);
    expect(isKnownPath('docs\\a.md', existing)).toBe(true);
    expect(isKnownPath('docs/b.md', existing)).toBe(false);
  });
});
