import { describe, it, expect } from 'vitest';
import { matchesFilter, parseFilter, getPath } from '../filter.js';
import { ValidationError } from '../../errors/index.js';

const payload = {
  file_path: 'docs/flows.md',
  section: 'Flows',
  is_deleted: false,
  metadata: { list_length: 3, tags: ['auth', 'billing'] },
};

describe('parseFilter', () => {
  it('accepts scalar, value and any matches', () => {
    const filter = parseFilter({
      must: [{ key: 'file_path', match: 'docs/flows.md' }],
      should: [{ key: 'section', match: { value: 'Flows' } }],
      must_not: [{ key: 'metadata.tags', match: { any: ['legacy'] } }],
    });
    expect(filter.must).toHaveLength(1);
  });

  it('rejects unknown clauses with the offending path', () => {
    try {
      parseFilter({ must: [{ key: '', match: 1 }] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues[0]).toMatch(/^must\.0\.key: /);
      }
    }
  });

  it('rejects extra top-level keys', () => {
    expect(() => parseFilter({ filter: [] })).toThrow(ValidationError);
  });
});

describe('matchesFilter', () => {
  it('passes everything without a filter', () => {
    expect(matchesFilter(payload, undefined)).toBe(true);
  });

  it('requires every must condition', () => {
    expect(
      matchesFilter(payload, {
        must: [
          { key: 'file_path', match: 'docs/flows.md' },
          { key: 'section', match: 'Other' },
        ],
      })
    ).toBe(false);
  });

  it('requires at least one should condition when present', () => {
    expect(
      matchesFilter(payload, {
        should: [
          { key: 'section', match: 'Other' },
          { key: 'section', match: 'Flows' },
        ],
      })
    ).toBe(true);
    expect(matchesFilter(payload, { should: [{ key: 'section', match: 'Other' }] })).toBe(false);
  });

  it('excludes must_not matches', () => {
    expect(matchesFilter(payload, { must_not: [{ key: 'is_deleted', match: false }] })).toBe(false);
  });

  it('reads dotted keys and matches array elements', () => {
    expect(matchesFilter(payload, { must: [{ key: 'metadata.list_length', match: 3 }] })).toBe(true);
    expect(
      matchesFilter(payload, { must: [{ key: 'metadata.tags', match: { any: ['billing', 'x'] } }] })
    ).toBe(true);
  });

  it('does not coerce types', () => {
    expect(matchesFilter(payload, { must: [{ key: 'metadata.list_length', match: '3' }] })).toBe(false);
  });
});

describe('getPath', () => {
  it('returns undefined past a scalar', () => {
    expect(getPath(payload, 'section.name')).toBeUndefined();
  });
});
