/**
 * Search Result Formatter Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatLineRange,
  formatResult,
  formatResultJSON,
  formatResults,
  formatScore,
  truncateSnippet,
} from '../formatter.js';
import { makeResult } from '../../test-utils/index.js';

const flows = makeResult({
  content: '1. Auth flow\n2. Payment flow',
  filePath: 'docs/flows.md',
  lineNumber: 12,
  lineEnd: 18,
  score: 0.923,
});

describe('formatScore', () => {
  it('should format with 2 decimal places', () => {
    expect(formatScore(0.9234)).toBe('0.92');
    expect(formatScore(0.1)).toBe('0.10');
    expect(formatScore(1)).toBe('1.00');
  });
});

describe('truncateSnippet', () => {
  it('should collapse whitespace', () => {
    expect(truncateSnippet('Line 1\n\n  Line 2', 20)).toBe('Line 1 Line 2');
  });

  it('should cut long content with an ellipsis', () => {
    expect(truncateSnippet('Hello world', 5)).toBe('Hello...');
  });
});

describe('formatLineRange', () => {
  it('should collapse single-line ranges', () => {
    expect(formatLineRange(4, 4)).toBe('4');
    expect(formatLineRange(4, 9)).toBe('4-9');
  });
});

describe('formatResult', () => {
  it('should show score, location and snippet', () => {
    expect(formatResult(flows)).toBe('[0.92] docs/flows.md:12-18\n  1. Auth flow 2. Payment flow');
  });

  it('should show the origin backend on request', () => {
    expect(formatResult({ ...flows, origin: 'local' }, { showOrigin: true, showScore: false })).toBe(
      '[local] docs/flows.md:12-18\n  1. Auth flow 2. Payment flow'
    );
  });

  it('should identify standalone entries by id', () => {
    const note = { ...flows, filePath: '', id: 42n };
    expect(formatResult(note, { showScore: false })).toBe('#42\n  1. Auth flow 2. Payment flow');
  });

  it('should separate results with blank lines', () => {
    expect(formatResults([flows, flows], { showScore: false, snippetLength: 6 })).toBe(
      'docs/flows.md:12-18\n  1. Aut...\n\ndocs/flows.md:12-18\n  1. Aut...'
    );
  });
});

describe('formatResultJSON', () => {
  it('should give the id as a decimal string and null language for docs', () => {
    const json = formatResultJSON(flows);

    expect(json).toEqual({
      id: flows.id.toString(),
      score: 0.923,
      filePath: 'docs/flows.md',
      lineStart: 12,
      lineEnd: 18,
      section: 'Introduction',
      content: '1. Auth flow\n2. Payment flow',
      language: null,
      contentType: 'text',
      origin: 'cloud',
    });
  });
});
