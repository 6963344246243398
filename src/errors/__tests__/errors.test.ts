/**
 * Tests for error handling
 *
 * - CLI error classes and exit codes
 * - RagError codes, details and suggestions
 * - formatError text and JSON output
 * - toToolError at the tool boundary
 */

import { describe, it, expect } from 'vitest';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DatabaseError,
  RagError,
  ValidationError,
  PointNotFoundError,
  DimensionMismatchError,
  BackendUnavailableError,
  ERROR_SUGGESTIONS,
  formatError,
  getExitCode,
  toToolError,
} from '../index.js';

describe('CLI errors', () => {
  it('defaults to exit code 1 without a hint', () => {
    const error = new CLIError('Something went wrong');

    expect(error.message).toBe('Something went wrong');
    expect(error.hint).toBeUndefined();
    expect(error.code).toBe(1);
    expect(error.name).toBe('CLIError');
    expect(error).toBeInstanceOf(Error);
  });

  it('keeps instanceof through subclasses', () => {
    const error = new FileNotFoundError('/repo/missing');

    expect(error).toBeInstanceOf(CLIError);
    expect(error.message).toBe('Path does not exist: /repo/missing');
    expect(error.code).toBe(3);
  });

  it('points config errors at the config listing', () => {
    const error = new ConfigError('Invalid option');

    expect(error.hint).toBe('Run: hrag config list  to see valid options');
    expect(error.code).toBe(2);
    expect(new ConfigError('Invalid option', 'Custom hint').hint).toBe('Custom hint');
  });

  it('keeps the database cause', () => {
    const cause = new Error('SQLITE_BUSY');
    const error = new DatabaseError('locked', cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe(5);
  });
});

describe('RagError', () => {
  it('takes default suggestions for its code and hints with the first', () => {
    const error = new RagError('SYNTHESIS_FAILURE', 'no answer');

    expect(error.errorCode).toBe('SYNTHESIS_FAILURE');
    expect(error.suggestions).toEqual(ERROR_SUGGESTIONS.SYNTHESIS_FAILURE);
    expect(error.hint).toBe(ERROR_SUGGESTIONS.SYNTHESIS_FAILURE[0]);
    expect(error.details).toEqual({});
  });

  it('records validation issues in details and the hint', () => {
    const error = new ValidationError('Invalid input for search', ['query: Required']);

    expect(error.details).toEqual({ issues: ['query: Required'] });
    expect(error.hint).toBe('Issues:\n  query: Required');
    expect(error.issues).toEqual(['query: Required']);
  });

  it('leaves details empty without issues', () => {
    expect(new ValidationError('Question cannot be empty').details).toEqual({});
  });

  it('names the missing point', () => {
    const error = new PointNotFoundError('42', { details: { collection: 'local' } });

    expect(error.message).toBe('Vector with ID 42 not found');
    expect(error.details).toEqual({ vector_id: '42', collection: 'local' });
    expect(error.code).toBe(3);
  });

  it('prefixes backend failures with the backend', () => {
    const error = new BackendUnavailableError('cloud', 'connect ECONNREFUSED');

    expect(error.message).toBe('cloud backend unavailable: connect ECONNREFUSED');
    expect(error.details).toEqual({ backend: 'cloud' });
    expect(getExitCode(error)).toBe(7);
  });
});

describe('formatError', () => {
  it('prints the message and hint as text', () => {
    const output = formatError(new CLIError('Failed', 'Try again'));

    expect(output).toContain('Failed');
    expect(output).toContain('Hint:');
    expect(output).toContain('Try again');
  });

  it('labels structured errors with their code', () => {
    const output = formatError(new BackendUnavailableError('local', 'disk I/O error'), { verbose: true });

    expect(output).toContain('Error [BACKEND_UNAVAILABLE]: ');
    expect(output).toContain(`  - ${ERROR_SUGGESTIONS.BACKEND_UNAVAILABLE[1]}`);
  });

  it('suggests --verbose for plain errors', () => {
    expect(formatError(new Error('Something broke'))).toContain('--verbose');
  });

  it('shows the stack in verbose mode', () => {
    expect(formatError(new CLIError('Failed'), { verbose: true })).toContain('Stack trace:');
  });

  it('adds the error code to JSON output', () => {
    const parsed = JSON.parse(formatError(new DimensionMismatchError('expected 768 dimensions, got 2'), { json: true }));

    expect(parsed).toEqual({
      error: 'expected 768 dimensions, got 2',
      code: 6,
      errorCode: 'DIMENSION_MISMATCH',
      hint: ERROR_SUGGESTIONS.DIMENSION_MISMATCH[0],
    });
  });

  it('formats unknown values as JSON', () => {
    expect(JSON.parse(formatError(42, { json: true }))).toEqual({ error: '42', code: 1 });
  });
});

describe('getExitCode', () => {
  it('reads the code from CLI errors and defaults to 1', () => {
    expect(getExitCode(new CLIError('test', undefined, 42))).toBe(42);
    expect(getExitCode(new ConfigError('bad'))).toBe(2);
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});

describe('toToolError', () => {
  it('carries code, details and suggestions of a RagError', () => {
    expect(toToolError(new PointNotFoundError('7'))).toEqual({
      code: 'POINT_NOT_FOUND',
      message: 'Vector with ID 7 not found',
      details: { vector_id: '7' },
      suggestions: ERROR_SUGGESTIONS.POINT_NOT_FOUND,
    });
  });

  it('reports anything else as UNKNOWN_ERROR', () => {
    expect(toToolError(new TypeError('boom'))).toEqual({
      code: 'UNKNOWN_ERROR',
      message: 'boom',
      details: {},
      suggestions: ERROR_SUGGESTIONS.UNKNOWN_ERROR,
    });
    expect(toToolError('plain').message).toBe('plain');
  });
});
