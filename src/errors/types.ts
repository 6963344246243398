/**
 * Error type definitions for the hybrid-rag CLI and library
 *
 * Two families live here:
 * - CLIError and its direct subclasses carry an exit code and a recovery hint
 *   for the command line.
 * - RagError adds a stable string code, structured details and remediation
 *   suggestions so the tool boundary can report failures without leaking raw
 *   low-level exceptions.
 */

import type { JsonObject } from '../utils/json.js';
import { ERROR_SUGGESTIONS, type ErrorCode } from './suggestions.js';

/**
 * Base class for all CLI errors.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: process exit code, lets scripts branch on the failure kind
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors (bad TOML, invalid values).
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: hrag config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Wraps SQLite failures of the secondary backend.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try running: hrag stats  to check backend health', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

// ============================================================================
// Structured errors for the retrieval core
// ============================================================================

/**
 * Options shared by every RagError subclass.
 */
export interface RagErrorOptions {
  details?: JsonObject;
  suggestions?: string[];
  hint?: string;
  cause?: unknown;
}

/**
 * Base class for failures that cross the tool-call boundary.
 *
 * `errorCode` is the stable machine-readable identifier; `code` stays the
 * CLI exit code inherited from CLIError.
 */
export class RagError extends CLIError {
  public readonly errorCode: ErrorCode;
  public readonly details: JsonObject;
  public readonly suggestions: string[];
  public readonly cause?: unknown;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options: RagErrorOptions = {},
    exitCode: number = 1
  ) {
    const suggestions = options.suggestions ?? ERROR_SUGGESTIONS[errorCode];
    super(message, options.hint ?? suggestions[0], exitCode);
    this.name = 'RagError';
    this.errorCode = errorCode;
    this.details = options.details ?? {};
    this.suggestions = suggestions;
    this.cause = options.cause;
  }
}

/**
 * Bad input shape or a missing field.
 *
 * `issues` keeps field-level messages (typically from a zod parse).
 */
export class ValidationError extends RagError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: RagErrorOptions = {}) {
    super(
      'VALIDATION_ERROR',
      message,
      {
        ...options,
        details: issues.length > 0 ? { ...options.details, issues } : options.details,
        hint: issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : options.hint,
      },
      1
    );
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A point id that is absent from the target backend.
 */
export class PointNotFoundError extends RagError {
  constructor(id: string, options: RagErrorOptions = {}) {
    super(
      'POINT_NOT_FOUND',
      `Vector with ID ${id} not found`,
      { ...options, details: { vector_id: id, ...options.details } },
      3
    );
    this.name = 'PointNotFoundError';
  }
}

/**
 * A vector with the wrong width or non-numeric elements.
 */
export class DimensionMismatchError extends RagError {
  constructor(message: string, options: RagErrorOptions = {}) {
    super('DIMENSION_MISMATCH', message, options, 6);
    this.name = 'DimensionMismatchError';
  }
}

/**
 * A request larger than the backend accepts and that cannot be clamped.
 */
export class BatchLimitExceededError extends RagError {
  constructor(message: string, options: RagErrorOptions = {}) {
    super('BATCH_LIMIT_EXCEEDED', message, options, 1);
    this.name = 'BatchLimitExceededError';
  }
}

/**
 * Network or backend failure.
 */
export class BackendUnavailableError extends RagError {
  constructor(backend: string, message: string, options: RagErrorOptions = {}) {
    super(
      'BACKEND_UNAVAILABLE',
      `${backend} backend unavailable: ${message}`,
      { ...options, details: { backend, ...options.details } },
      7
    );
    this.name = 'BackendUnavailableError';
  }
}

export class SynthesisFailureError extends RagError {
  constructor(message: string, options: RagErrorOptions = {}) {
    super('SYNTHESIS_FAILURE', message, options, 1);
    this.name = 'SynthesisFailureError';
  }
}

export class RerankFailureError extends RagError {
  constructor(message: string, options: RagErrorOptions = {}) {
    super('RERANK_FAILURE', message, options, 1);
    this.name = 'RerankFailureError';
  }
}
