/**
 * Error handling module
 *
 * Usage:
 *   import { ValidationError, toToolError } from './errors/index.js';
 *
 *   throw new ValidationError('Query cannot be empty');
 */

export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DatabaseError,
  RagError,
  ValidationError,
  PointNotFoundError,
  DimensionMismatchError,
  BatchLimitExceededError,
  BackendUnavailableError,
  SynthesisFailureError,
  RerankFailureError,
  type RagErrorOptions,
} from './types.js';

export { ERROR_CODES, ERROR_SUGGESTIONS, type ErrorCode } from './suggestions.js';

export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  toToolError,
  type ErrorHandlerOptions,
  type ErrorOutput,
  type ToolError,
} from './handler.js';
