/**
 * Error handler for CLI error formatting and display, plus the conversion
 * used at the tool-call boundary.
 */

import chalk from 'chalk';
import { CLIError, RagError } from './types.js';
import { ERROR_SUGGESTIONS } from './suggestions.js';
import type { JsonObject } from '../utils/json.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  errorCode?: string;
  hint?: string;
  stack?: string;
}

/**
 * Error entry carried in a tool response.
 */
export interface ToolError {
  code: string;
  message: string;
  details: JsonObject;
  suggestions: string[];
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so formatting can be tested without
 * process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;

  if (error instanceof CLIError) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: error.code,
        errorCode: error instanceof RagError ? error.errorCode : undefined,
        hint: error.hint,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    const label = error instanceof RagError ? `Error [${error.errorCode}]: ` : 'Error: ';
    lines.push(chalk.red(label) + error.message);

    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }

    // The hint already shows the first suggestion
    if (verbose && error instanceof RagError && error.suggestions.length > 1) {
      lines.push(chalk.dim('Suggestions:'));
      for (const suggestion of error.suggestions.slice(1)) {
        lines.push(chalk.dim(`  - ${suggestion}`));
      }
    }

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    }

    return lines.join('\n');
  }

  if (error instanceof Error) {
    if (json) {
      const output: ErrorOutput = {
        error: error.message,
        code: 1,
        stack: verbose ? error.stack : undefined,
      };
      return JSON.stringify(output, null, 2);
    }

    const lines: string[] = [];
    lines.push(chalk.red('Error: ') + error.message);

    if (verbose && error.stack) {
      lines.push('');
      lines.push(chalk.dim('Stack trace:'));
      lines.push(chalk.dim(error.stack));
    } else {
      lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
    }

    return lines.join('\n');
  }

  if (json) {
    return JSON.stringify({ error: String(error), code: 1 }, null, 2);
  }

  return chalk.red('Error: ') + String(error);
}

/**
 * Get the exit code for an error. CLIError carries one, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format the error, print it to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  console.error(formatted);

  process.exit(code);
}

/**
 * Create a handler suitable for `uncaughtException` / `unhandledRejection`.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}

/**
 * Convert any thrown value into the structured error reported by tools.
 */
export function toToolError(error: unknown): ToolError {
  if (error instanceof RagError) {
    return {
      code: error.errorCode,
      message: error.message,
      details: error.details,
      suggestions: error.suggestions,
    };
  }

  return {
    code: 'UNKNOWN_ERROR',
    message: error instanceof Error ? error.message : String(error),
    details: {},
    suggestions: ERROR_SUGGESTIONS.UNKNOWN_ERROR,
  };
}
