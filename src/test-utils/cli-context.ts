/**
 * A CommandContext that records instead of printing.
 */

import { vi } from 'vitest';
import type { CommandContext, GlobalOptions } from '../cli/types.js';

export interface RecordingContext {
  ctx: CommandContext;
  logs: string[];
  warnings: string[];
  errors: string[];
}

export function createRecordingContext(options: Partial<GlobalOptions> = {}): RecordingContext {
  const logs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  const ctx: CommandContext = {
    options: { verbose: false, json: false, ...options },
    log: (message) => logs.push(message),
    debug: vi.fn(),
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  };
  return { ctx, logs, warnings, errors };
}
