/**
 * Tool Registry
 *
 * Holds the tools a calling agent may invoke. Built explicitly and passed
 * to whoever serves the tools; there is no process-wide instance.
 *
 * `call()` validates input with the tool's zod schema, runs it, times it,
 * and always answers with an envelope. It never throws.
 */

import { toToolError, ValidationError } from '../../errors/index.js';
import { silentLogger, type Logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/result.js';
import type { z } from 'zod';
import type { RegisteredTool, ToolDefinition, ToolResponse } from './types.js';

/**
 * Zod issues as `path: message` lines.
 */
export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  register<TSchema extends z.ZodTypeAny, TData>(tool: ToolDefinition<TSchema, TData>): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, {
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      run: async (input: unknown) => {
        const parsed = tool.inputSchema.safeParse(input ?? {});
        if (!parsed.success) {
          throw new ValidationError(`Invalid input for ${tool.name}`, formatIssues(parsed.error.issues));
        }
        return tool.execute(parsed.data);
      },
    });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): Array<{ name: string; description: string }> {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  async call(name: string, input: unknown = {}): Promise<ToolResponse> {
    const started = performance.now();
    const metadata = () => ({
      timing_ms: Math.round((performance.now() - started) * 100) / 100,
      operation: name,
    });

    try {
      const tool = this.tools.get(name);
      if (!tool) {
        throw new ValidationError(`Unknown tool: ${name}`, [], {
          details: { available: this.names() },
        });
      }
      const data = await tool.run(input);
      const response: ToolResponse = { success: true, data, metadata: metadata(), errors: [] };
      this.logger.debug?.(`${name} completed in ${response.metadata.timing_ms}ms`);
      return response;
    } catch (error) {
      const response: ToolResponse = {
        success: false,
        data: null,
        metadata: metadata(),
        errors: [toToolError(error)],
      };
      this.logger.warn(`${name} failed in ${response.metadata.timing_ms}ms: ${errorMessage(error)}`);
      return response;
    }
  }
}
