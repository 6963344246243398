/**
 * Database Row Validation
 *
 * Zod schemas for rows read from SQLite. A cast would be erased at runtime;
 * parsing catches a database written by a different schema version.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM points WHERE id = ?').get(id);
 * return row ? validateRow(PointRowSchema, row, `points.id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

export const PointRowSchema = z.object({
  id: z.string(),
  collection: z.string(),
  // better-sqlite3 returns BLOBs as Buffers
  vector: z.instanceof(Buffer),
  payload: z.string(),
  file_path: z.string(),
  updated_at: z.string(),
});

export type PointRowData = z.infer<typeof PointRowSchema>;

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

/**
 * Thrown when a row does not match the expected schema.
 *
 * Exit code 5: Database error
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const summary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${summary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe points database may have been written by another version.\n` +
      `Try: hrag stats  to check backend health`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

/**
 * Validate a single row.
 *
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate rows, throwing on the first invalid one.
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
