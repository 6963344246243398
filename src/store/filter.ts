/**
 * Payload filter expressions.
 *
 * The same grammar is sent to the primary backend as a predicate and
 * evaluated here when a backend cannot run it (the secondary always, the
 * primary when it rejects a filter on an unindexed field).
 *
 * ```ts
 * const filter = parseFilter({
 *   must: [{ key: 'file_path', match: 'docs/setup.md' }],
 *   must_not: [{ key: 'is_deleted', match: true }],
 * });
 * matchesFilter(point.payload, filter);
 * ```
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

const MatchValueSchema = z.union([z.string(), z.number(), z.boolean()]);
export type MatchValue = z.infer<typeof MatchValueSchema>;

const FieldMatchSchema = z.union([
  MatchValueSchema,
  z.object({ value: MatchValueSchema }).strict(),
  z.object({ any: z.array(MatchValueSchema).min(1) }).strict(),
]);
export type FieldMatch = z.infer<typeof FieldMatchSchema>;

export const FieldConditionSchema = z.object({
  key: z.string().min(1),
  match: FieldMatchSchema,
});
export type FieldCondition = z.infer<typeof FieldConditionSchema>;

export const PointFilterSchema = z
  .object({
    must: z.array(FieldConditionSchema).optional(),
    should: z.array(FieldConditionSchema).optional(),
    must_not: z.array(FieldConditionSchema).optional(),
  })
  .strict();
export type PointFilter = z.infer<typeof PointFilterSchema>;

/**
 * Raised by a backend that cannot evaluate a filter itself.
 */
export class FilterRejectedError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'FilterRejectedError';
  }
}

/**
 * Validate a caller-supplied filter.
 *
 * @throws ValidationError listing each zod issue
 */
export function parseFilter(value: unknown): PointFilter {
  const result = PointFilterSchema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      'Invalid filter expression',
      result.error.issues.map((issue) => `${issue.path.join('.') || 'filter'}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * Resolve a dotted key (`metadata.list_length`) inside a payload.
 */
export function getPath(payload: object, key: string): unknown {
  let current: unknown = payload;
  for (const part of key.split('.')) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    current = Object.entries(current).find(([name]) => name === part)?.[1];
  }
  return current;
}

function matchesCondition(payload: object, condition: FieldCondition): boolean {
  const actual = getPath(payload, condition.key);
  const { match } = condition;

  const candidates: MatchValue[] =
    typeof match === 'object' ? ('any' in match ? match.any : [match.value]) : [match];

  // Array-valued fields match when any element matches
  const values = Array.isArray(actual) ? actual : [actual];
  return values.some((value) => candidates.some((candidate) => candidate === value));
}

/**
 * Evaluate a filter in process: every `must`, at least one `should` when
 * any are given, and no `must_not`.
 */
export function matchesFilter(payload: object, filter: PointFilter | undefined): boolean {
  if (!filter) {
    return true;
  }

  const { must = [], should = [], must_not: mustNot = [] } = filter;

  if (!must.every((condition) => matchesCondition(payload, condition))) {
    return false;
  }
  if (should.length > 0 && !should.some((condition) => matchesCondition(payload, condition))) {
    return false;
  }
  return !mustNot.some((condition) => matchesCondition(payload, condition));
}

/**
 * Filter matching one field exactly.
 */
export function fieldEquals(key: string, value: MatchValue): PointFilter {
  return { must: [{ key, match: value }] };
}
