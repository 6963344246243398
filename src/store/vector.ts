/**
 * Vector validation and similarity helpers.
 */

import { DimensionMismatchError } from '../errors/index.js';

/**
 * Check a caller-supplied vector before it reaches a backend.
 *
 * @throws DimensionMismatchError on a non-array, wrong width or a
 *   non-finite element
 */
export function validateVector(value: unknown, dimensions: number): number[] {
  if (!Array.isArray(value)) {
    throw new DimensionMismatchError('Vector must be an array of numbers', {
      details: { expected: dimensions, actual: typeof value },
    });
  }

  if (value.length !== dimensions) {
    throw new DimensionMismatchError(
      `Vector dimension mismatch: expected ${dimensions}, got ${value.length}`,
      { details: { expected: dimensions, actual: value.length } }
    );
  }

  const vector: number[] = [];
  for (const [index, element] of value.entries()) {
    if (typeof element !== 'number' || !Number.isFinite(element)) {
      throw new DimensionMismatchError(`Vector element ${index} is not a finite number`, {
        details: { expected: dimensions, actual: value.length, index },
      });
    }
    vector.push(element);
  }
  return vector;
}

/**
 * Cosine similarity in [-1, 1]. Zero vectors score 0.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
