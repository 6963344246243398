/**
 * Parsers for option values shared across commands.
 */

import { CLIError } from '../../errors/index.js';
import type { CollectionChoice } from '../../indexer/types.js';
import type { BackendTarget } from '../../store/types.js';

const COLLECTION_CHOICES: readonly CollectionChoice[] = ['cloud', 'local', 'both'];
const BACKEND_TARGETS: readonly BackendTarget[] = ['cloud', 'local'];

export const MAX_TOP_K = 100;

export function parseCollectionChoice(value: string): CollectionChoice {
  const choice = COLLECTION_CHOICES.find((candidate) => candidate === value);
  if (!choice) {
    throw new CLIError(
      `Invalid --collection value: "${value}"`,
      `Must be one of: ${COLLECTION_CHOICES.join(', ')}`
    );
  }
  return choice;
}

export function parseBackendTarget(value: string): BackendTarget {
  const target = BACKEND_TARGETS.find((candidate) => candidate === value);
  if (!target) {
    throw new CLIError(
      `Invalid --collection value: "${value}"`,
      `Must be one of: ${BACKEND_TARGETS.join(', ')}`
    );
  }
  return target;
}

/**
 * Parse and validate the --top-k option.
 *
 * @throws CLIError if not an integer in 1..100
 */
export function parseTopK(value: string): number {
  const topK = parseInt(value, 10);

  if (isNaN(topK) || topK < 1) {
    throw new CLIError(`Invalid --top-k value: "${value}"`, `Must be a positive integer (1-${MAX_TOP_K})`);
  }
  if (topK > MAX_TOP_K) {
    throw new CLIError(`--top-k value too large: ${topK}`, `Maximum allowed is ${MAX_TOP_K}`);
  }
  return topK;
}
