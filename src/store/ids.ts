/**
 * Deterministic point ids.
 *
 * Ids are FNV-1a 64 fingerprints over UTF-8 bytes, masked to 63 bits so
 * they stay positive as signed 64-bit integers. The `v1:` prefix versions
 * the key format: changing it changes every id.
 */

import { ValidationError } from '../errors/index.js';
import { normalizePath } from '../utils/path.js';

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = (1n << 64n) - 1n;
const MASK_63 = (1n << 63n) - 1n;

const ID_VERSION = 'v1';

const encoder = new TextEncoder();

export type PointIdKey = { filePath: string; lineStart: number } | { content: string };

/**
 * FNV-1a 64 over the UTF-8 bytes of `text`.
 */
export function fnv1a64(text: string): bigint {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of encoder.encode(text)) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME) & MASK_64;
  }
  return hash;
}

/**
 * Collapse whitespace so reformatting alone does not change a standalone id.
 */
export function normalizeContent(content: string): string {
  return content.trim().replace(/\s+/g, ' ');
}

/**
 * File-anchored chunks hash `(path, line)`; standalone entries hash content.
 */
export function generatePointId(key: PointIdKey): bigint {
  const material =
    'filePath' in key
      ? `${ID_VERSION}:${normalizePath(key.filePath)}:${key.lineStart}`
      : `${ID_VERSION}:${normalizeContent(key.content)}`;
  return fnv1a64(material) & MASK_63;
}

export function formatPointId(id: bigint): string {
  return id.toString(10);
}

/**
 * Accept an id as it arrives from a caller: bigint, safe integer or decimal
 * string.
 */
export function parsePointId(value: unknown): bigint {
  let id: bigint | null = null;

  if (typeof value === 'bigint') {
    id = value;
  } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
    id = BigInt(value);
  } else if (typeof value === 'string' && /^\d{1,19}$/.test(value.trim())) {
    id = BigInt(value.trim());
  }

  if (id === null || id < 0n || id > MASK_63) {
    throw new ValidationError(`Invalid vector ID: ${String(value)}`, [
      'vector_id: expected a non-negative 63-bit integer or its decimal string',
    ]);
  }
  return id;
}
