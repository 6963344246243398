/**
 * Database Schema Types
 *
 * Row shape of the `points` table and the vector BLOB encoding.
 */

/**
 * A stored point. `id` is the decimal form of the 63-bit point id, since
 * SQLite integers would need BigInt mode on every statement.
 */
export interface PointRow {
  id: string;
  collection: string;
  /** Float32 little-endian vector */
  vector: Buffer;
  /** JSON-encoded payload */
  payload: string;
  file_path: string;
  updated_at: string;
}

/**
 * Encode a vector as a Float32 BLOB.
 *
 * @example
 * ```ts
 * db.prepare('UPDATE points SET vector = ? WHERE id = ?').run(vectorToBlob(vector), id);
 * ```
 */
export function vectorToBlob(vector: number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Decode a Float32 BLOB. The bytes are copied so the result does not alias
 * the driver's buffer.
 */
export function blobToVector(blob: Buffer): number[] {
  const copy = new Uint8Array(blob);
  return Array.from(new Float32Array(copy.buffer, 0, Math.floor(copy.byteLength / 4)));
}
