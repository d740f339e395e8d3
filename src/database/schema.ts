/**
 * Database Schema Helpers
 *
 * Conversions between in-memory vectors and their SQLite representation.
 */

/**
 * Convert a dense vector to a Float32 BLOB for storage.
 *
 * @example
 * ```ts
 * db.prepare('UPDATE entries SET dense = ? WHERE id = ?').run(vectorToBlob(vector), id);
 * ```
 */
export function vectorToBlob(vector: readonly number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Convert a Float32 BLOB back to a vector.
 *
 * Copies the bytes first: BLOB buffers from better-sqlite3 are not
 * guaranteed to be 4-byte aligned.
 */
export function blobToVector(blob: Buffer): Float32Array {
  const copy = new Uint8Array(blob.length);
  copy.set(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(blob.length / 4));
}

/** Current time as an ISO 8601 string */
export function nowIso(): string {
  return new Date().toISOString();
}
