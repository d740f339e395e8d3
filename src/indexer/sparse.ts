/**
 * Sparse Lexical Encoder
 *
 * Turns text into a sparse term-weight vector for keyword matching. The
 * same function must run at ingestion and at query time; its version id is
 * stored on the collection and checked by the query engine.
 *
 * - Tokens: NFKC-normalized, lower-cased runs of letters and digits
 * - Term ids: FNV-1a 32-bit hash of the token
 * - Weights: BM25 term-frequency saturation
 *
 *     w = tf * (k1 + 1) / (tf + k1 * (1 - b + b * len / avgLen))
 *
 * Document frequencies are not used, so encoding needs no corpus statistics
 * and an entry's vector never changes after it is written.
 */

import type { SparseVector } from './types.js';

/** BM25 saturation parameter */
export const BM25_K1 = 1.2;
/** BM25 length normalization */
export const BM25_B = 0.75;
/** Assumed average length (in tokens) for length normalization */
export const BM25_AVG_LENGTH = 256;

export interface SparseEncoder {
  /** Version id stored on collections built with this encoder */
  readonly id: string;
  encode(text: string): SparseVector;
}

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * FNV-1a 32-bit hash over the UTF-8 bytes of a string, as an unsigned integer.
 */
export function fnv1a32(value: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(value, 'utf8')) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Split text into normalized tokens.
 *
 * @example
 * ```typescript
 * tokenize('What color is the sky?'); // ['what', 'color', 'is', 'the', 'sky']
 * ```
 */
export function tokenize(text: string): string[] {
  return text
    .normalize('NFKC')
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/**
 * BM25-saturated term-frequency encoder over hashed tokens.
 */
export class Bm25TfEncoder implements SparseEncoder {
  readonly id = 'bm25-tf/fnv1a32/v1';

  encode(text: string): SparseVector {
    const tokens = tokenize(text);
    if (tokens.length === 0) {
      return { indices: [], values: [] };
    }

    // Colliding tokens share a term id and add their frequencies
    const frequencies = new Map<number, number>();
    for (const token of tokens) {
      const term = fnv1a32(token);
      frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
    }

    const lengthNorm = 1 - BM25_B + BM25_B * (tokens.length / BM25_AVG_LENGTH);
    const indices = [...frequencies.keys()].sort((a, b) => a - b);
    const values = indices.map((term) => {
      const tf = frequencies.get(term) ?? 0;
      return (tf * (BM25_K1 + 1)) / (tf + BM25_K1 * lengthNorm);
    });

    return { indices, values };
  }
}

/** Shared default encoder */
export const defaultSparseEncoder: SparseEncoder = new Bm25TfEncoder();
