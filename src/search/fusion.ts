/**
 * Reciprocal Rank Fusion (RRF)
 *
 * Combines the dense and sparse rankings by rank position rather than raw
 * score, so cosine similarities and BM25 dot products become comparable.
 *
 *   fused(d) = denseWeight / (k + denseRank(d)) + sparseWeight / (k + sparseRank(d))
 *
 * Ranks are 1-based; a document missing from a list gets nothing from it.
 *
 * Reference: Cormack, Clarke & Büttcher (2009)
 * "Reciprocal Rank Fusion outperforms Condorcet and individual Rank Learning Methods"
 */

import type { ScoredHit } from '../database/types.js';
import type { FusedHit, FusionConfig } from './types.js';

export const DEFAULT_RRF_K = 60;

function compareIds(a: string, b: string): number {
  // Code-unit order, independent of locale
  return a < b ? -1 : a > b ? 1 : 0;
}

function bestRank(hit: FusedHit): number {
  return Math.min(hit.denseRank ?? Infinity, hit.sparseRank ?? Infinity);
}

/**
 * Fuse two ranked lists (each sorted best first).
 *
 * Sorted by fused score descending, then best individual rank ascending,
 * then id. Deterministic for the same inputs.
 *
 * @example
 * ```typescript
 * const fused = fuseRankings(
 *   [{ id: 'a', score: 0.9 }, { id: 'b', score: 0.5 }],
 *   [{ id: 'b', score: 3.1 }],
 *   { k: 60, denseWeight: 0.5, sparseWeight: 0.5 }
 * );
 * // b: 0.5/62 + 0.5/61, a: 0.5/61 → [b, a]
 * ```
 */
export function fuseRankings(
  dense: readonly ScoredHit[],
  sparse: readonly ScoredHit[],
  config: FusionConfig
): FusedHit[] {
  const { k, denseWeight, sparseWeight } = config;
  const fused = new Map<string, FusedHit>();

  const entry = (id: string): FusedHit => {
    let hit = fused.get(id);
    if (!hit) {
      hit = { id, score: 0 };
      fused.set(id, hit);
    }
    return hit;
  };

  dense.forEach((result, i) => {
    const hit = entry(result.id);
    // First occurrence wins if a list repeats an id
    if (hit.denseRank !== undefined) return;
    hit.denseRank = i + 1;
    hit.score += denseWeight / (k + hit.denseRank);
  });

  sparse.forEach((result, i) => {
    const hit = entry(result.id);
    if (hit.sparseRank !== undefined) return;
    hit.sparseRank = i + 1;
    hit.score += sparseWeight / (k + hit.sparseRank);
  });

  return [...fused.values()].sort(
    (a, b) => b.score - a.score || bestRank(a) - bestRank(b) || compareIds(a.id, b.id)
  );
}
