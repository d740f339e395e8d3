/**
 * Reciprocal Rank Fusion Tests
 *
 * Pure function tests over synthetic ranked lists.
 */

import { describe, it, expect } from 'vitest';
import { fuseRankings, DEFAULT_RRF_K } from '../fusion.js';
import type { ScoredHit } from '../../database/types.js';

const EVEN = { k: DEFAULT_RRF_K, denseWeight: 0.5, sparseWeight: 0.5 };

function hits(...ids: string[]): ScoredHit[] {
  return ids.map((id, i) => ({ id, score: 1 - i * 0.1 }));
}

describe('fuseRankings', () => {
  it('sums weighted reciprocal ranks', () => {
    const fused = fuseRankings(hits('a', 'b'), hits('b', 'c'), EVEN);

    expect(fused.map((h) => h.id)).toEqual(['b', 'a', 'c']);
    expect(fused[0]?.score).toBeCloseTo(0.5 / 62 + 0.5 / 61, 12);
    expect(fused[1]?.score).toBeCloseTo(0.5 / 61, 12);
    expect(fused[2]?.score).toBeCloseTo(0.5 / 62, 12);
  });

  it('records the rank from each list', () => {
    const fused = fuseRankings(hits('a', 'b'), hits('b'), EVEN);

    expect(fused.find((h) => h.id === 'b')).toMatchObject({ denseRank: 2, sparseRank: 1 });
    expect(fused.find((h) => h.id === 'a')).toEqual({
      id: 'a',
      score: 0.5 / 61,
      denseRank: 1,
    });
  });

  it('gives nothing for a missing list', () => {
    const fused = fuseRankings(hits('a', 'b'), [], EVEN);

    expect(fused.map((h) => [h.id, h.score])).toEqual([
      ['a', 0.5 / 61],
      ['b', 0.5 / 62],
    ]);
  });

  it('respects the weights', () => {
    const fused = fuseRankings(hits('a'), hits('b'), { k: 60, denseWeight: 0.2, sparseWeight: 0.8 });

    expect(fused.map((h) => h.id)).toEqual(['b', 'a']);
  });

  it('breaks score ties by best individual rank, then by id', () => {
    // x: dense 1 + sparse 3, y: dense 3 + sparse 1 → equal scores, equal best rank
    // z: dense 2 + sparse 2 → 2/62 vs 1/61 + 1/63
    const fused = fuseRankings(hits('y', 'z', 'x'), hits('x', 'z', 'y'), {
      k: 60,
      denseWeight: 1,
      sparseWeight: 1,
    });

    expect(fused.map((h) => h.id)).toEqual(['x', 'y', 'z']);
  });

  it('prefers the better individual rank when scores tie', () => {
    // With k=0: a = 1/1 (rank 1 only), b = 1/2 + 1/2 (rank 2 in both)
    const fused = fuseRankings(hits('a', 'b'), hits('c', 'b'), {
      k: 0,
      denseWeight: 1,
      sparseWeight: 1,
    });

    expect(fused.map((h) => h.id)).toEqual(['a', 'c', 'b']);
  });

  it('orders ids by code unit, not locale', () => {
    const fused = fuseRankings(hits('b'), hits('B'), EVEN);

    // Same score and rank; 'B' (0x42) < 'b' (0x62)
    expect(fused.map((h) => h.id)).toEqual(['B', 'b']);
  });

  it('is deterministic and monotonic', () => {
    const dense = hits('d1', 'd2', 'shared', 'd3');
    const sparse = hits('shared', 's1', 'd3', 's2');

    const first = fuseRankings(dense, sparse, EVEN);
    const second = fuseRankings(dense, sparse, EVEN);

    expect(first).toEqual(second);
    for (let i = 1; i < first.length; i++) {
      expect(first[i - 1]?.score ?? 0).toBeGreaterThanOrEqual(first[i]?.score ?? 0);
    }
  });

  it('returns an empty list for empty inputs', () => {
    expect(fuseRankings([], [], EVEN)).toEqual([]);
  });
});
