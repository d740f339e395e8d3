/**
 * Search Module Types
 *
 * Type definitions for hybrid queries, fusion and retrieval results.
 */

import type { VectorStorage } from '../database/types.js';
import type { HybridEmbedder } from '../indexer/embedder/types.js';
import type { Logger } from '../utils/logger.js';

// ============================================================================
// Queries
// ============================================================================

/**
 * A hybrid search request.
 */
export interface Query {
  text: string;
  /** Maximum results (positive integer) */
  topK: number;
  /** Weight of the dense (semantic) ranking, in [0, 1] */
  denseWeight: number;
  /** Weight of the sparse (keyword) ranking, in [0, 1] */
  sparseWeight: number;
}

// ============================================================================
// Results
// ============================================================================

/**
 * One fused search hit with its stored text and provenance.
 */
export interface RetrievedChunk {
  chunkId: string;
  text: string;
  sourcePath: string;
  /** Fused RRF score */
  score: number;
  /** 1-based position in the result */
  rank: number;
  metadata: Record<string, unknown>;
}

/** Ordered by score descending; at most topK long */
export type RetrievalResult = RetrievedChunk[];

// ============================================================================
// Fusion
// ============================================================================

/**
 * Weighted Reciprocal Rank Fusion settings.
 */
export interface FusionConfig {
  /** Smoothing constant (default: 60) */
  k: number;
  denseWeight: number;
  sparseWeight: number;
}

/**
 * One entry of a fused ranking, before text lookup.
 */
export interface FusedHit {
  id: string;
  score: number;
  /** 1-based rank in the dense list, if present there */
  denseRank?: number;
  /** 1-based rank in the sparse list, if present there */
  sparseRank?: number;
}

// ============================================================================
// Engine
// ============================================================================

export interface HybridQueryEngineOptions {
  storage: VectorStorage;
  embedder: HybridEmbedder;
  /** Collection to search */
  collection: string;
  /** RRF k (default: 60) */
  rrfK?: number;
  /** Candidates fetched per list = topK × overFetch (default: 3) */
  overFetch?: number;
  /** Wait before the single retry, in milliseconds (default: 250) */
  retryBackoffMs?: number;
  logger?: Logger;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Options for formatting results for display.
 */
export interface FormatOptions {
  /** Maximum snippet length in characters (default: 200) */
  snippetLength?: number;
  /** Show fused score (default: true) */
  showScore?: boolean;
}

/**
 * JSON-serializable search result (the `--json` CLI output).
 */
export interface FormattedResultJSON {
  rank: number;
  score: number;
  chunkId: string;
  sourcePath: string;
  text: string;
  /** Position of the chunk within its file, when the source recorded it */
  sequenceIndex?: number;
}
