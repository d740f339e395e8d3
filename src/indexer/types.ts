/**
 * Indexer Types
 *
 * Type definitions shared by the chunk source, the sparse encoder and the
 * index builder.
 */

// ============================================================================
// Chunks
// ============================================================================

/**
 * One segment of a source document, as produced by a chunk source.
 */
export interface Chunk {
  /** Stable identifier, unique within a collection */
  id: string;
  /** Segment text (non-empty) */
  text: string;
  /** Provenance: where the segment came from (relative path, URL, ...) */
  sourcePath: string;
  /** Position of the segment within its source, starting at 0 */
  sequenceIndex: number;
  /** Additional provenance carried into the index */
  metadata?: Record<string, unknown>;
}

/**
 * A lazily consumed, stably ordered stream of chunks.
 * Any async iterable works, including async generators.
 */
export type ChunkSource = AsyncIterable<Chunk>;

// ============================================================================
// Vectors and Entries
// ============================================================================

/**
 * Sparse term-weight vector.
 *
 * `indices` are term ids, strictly ascending and unique; `values` holds the
 * matching weights, all strictly positive.
 */
export interface SparseVector {
  indices: number[];
  values: number[];
}

/**
 * A chunk in its stored, dual-represented form.
 */
export interface IndexEntry {
  id: string;
  /** Dense embedding; same length for every entry of a collection */
  dense: number[];
  sparse: SparseVector;
  text: string;
  /** Always carries sourcePath and sequenceIndex */
  metadata: Record<string, unknown>;
}

// ============================================================================
// Build Options and Results
// ============================================================================

/**
 * Options for IndexBuilder.buildOrReuse().
 */
export interface BuildOptions {
  /** Drop an existing collection and build it again */
  rebuild?: boolean;
  /** Chunks per embed-and-write batch (default: 20) */
  batchSize?: number;
  /** Checked between batches; aborting fails the build */
  signal?: AbortSignal;
  /** Called after each batch is written */
  onProgress?: (batchIndex: number, entriesWritten: number) => void;
}

/**
 * Outcome of IndexBuilder.buildOrReuse().
 */
export interface BuildResult {
  /** False when an existing, populated collection was reused */
  created: boolean;
  /** Entries in the collection after the call */
  entryCount: number;
  /** Blank chunks that were skipped */
  skipped: number;
  /** Batches written (0 when reused) */
  batches: number;
}
