/**
 * Storage Contract
 *
 * The operations the index builder and the hybrid query engine need from
 * a vector database. SqliteVectorStorage is the bundled implementation;
 * anything offering these primitives (a hosted vector database, an
 * in-memory fake) can stand in.
 */

import type { IndexEntry, SparseVector } from '../indexer/types.js';

/** Dense similarity metric of a collection */
export type DistanceMetric = 'cosine' | 'dot' | 'euclidean';

/** 'building' until every batch of a build has been written */
export type CollectionStatus = 'building' | 'ready';

/**
 * Settings fixed when a collection is created.
 */
export interface NewCollection {
  name: string;
  /** Dense vector length */
  dimensions: number;
  distance: DistanceMetric;
  /** Embedding model that produced the dense vectors */
  embeddingModel: string;
  /** Version id of the sparse encoder that produced the sparse vectors */
  sparseEncoder: string;
}

/**
 * A stored collection record.
 */
export interface CollectionInfo extends NewCollection {
  status: CollectionStatus;
  /** ISO 8601 */
  createdAt: string;
  /** ISO 8601 */
  updatedAt: string;
}

/**
 * One hit of a dense or sparse search. Higher scores are better.
 */
export interface ScoredHit {
  id: string;
  score: number;
}

/**
 * Text and metadata of a stored entry.
 */
export interface StoredEntry {
  id: string;
  text: string;
  metadata: Record<string, unknown>;
}

/**
 * Hybrid-capable vector storage.
 *
 * Search results are sorted by score descending, ties by id ascending.
 */
export interface VectorStorage {
  getCollection(name: string): Promise<CollectionInfo | null>;
  listCollections(): Promise<CollectionInfo[]>;
  countEntries(name: string): Promise<number>;
  createCollection(input: NewCollection): Promise<CollectionInfo>;
  markReady(name: string): Promise<void>;
  /** @returns false when there was nothing to delete */
  deleteCollection(name: string): Promise<boolean>;
  /** Insert or fully replace entries by id */
  upsert(name: string, entries: IndexEntry[]): Promise<void>;
  searchDense(name: string, vector: number[], limit: number): Promise<ScoredHit[]>;
  /** Dot product over shared term ids; entries without overlap are not returned */
  searchSparse(name: string, vector: SparseVector, limit: number): Promise<ScoredHit[]>;
  /** Ids that are not stored are absent from the map */
  getEntries(name: string, ids: string[]): Promise<Map<string, StoredEntry>>;
}
