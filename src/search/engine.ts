/**
 * Hybrid Query Engine
 *
 * Dense and sparse retrieval against one collection, fused with weighted
 * RRF:
 *
 *   validate → collection checks → (dense ∥ sparse) → fuse → fetch text
 *
 * Storage and embedding failures get one retry after a short backoff, then
 * surface as RetrievalUnavailableError.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import type { CollectionInfo, ScoredHit, VectorStorage } from '../database/types.js';
import type { HybridEmbedder } from '../indexer/embedder/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
  FusionInconsistencyError,
  IndexMismatchError,
  InvalidQueryError,
  RetrievalUnavailableError,
} from './errors.js';
import { DEFAULT_RRF_K, fuseRankings } from './fusion.js';
import type { HybridQueryEngineOptions, Query, RetrievalResult } from './types.js';

export const DEFAULT_OVER_FETCH = 3;
export const DEFAULT_RETRY_BACKOFF_MS = 250;

const WeightSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .finite('must be finite')
  .min(0, 'must be between 0 and 1')
  .max(1, 'must be between 0 and 1');

export const QuerySchema = z
  .object({
    text: z.string({ invalid_type_error: 'must be a string' }).trim().min(1, 'must not be blank'),
    topK: z
      .number({ invalid_type_error: 'must be a number' })
      .int('must be a positive integer')
      .positive('must be a positive integer'),
    denseWeight: WeightSchema,
    sparseWeight: WeightSchema,
  })
  .refine((q) => q.denseWeight > 0 || q.sparseWeight > 0, {
    message: 'at least one of denseWeight and sparseWeight must be positive',
  });

/**
 * Validate a query.
 *
 * @throws InvalidQueryError listing every failed rule
 */
export function validateQuery(query: Query): Query {
  const result = QuerySchema.safeParse(query);
  if (!result.success) {
    throw new InvalidQueryError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}

function isDomainError(error: unknown): boolean {
  return (
    error instanceof InvalidQueryError ||
    error instanceof IndexMismatchError ||
    error instanceof FusionInconsistencyError
  );
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Hybrid search over one collection.
 *
 * @example
 * ```typescript
 * const engine = new HybridQueryEngine({ storage, embedder, collection: 'hybrid_rag' });
 * const results = await engine.search({
 *   text: 'What color is the sky?',
 *   topK: 5,
 *   denseWeight: 0.5,
 *   sparseWeight: 0.5,
 * });
 * ```
 */
export class HybridQueryEngine {
  readonly collection: string;
  private readonly storage: VectorStorage;
  private readonly embedder: HybridEmbedder;
  private readonly rrfK: number;
  private readonly overFetch: number;
  private readonly retryBackoffMs: number;
  private readonly logger: Logger;

  constructor(options: HybridQueryEngineOptions) {
    this.storage = options.storage;
    this.embedder = options.embedder;
    this.collection = options.collection;
    this.rrfK = options.rrfK ?? DEFAULT_RRF_K;
    this.overFetch = options.overFetch ?? DEFAULT_OVER_FETCH;
    this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run a hybrid query.
   *
   * @throws InvalidQueryError on a malformed query
   * @throws IndexMismatchError if the collection was built by another model or encoder
   * @throws FusionInconsistencyError if a hit has no stored text
   * @throws RetrievalUnavailableError if storage or embedding fails twice
   */
  async search(query: Query): Promise<RetrievalResult> {
    const { text, topK, denseWeight, sparseWeight } = validateQuery(query);

    const collection = await this.withRetry('read collection', async () => {
      const info = await this.storage.getCollection(this.collection);
      if (!info) return null;
      const count = await this.storage.countEntries(this.collection);
      return count > 0 ? info : null;
    });
    if (!collection) {
      this.logger.debug?.(`Collection "${this.collection}" is missing or empty`);
      return [];
    }
    this.checkCompatible(collection);

    const limit = topK * this.overFetch;
    const [dense, sparse] = await this.withRetry('search', () =>
      Promise.all([
        denseWeight > 0 ? this.searchDense(collection, text, limit) : Promise.resolve([]),
        sparseWeight > 0 ? this.searchSparse(text, limit) : Promise.resolve([]),
      ])
    );

    const fused = fuseRankings(dense, sparse, { k: this.rrfK, denseWeight, sparseWeight }).slice(
      0,
      topK
    );
    if (fused.length === 0) {
      return [];
    }

    const ids = fused.map((hit) => hit.id);
    const stored = await this.withRetry('fetch entries', () =>
      this.storage.getEntries(this.collection, ids)
    );
    const missing = ids.filter((id) => !stored.has(id));
    if (missing.length > 0) {
      throw new FusionInconsistencyError(this.collection, missing);
    }

    return fused.map((hit, i) => {
      const entry = stored.get(hit.id);
      const metadata = entry?.metadata ?? {};
      const sourcePath = metadata['sourcePath'];
      return {
        chunkId: hit.id,
        text: entry?.text ?? '',
        sourcePath: typeof sourcePath === 'string' ? sourcePath : '',
        score: hit.score,
        rank: i + 1,
        metadata,
      };
    });
  }

  private checkCompatible(collection: CollectionInfo): void {
    if (collection.embeddingModel !== this.embedder.model) {
      throw new IndexMismatchError(
        `Collection "${collection.name}" was built with embedding model ${collection.embeddingModel}, but queries use ${this.embedder.model}`
      );
    }
    if (collection.sparseEncoder !== this.embedder.sparseEncoder) {
      throw new IndexMismatchError(
        `Collection "${collection.name}" was built with sparse encoder ${collection.sparseEncoder}, but queries use ${this.embedder.sparseEncoder}`
      );
    }
    if (collection.status === 'building') {
      this.logger.warn(`Collection "${collection.name}" is not fully built; results may be partial`);
    }
  }

  private async searchDense(
    collection: CollectionInfo,
    text: string,
    limit: number
  ): Promise<ScoredHit[]> {
    const vector = await this.embedder.embedDense(text);
    if (vector.length !== collection.dimensions) {
      throw new IndexMismatchError(
        `Query vector has ${vector.length} dimensions, collection "${collection.name}" has ${collection.dimensions}`
      );
    }
    return this.storage.searchDense(this.collection, vector, limit);
  }

  private searchSparse(text: string, limit: number): Promise<ScoredHit[]> {
    return this.storage.searchSparse(this.collection, this.embedder.embedSparse(text), limit);
  }

  /**
   * Run a storage/embedding step, retrying once after the backoff.
   * Domain errors pass straight through.
   */
  private async withRetry<T>(step: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (first) {
      if (isDomainError(first)) throw first;
      this.logger.warn(
        `Retrieval step "${step}" failed, retrying in ${this.retryBackoffMs}ms: ${errorMessage(first)}`
      );
    }

    await sleep(this.retryBackoffMs);

    try {
      return await fn();
    } catch (second) {
      if (isDomainError(second)) throw second;
      throw new RetrievalUnavailableError(
        `Retrieval unavailable (${step}): ${errorMessage(second)}`,
        second
      );
    }
  }
}
