/**
 * Index Builder
 *
 * Turns a chunk source into a ready collection:
 * probe → create ('building') → embed + write in batches → mark 'ready'
 *
 * A collection that is already populated and ready is reused untouched, so
 * calling buildOrReuse at every startup is cheap. Failures leave the partial
 * collection 'building' and are never resumed implicitly.
 */

import type { DistanceMetric, VectorStorage } from '../database/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { HybridEmbedder } from './embedder/types.js';
import { IncompleteCollectionError, IngestionError } from './errors.js';
import type { BuildOptions, BuildResult, Chunk, ChunkSource, IndexEntry } from './types.js';

/** Chunks per embed-and-write batch */
export const DEFAULT_INGEST_BATCH_SIZE = 20;

/** Text embedded once to learn the model's dimensionality */
const DIMENSION_PROBE = 'dimension probe';

export interface IndexBuilderOptions {
  storage: VectorStorage;
  embedder: HybridEmbedder;
  /** Metric for new collections (default: cosine) */
  distance?: DistanceMetric;
  /** Batch size when buildOrReuse gets none (default: 20) */
  defaultBatchSize?: number;
  logger?: Logger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Builds collections from chunk sources.
 *
 * @example
 * ```typescript
 * const builder = new IndexBuilder({ storage, embedder });
 * const source = await DirectoryChunkSource.open('./docs');
 *
 * const result = await builder.buildOrReuse('hybrid_rag', source, {
 *   onProgress: (batch, written) => spinner.text = `Batch ${batch + 1}: ${written} chunks`,
 * });
 * ```
 */
export class IndexBuilder {
  private readonly storage: VectorStorage;
  private readonly embedder: HybridEmbedder;
  private readonly distance: DistanceMetric;
  private readonly defaultBatchSize: number;
  private readonly logger: Logger;

  constructor(options: IndexBuilderOptions) {
    this.storage = options.storage;
    this.embedder = options.embedder;
    this.distance = options.distance ?? 'cosine';
    this.defaultBatchSize = options.defaultBatchSize ?? DEFAULT_INGEST_BATCH_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Create and populate a collection, or reuse it when it is already built.
   *
   * @throws IncompleteCollectionError if a non-empty collection is still
   *   'building' and `rebuild` is not set
   * @throws IngestionError if a batch fails or the signal aborts
   */
  async buildOrReuse(
    collectionName: string,
    source: ChunkSource,
    options: BuildOptions = {}
  ): Promise<BuildResult> {
    const batchSize = options.batchSize ?? this.defaultBatchSize;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    const existing = await this.storage.getCollection(collectionName);
    if (existing) {
      const count = await this.storage.countEntries(collectionName);

      if (count > 0 && !options.rebuild) {
        if (existing.status === 'building') {
          throw new IncompleteCollectionError(collectionName);
        }
        this.logger.debug?.(`Reusing collection "${collectionName}" (${count} entries)`);
        return { created: false, entryCount: count, skipped: 0, batches: 0 };
      }
    }

    // Measure the dimension first; an embedder failure leaves an existing collection untouched
    let dimensions: number;
    try {
      dimensions = (await this.embedder.embedDense(DIMENSION_PROBE)).length;
    } catch (error) {
      throw new IngestionError(
        `Embedding provider failed the dimension probe: ${errorMessage(error)}`,
        0,
        error
      );
    }
    if (dimensions === 0) {
      throw new IngestionError('Embedding provider returned an empty vector', 0);
    }

    if (existing) {
      // Rebuild, or an empty shell whose schema may be stale
      await this.storage.deleteCollection(collectionName);
    }

    await this.storage.createCollection({
      name: collectionName,
      dimensions,
      distance: this.distance,
      embeddingModel: this.embedder.model,
      sparseEncoder: this.embedder.sparseEncoder,
    });

    let batchIndex = 0;
    let written = 0;
    let skipped = 0;
    let pending: Chunk[] = [];

    const flush = async (): Promise<void> => {
      if (options.signal?.aborted) {
        throw new IngestionError(
          `Build of "${collectionName}" aborted before batch ${batchIndex}`,
          batchIndex,
          options.signal.reason
        );
      }
      const batch = pending;
      pending = [];
      try {
        await this.writeBatch(collectionName, batch, dimensions);
      } catch (error) {
        throw new IngestionError(
          `Batch ${batchIndex} of "${collectionName}" failed: ${errorMessage(error)}`,
          batchIndex,
          error
        );
      }
      written += batch.length;
      options.onProgress?.(batchIndex, written);
      batchIndex++;
    };

    for await (const chunk of source) {
      if (chunk.text.trim() === '') {
        skipped++;
        this.logger.warn(`Skipping blank chunk ${chunk.id} (${chunk.sourcePath})`);
        continue;
      }
      pending.push(chunk);
      if (pending.length >= batchSize) {
        await flush();
      }
    }
    if (pending.length > 0) {
      await flush();
    }

    await this.storage.markReady(collectionName);
    return { created: true, entryCount: written, skipped, batches: batchIndex };
  }

  private async writeBatch(
    collectionName: string,
    batch: Chunk[],
    dimensions: number
  ): Promise<void> {
    const dense = await this.embedder.embedDenseBatch(batch.map((chunk) => chunk.text));
    if (dense.length !== batch.length) {
      throw new Error(`Expected ${batch.length} dense vectors, got ${dense.length}`);
    }

    const entries: IndexEntry[] = batch.map((chunk, i) => {
      const vector = dense[i] ?? [];
      if (vector.length !== dimensions) {
        throw new Error(
          `Chunk ${chunk.id} embedded to ${vector.length} dimensions, expected ${dimensions}`
        );
      }
      return {
        id: chunk.id,
        dense: vector,
        sparse: this.embedder.embedSparse(chunk.text),
        text: chunk.text,
        metadata: {
          ...chunk.metadata,
          sourcePath: chunk.sourcePath,
          sequenceIndex: chunk.sequenceIndex,
        },
      };
    });

    await this.storage.upsert(collectionName, entries);
  }
}
