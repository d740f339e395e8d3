/**
 * Hybrid Embedder
 *
 * Pairs a dense EmbeddingProvider with the sparse lexical encoder. Large
 * batches are split into provider-sized requests and every request is
 * bounded by a timeout.
 */

import { CLIError } from '../../errors/index.js';
import { defaultSparseEncoder, type SparseEncoder } from '../sparse.js';
import type { SparseVector } from '../types.js';
import type { EmbeddingProvider, HybridEmbedder } from './types.js';

/** Texts per provider request */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 32;

/**
 * Thrown when an embedding request takes longer than the configured timeout.
 */
export class EmbeddingTimeoutError extends CLIError {
  constructor(timeoutMs: number) {
    super(
      `Embedding request timed out after ${timeoutMs}ms`,
      'Check that the embedding provider is reachable, or raise embedding.timeout_ms'
    );
    this.name = 'EmbeddingTimeoutError';
  }
}

/**
 * Race a promise against a timeout. The timer is always cleared.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs?: number): Promise<T> {
  if (!timeoutMs) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new EmbeddingTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface HybridEmbedderOptions {
  sparseEncoder?: SparseEncoder;
  /** Texts per provider request (default: 32) */
  batchSize?: number;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Create the embedder used by the index builder and the query engine.
 *
 * @example
 * ```typescript
 * const { provider } = await createEmbeddingProvider(config.embedding);
 * const embedder = createHybridEmbedder(provider, { timeoutMs: config.embedding.timeout_ms });
 *
 * const dense = await embedder.embedDense('What color is the sky?');
 * const sparse = embedder.embedSparse('What color is the sky?');
 * ```
 */
export function createHybridEmbedder(
  provider: EmbeddingProvider,
  options: HybridEmbedderOptions = {}
): HybridEmbedder {
  const sparse = options.sparseEncoder ?? defaultSparseEncoder;
  const batchSize = options.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE;
  const timeoutMs = options.timeoutMs;

  return {
    model: `${provider.name}/${provider.model}`,
    sparseEncoder: sparse.id,

    embedDense(text: string): Promise<number[]> {
      return withTimeout(provider.embed(text), timeoutMs);
    },

    async embedDenseBatch(texts: string[]): Promise<number[][]> {
      const vectors: number[][] = [];
      for (let i = 0; i < texts.length; i += batchSize) {
        const slice = texts.slice(i, i + batchSize);
        const result = await withTimeout(provider.embedBatch(slice), timeoutMs);
        if (result.length !== slice.length) {
          throw new Error(
            `${provider.name} returned ${result.length} embeddings for ${slice.length} inputs`
          );
        }
        vectors.push(...result);
      }
      return vectors;
    },

    embedSparse(text: string): SparseVector {
      return sparse.encode(text);
    },
  };
}
