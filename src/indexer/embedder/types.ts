/**
 * Embedder Types
 *
 * Two layers:
 * - EmbeddingProvider: one dense embedding backend (OpenAI, Ollama, a fake)
 * - HybridEmbedder: what indexing and querying use, pairing a dense
 *   provider with the sparse lexical encoder
 */

import type { SparseVector } from '../types.js';
import type { Logger } from '../../utils/logger.js';

/**
 * A dense embedding backend.
 */
export interface EmbeddingProvider {
  /** Backend name, e.g. 'openai' */
  readonly name: string;
  /** Model identifier sent to the backend */
  readonly model: string;
  embed(text: string): Promise<number[]>;
  /** One vector per input, in input order */
  embedBatch(texts: string[]): Promise<number[][]>;
  /** Cheap reachability check; never throws */
  isAvailable(): Promise<boolean>;
}

/**
 * Dense + sparse embedding for index entries and queries.
 */
export interface HybridEmbedder {
  /** Dense model id recorded on collections, e.g. 'openai/text-embedding-3-small' */
  readonly model: string;
  /** Sparse encoder version recorded on collections */
  readonly sparseEncoder: string;
  embedDense(text: string): Promise<number[]>;
  embedDenseBatch(texts: string[]): Promise<number[][]>;
  embedSparse(text: string): SparseVector;
}

/**
 * Options for creating embedding providers.
 */
export interface ProviderOptions {
  /** Receives availability and fallback messages */
  logger?: Logger;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Result from createEmbeddingProvider().
 */
export interface EmbeddingProviderResult {
  /** Provider wrapped with caching */
  provider: EmbeddingProvider;
  /** True when the fallback provider was used */
  usedFallback: boolean;
}
