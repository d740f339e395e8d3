/**
 * Embedder Module
 *
 * Dense embedding providers plus the hybrid (dense + sparse) embedder.
 */

export type {
  EmbeddingProvider,
  HybridEmbedder,
  ProviderOptions,
  EmbeddingProviderResult,
} from './types.js';
export {
  createHybridEmbedder,
  withTimeout,
  EmbeddingTimeoutError,
  DEFAULT_EMBEDDING_BATCH_SIZE,
  type HybridEmbedderOptions,
} from './embedder.js';
export { CachedEmbeddingProvider, DEFAULT_CACHE_SIZE } from './cached.js';
export { OpenAIEmbeddingProvider, DEFAULT_OPENAI_EMBEDDING_MODEL } from './openai.js';
export { OllamaEmbeddingProvider, DEFAULT_OLLAMA_EMBEDDING_MODEL } from './ollama.js';
export { createEmbeddingProvider, instantiateEmbeddingProvider } from './provider.js';
