/**
 * Command Runtime
 *
 * Wires storage, embeddings, the index builder and the query engine from
 * configuration. Commands that touch the index all start here.
 */

import type Database from 'better-sqlite3';
import { loadConfig } from '../config/loader.js';
import type { Config } from '../config/schema.js';
import { getDb } from '../database/connection.js';
import { SqliteVectorStorage } from '../database/vector-storage.js';
import type { VectorStorage } from '../database/types.js';
import { IndexBuilder } from '../indexer/builder.js';
import { createEmbeddingProvider, createHybridEmbedder } from '../indexer/embedder/index.js';
import type { HybridEmbedder } from '../indexer/embedder/types.js';
import { createLLMProvider } from '../providers/llm.js';
import type { LLMProvider } from '../providers/types.js';
import { HybridQueryEngine } from '../search/engine.js';
import type { Logger } from '../utils/logger.js';

export interface Runtime {
  storage: VectorStorage;
  embedder: HybridEmbedder;
  builder: IndexBuilder;
  /** Query engine bound to one collection */
  engineFor(collection: string): HybridQueryEngine;
  usedFallback: boolean;
}

export interface RuntimeOptions {
  logger: Logger;
  /** Defaults to the shared database at ~/.ragrail/ragrail.db */
  db?: Database.Database;
}

/**
 * Assemble a runtime around an existing storage and embedder.
 */
export function assembleRuntime(
  config: Config,
  storage: VectorStorage,
  embedder: HybridEmbedder,
  logger: Logger,
  usedFallback = false
): Runtime {
  const builder = new IndexBuilder({
    storage,
    embedder,
    distance: config.collection.distance,
    defaultBatchSize: config.indexing.batch_size,
    logger,
  });

  return {
    storage,
    embedder,
    builder,
    usedFallback,
    engineFor: (collection) =>
      new HybridQueryEngine({
        storage,
        embedder,
        collection,
        rrfK: config.retrieval.rrf_k,
        overFetch: config.retrieval.over_fetch,
        retryBackoffMs: config.retrieval.retry_backoff_ms,
        logger,
      }),
  };
}

/**
 * Open the shared database and the configured embedding provider.
 *
 * @throws CLIError when no embedding provider is usable
 * @throws DatabaseError when the database cannot be opened
 */
export async function createRuntime(config: Config, options: RuntimeOptions): Promise<Runtime> {
  const { logger } = options;
  const storage = new SqliteVectorStorage(options.db ?? getDb(), logger);

  const { provider, usedFallback } = await createEmbeddingProvider(config.embedding, { logger });
  const embedder = createHybridEmbedder(provider, {
    batchSize: config.embedding.batch_size,
    timeoutMs: config.embedding.timeout_ms,
  });
  logger.debug?.(`Embedding model: ${embedder.model}, sparse encoder: ${embedder.sparseEncoder}`);

  return assembleRuntime(config, storage, embedder, logger, usedFallback);
}

// ============================================================================
// Command dependencies
// ============================================================================

/**
 * Everything a command needs from outside the process. Tests swap in
 * in-memory storage, a hashing embedder and a scripted model.
 */
export interface CommandDeps {
  loadConfig: () => Config;
  /** Storage alone, for commands that never embed */
  openStorage: (logger: Logger) => VectorStorage;
  createRuntime: (config: Config, logger: Logger) => Promise<Runtime>;
  createLLM: (config: Config) => Promise<LLMProvider>;
}

export const defaultDeps: CommandDeps = {
  loadConfig: () => loadConfig(),
  openStorage: (logger) => new SqliteVectorStorage(getDb(), logger),
  createRuntime: (config, logger) => createRuntime(config, { logger }),
  createLLM: async (config) => (await createLLMProvider(config)).provider,
};
