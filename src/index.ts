/**
 * ragrail - Library Entry Point
 *
 * The CLI (`ragrail`) covers the common workflow:
 * ```bash
 * ragrail index ./docs                       # Build the default collection
 * ragrail search "What color is the sky?"    # Hybrid retrieval only
 * ragrail ask "What color is the sky?"       # Grounded answer
 * ```
 *
 * This module exports the pieces behind those commands for embedding the
 * pipeline in another program.
 *
 * @example Index and search
 * ```typescript
 * import {
 *   getDb,
 *   SqliteVectorStorage,
 *   IndexBuilder,
 *   HybridQueryEngine,
 *   chunksFromTexts,
 *   createHybridEmbedder,
 * } from 'ragrail';
 *
 * const storage = new SqliteVectorStorage(getDb());
 * const embedder = createHybridEmbedder(provider, { batchSize: 32 });
 * await new IndexBuilder({ storage, embedder }).buildOrReuse('notes', chunksFromTexts(texts));
 *
 * const engine = new HybridQueryEngine({ storage, embedder, collection: 'notes' });
 * const results = await engine.search({
 *   text: 'What color is the sky?',
 *   topK: 3,
 *   denseWeight: 0.5,
 *   sparseWeight: 0.5,
 * });
 * ```
 *
 * @example Grounded question answering
 * ```typescript
 * import { createGroundedAgent, createLLMProvider, loadConfig } from 'ragrail';
 *
 * const config = loadConfig();
 * const { provider: llm } = await createLLMProvider(config);
 * const agent = createGroundedAgent(config, { engine, llm });
 * const turn = await agent.ask('What color is the sky?');
 * ```
 *
 * @packageDocumentation
 */

// Errors
export {
  CLIError,
  ConfigError,
  DatabaseError,
  ValidationError,
  APIKeyError,
  FileNotFoundError,
} from './errors/index.js';

// Configuration
export { loadConfig, DEFAULT_CONFIG, ConfigSchema } from './config/index.js';
export type { Config } from './config/index.js';

// Storage
export { getDb, closeDb, openDatabase, SqliteVectorStorage } from './database/index.js';
export type {
  VectorStorage,
  CollectionInfo,
  CollectionStatus,
  ScoredHit,
  StoredEntry,
} from './database/index.js';

// Indexing
export {
  IndexBuilder,
  IngestionError,
  IncompleteCollectionError,
  DirectoryChunkSource,
  chunksFromTexts,
  splitText,
  Bm25TfEncoder,
  createHybridEmbedder,
  createEmbeddingProvider,
} from './indexer/index.js';
export type {
  Chunk,
  ChunkSource,
  SparseVector,
  IndexEntry,
  BuildResult,
  EmbeddingProvider,
  HybridEmbedder,
} from './indexer/index.js';

// Retrieval
export {
  HybridQueryEngine,
  fuseRankings,
  InvalidQueryError,
  RetrievalUnavailableError,
  FusionInconsistencyError,
  IndexMismatchError,
} from './search/index.js';
export type { Query, RetrievedChunk, HybridQueryEngineOptions } from './search/index.js';

// LLM providers
export { createLLMProvider } from './providers/index.js';
export type { LLMProvider, ChatMessage, ChatOptions, ChatResponse } from './providers/index.js';

// Agent
export {
  GroundedAgent,
  createGroundedAgent,
  LLMAnswerGenerator,
  LLMQueryRefiner,
  RetrievalTool,
} from './agent/index.js';
export type { AgentTurn, AgentEvent, AskOptions, RetrievedPassage } from './agent/index.js';

export type { Logger } from './utils/index.js';
