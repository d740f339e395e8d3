/**
 * Indexer Module
 *
 * Chunk sources, the sparse lexical encoder, embedders and the index
 * builder.
 *
 * @example
 * ```ts
 * import { DirectoryChunkSource, IndexBuilder } from './indexer/index.js';
 *
 * const source = await DirectoryChunkSource.open('./docs');
 * const result = await new IndexBuilder({ storage, embedder }).buildOrReuse('docs', source);
 * console.log(`${result.entryCount} entries (${result.created ? 'built' : 'reused'})`);
 * ```
 */

// Types
export type {
  Chunk,
  ChunkSource,
  SparseVector,
  IndexEntry,
  BuildOptions,
  BuildResult,
} from './types.js';

// Builder
export { IndexBuilder, DEFAULT_INGEST_BATCH_SIZE, type IndexBuilderOptions } from './builder.js';
export { IngestionError, IncompleteCollectionError } from './errors.js';

// Chunk sources
export {
  DirectoryChunkSource,
  discoverFiles,
  chunksFromTexts,
  chunkIdFor,
  DEFAULT_TEXT_EXTENSIONS,
  type DirectorySourceOptions,
} from './source.js';
export { splitText, DEFAULT_CHUNK_SIZE, type SplitOptions } from './chunker.js';

// Ignore pattern utilities
export {
  createIgnoreFilter,
  loadGitignoreFile,
  parseGitignoreContent,
  DEFAULT_IGNORE_PATTERNS,
  type IgnoreFilter,
  type IgnoreFilterOptions,
} from './ignore.js';

// Sparse encoder
export {
  Bm25TfEncoder,
  defaultSparseEncoder,
  fnv1a32,
  tokenize,
  BM25_K1,
  BM25_B,
  BM25_AVG_LENGTH,
  type SparseEncoder,
} from './sparse.js';

// Embedders
export * from './embedder/index.js';
