/**
 * Search Module
 *
 * Hybrid (dense + sparse) retrieval with Reciprocal Rank Fusion.
 *
 * @example
 * ```typescript
 * import { HybridQueryEngine, formatResults } from './search/index.js';
 *
 * const engine = new HybridQueryEngine({ storage, embedder, collection: 'hybrid_rag' });
 * const results = await engine.search({ text: 'sky', topK: 5, denseWeight: 0.5, sparseWeight: 0.5 });
 * console.log(formatResults(results));
 * ```
 */

// Types
export type {
  Query,
  RetrievedChunk,
  RetrievalResult,
  FusionConfig,
  FusedHit,
  HybridQueryEngineOptions,
  FormatOptions,
  FormattedResultJSON,
} from './types.js';

// Engine
export {
  HybridQueryEngine,
  QuerySchema,
  validateQuery,
  DEFAULT_OVER_FETCH,
  DEFAULT_RETRY_BACKOFF_MS,
} from './engine.js';

// Fusion
export { fuseRankings, DEFAULT_RRF_K } from './fusion.js';

// Errors
export {
  InvalidQueryError,
  RetrievalUnavailableError,
  FusionInconsistencyError,
  IndexMismatchError,
} from './errors.js';

// Formatting
export {
  formatResult,
  formatResults,
  formatResultJSON,
  formatResultsJSON,
  formatScore,
  truncateSnippet,
} from './formatter.js';
