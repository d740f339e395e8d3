/**
 * Test Utilities Module
 *
 * Shared in-process fakes for tests across the codebase.
 *
 * @example
 * ```typescript
 * import { createMemoryStorage, createTestEmbedder } from '../../test-utils/index.js';
 *
 * const storage = createMemoryStorage();
 * const { embedder } = createTestEmbedder();
 * ```
 */

export {
  HashingEmbeddingProvider,
  createTestEmbedder,
  createMemoryStorage,
  FlakyStorage,
  ScriptedLLM,
  type RecordedChat,
} from './fakes.js';

export { createTestDeps, type TestDeps, type TestDepsOptions } from './cli.js';
