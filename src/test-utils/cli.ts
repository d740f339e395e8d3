/**
 * Command dependencies backed by the in-process fakes, so CLI commands
 * run end to end without a network, an API key or a database file.
 */

import { assembleRuntime, type CommandDeps } from '../cli/runtime.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import type { VectorStorage } from '../database/types.js';
import {
  createMemoryStorage,
  createTestEmbedder,
  ScriptedLLM,
  type HashingEmbeddingProvider,
} from './fakes.js';

export interface TestDeps extends CommandDeps {
  config: Config;
  storage: VectorStorage;
  provider: HashingEmbeddingProvider;
  llm: ScriptedLLM;
}

export interface TestDepsOptions {
  /** Model replies, in order */
  replies?: Array<string | Error>;
  storage?: VectorStorage;
  configure?: (config: Config) => void;
}

export function createTestDeps(options: TestDepsOptions = {}): TestDeps {
  const config = structuredClone(DEFAULT_CONFIG);
  config.retrieval.retry_backoff_ms = 0;
  options.configure?.(config);

  const storage = options.storage ?? createMemoryStorage();
  const { provider, embedder } = createTestEmbedder();
  const llm = new ScriptedLLM(options.replies ?? []);

  return {
    config,
    storage,
    provider,
    llm,
    loadConfig: () => config,
    openStorage: () => storage,
    createRuntime: async (cfg, logger) => assembleRuntime(cfg, storage, embedder, logger),
    createLLM: async () => llm,
  };
}
