/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `ragrail config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  LLMProviderTypeSchema,
  EmbeddingProviderTypeSchema,
  EmbeddingConfigSchema,
  RetrievalConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, LLMProviderType, EmbeddingProviderType } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  parseValue,
  deepMerge,
  CONFIG_KEYS,
} from './loader.js';

// Paths
export { getRagrailDir, getDbPath, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  getApiKey,
  API_KEY_ENV,
  getOllamaHost,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';
