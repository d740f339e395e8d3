/**
 * Configuration Schema
 *
 * Defines the shape of ~/.ragrail/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * LLM provider type (used in multiple schemas)
 */
export const LLMProviderTypeSchema = z.enum(['anthropic', 'openai', 'ollama']);
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

/**
 * Embedding provider type
 */
export const EmbeddingProviderTypeSchema = z.enum(['openai', 'ollama']);
export type EmbeddingProviderType = z.infer<typeof EmbeddingProviderTypeSchema>;

/**
 * Answer-generation model settings
 */
export const LLMConfigSchema = z.object({
  provider: LLMProviderTypeSchema.describe('LLM provider used for answers and query refinement'),
  model: z.string().min(1).describe('Chat model name'),
  max_tokens: z
    .number()
    .int()
    .min(64)
    .max(32000)
    .describe('Maximum tokens per model reply'),
  temperature: z.number().min(0).max(2).describe('Sampling temperature for answers'),
});

/**
 * Embedding provider configuration
 *
 * Primary and fallback must produce vectors of the same dimensionality
 * for a given collection.
 */
export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderTypeSchema.describe('Embedding provider (openai or ollama)'),
  model: z.string().min(1).describe('Embedding model name'),
  fallback_provider: EmbeddingProviderTypeSchema.optional().describe(
    'Fallback provider if the primary is unavailable'
  ),
  fallback_model: z.string().optional().describe('Fallback model name'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(2048)
    .describe('Number of texts per embedding request'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout in milliseconds for one embedding request'),
});

/**
 * Collection settings
 */
export const CollectionConfigSchema = z.object({
  name: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'Use letters, digits, underscores and hyphens only')
    .describe('Collection used by index, search and ask'),
  distance: z.enum(['cosine', 'dot', 'euclidean']).describe('Dense similarity metric'),
});

/**
 * Indexing configuration
 * Controls file discovery and ingestion batching
 */
export const IndexingConfigSchema = z.object({
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(1000)
    .describe('Chunks embedded and written per ingestion batch'),
  chunk_size: z
    .number()
    .int()
    .min(100)
    .max(20000)
    .describe('Maximum characters per chunk'),
  ignore_patterns: z
    .array(z.string())
    .describe('Additional gitignore-style patterns to ignore during indexing'),
});

/**
 * Hybrid retrieval settings
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of chunks returned per query'),
  dense_weight: z.number().min(0).max(1).describe('Weight of the semantic ranking in fusion'),
  sparse_weight: z.number().min(0).max(1).describe('Weight of the keyword ranking in fusion'),
  rrf_k: z.number().int().min(1).max(1000).describe('Reciprocal Rank Fusion smoothing constant'),
  over_fetch: z
    .number()
    .int()
    .min(1)
    .max(20)
    .describe('Candidates fetched per list, as a multiple of top_k'),
  retry_backoff_ms: z
    .number()
    .int()
    .min(0)
    .max(60000)
    .describe('Delay before the single retry of a failed storage call'),
});

/**
 * Agent loop settings
 */
export const AgentConfigSchema = z.object({
  max_tool_calls: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Maximum retrieval calls per question'),
  refine_queries: z
    .boolean()
    .describe('Let the model request follow-up retrievals with refined queries'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  collection: CollectionConfigSchema,
  indexing: IndexingConfigSchema,
  retrieval: RetrievalConfigSchema,
  agent: AgentConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
