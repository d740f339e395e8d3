/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  llm: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    max_tokens: 1024,
    temperature: 0.1,
  },

  // Primary and fallback must agree on dimensions for an existing collection
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small', // 1536 dimensions
    batch_size: 32,
    timeout_ms: 120000,
  },

  collection: {
    name: 'hybrid_rag',
    distance: 'cosine',
  },

  indexing: {
    batch_size: 20,
    chunk_size: 2000,
    ignore_patterns: [],
  },

  retrieval: {
    top_k: 5,
    dense_weight: 0.5,
    sparse_weight: 0.5,
    rrf_k: 60,
    over_fetch: 3,
    retry_backoff_ms: 250,
  },

  agent: {
    max_tool_calls: 3,
    refine_queries: true,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.ragrail/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# ragrail configuration
# Location: ~/.ragrail/config.toml (or $RAGRAIL_HOME/config.toml)

# Answer generation
[llm]
provider = "${DEFAULT_CONFIG.llm.provider}"   # anthropic | openai | ollama
model = "${DEFAULT_CONFIG.llm.model}"
max_tokens = ${DEFAULT_CONFIG.llm.max_tokens}
temperature = ${DEFAULT_CONFIG.llm.temperature}

# Embeddings
# Changing the model requires: ragrail index <path> --rebuild
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"   # openai | ollama
model = "${DEFAULT_CONFIG.embedding.model}"
# fallback_provider = "ollama"
# fallback_model = "nomic-embed-text"
batch_size = ${DEFAULT_CONFIG.embedding.batch_size}
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

[collection]
name = "${DEFAULT_CONFIG.collection.name}"
distance = "${DEFAULT_CONFIG.collection.distance}"   # cosine | dot | euclidean

# Ingestion
# ignore_patterns are merged with .gitignore and built-in defaults
[indexing]
batch_size = ${DEFAULT_CONFIG.indexing.batch_size}
chunk_size = ${DEFAULT_CONFIG.indexing.chunk_size}
# ignore_patterns = ["*.tmp", "drafts/"]

# Hybrid retrieval (Reciprocal Rank Fusion)
[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}
dense_weight = ${DEFAULT_CONFIG.retrieval.dense_weight}
sparse_weight = ${DEFAULT_CONFIG.retrieval.sparse_weight}
rrf_k = ${DEFAULT_CONFIG.retrieval.rrf_k}
over_fetch = ${DEFAULT_CONFIG.retrieval.over_fetch}
retry_backoff_ms = ${DEFAULT_CONFIG.retrieval.retry_backoff_ms}

[agent]
max_tool_calls = ${DEFAULT_CONFIG.agent.max_tool_calls}
refine_queries = ${DEFAULT_CONFIG.agent.refine_queries}
`;
