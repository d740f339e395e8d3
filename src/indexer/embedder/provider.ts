/**
 * Embedding Provider Factory
 *
 * Creates the dense embedding provider from the [embedding] config section:
 * 1. Instantiate the configured provider (openai or ollama)
 * 2. Check it is reachable, else try the fallback provider
 * 3. Wrap the result with caching
 */

import type { Config, EmbeddingProviderType } from '../../config/schema.js';
import { getEnv, getOllamaHost } from '../../config/env.js';
import { CLIError, ExitCode } from '../../errors/index.js';
import { getProviderKey, validateOllamaHost } from '../../providers/validation.js';
import { silentLogger } from '../../utils/logger.js';
import { CachedEmbeddingProvider } from './cached.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import type { EmbeddingProvider, EmbeddingProviderResult, ProviderOptions } from './types.js';

/**
 * Instantiate a single provider without checking availability.
 *
 * @throws CLIError when credentials are missing or malformed
 */
export function instantiateEmbeddingProvider(
  type: EmbeddingProviderType,
  model: string,
  options: ProviderOptions = {}
): EmbeddingProvider {
  switch (type) {
    case 'openai':
      return new OpenAIEmbeddingProvider({
        apiKey: getProviderKey('openai'),
        baseURL: getEnv('OPENAI_BASE_URL'),
        model,
        timeoutMs: options.timeoutMs,
        logger: options.logger,
      });
    case 'ollama': {
      const host = getOllamaHost();
      const validation = validateOllamaHost(host);
      if (!validation.valid) {
        throw new CLIError(validation.error, validation.setupInstructions, ExitCode.APIKey);
      }
      return new OllamaEmbeddingProvider({ host, model, logger: options.logger });
    }
  }
}

/**
 * Create an embedding provider from configuration, with fallback.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const { provider, usedFallback } = await createEmbeddingProvider(config.embedding, {
 *   logger: ctx,
 * });
 * ```
 *
 * @throws CLIError if neither the primary nor the fallback provider is usable
 */
export async function createEmbeddingProvider(
  config: Config['embedding'],
  options: ProviderOptions = {}
): Promise<EmbeddingProviderResult> {
  const logger = options.logger ?? silentLogger;
  const providerOptions: ProviderOptions = {
    logger,
    timeoutMs: options.timeoutMs ?? config.timeout_ms,
  };

  const attempts: Array<{ type: EmbeddingProviderType; model: string }> = [
    { type: config.provider, model: config.model },
  ];
  if (config.fallback_provider) {
    attempts.push({
      type: config.fallback_provider,
      model: config.fallback_model ?? config.model,
    });
  }

  const failures: string[] = [];
  for (const [i, attempt] of attempts.entries()) {
    let provider: EmbeddingProvider;
    try {
      provider = instantiateEmbeddingProvider(attempt.type, attempt.model, providerOptions);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failures.push(`${attempt.type}: ${message}`);
      logger.warn(`Embedding provider ${attempt.type} not configured: ${message}`);
      continue;
    }

    if (await provider.isAvailable()) {
      if (i > 0) {
        logger.warn(`Using fallback embedding provider: ${attempt.type}/${attempt.model}`);
      }
      return { provider: new CachedEmbeddingProvider(provider), usedFallback: i > 0 };
    }
    failures.push(`${attempt.type}: model ${attempt.model} is not reachable`);
  }

  throw new CLIError(
    `No embedding provider is available (${failures.join('; ')})`,
    config.provider === 'ollama' || config.fallback_provider === 'ollama'
      ? 'Make sure Ollama is running (ollama serve) and the model is pulled.'
      : 'Check OPENAI_API_KEY and your network connection.'
  );
}
