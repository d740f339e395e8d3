/**
 * LLM Provider Factory
 *
 * Dispatches to the provider-specific factory named by [llm] provider.
 *
 * USAGE:
 * ```typescript
 * const config = loadConfig();
 * const { provider, name, model } = await createLLMProvider(config);
 *
 * const reply = await provider.chat([{ role: 'user', content: 'Hello!' }], {
 *   temperature: config.llm.temperature,
 * });
 * ```
 */

import type { Config, LLMProviderType } from '../config/schema.js';
import { CLIError } from '../errors/index.js';
import { createAnthropicProvider } from './anthropic.js';
import { createOpenAIProvider } from './openai.js';
import { createOllamaProvider } from './ollama.js';
import type { LLMProvider } from './types.js';

export interface LLMProviderResult {
  provider: LLMProvider;
  name: LLMProviderType;
  model: string;
}

export interface LLMProviderOptions {
  /** Overrides [llm] model */
  model?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** @default false */
  skipAvailabilityCheck?: boolean;
}

/**
 * Create the LLM provider configured under [llm].
 *
 * @throws CLIError when credentials are missing (exit code 4) or the
 *   provider cannot be reached
 */
export async function createLLMProvider(
  config: Pick<Config, 'llm'>,
  options: LLMProviderOptions = {}
): Promise<LLMProviderResult> {
  const shared = {
    model: options.model ?? config.llm.model,
    timeout: options.timeout,
    skipAvailabilityCheck: options.skipAvailabilityCheck,
  };

  try {
    switch (config.llm.provider) {
      case 'anthropic':
        return createAnthropicProvider(shared);
      case 'openai':
        return await createOpenAIProvider(shared);
      case 'ollama':
        return await createOllamaProvider(shared);
    }
  } catch (error) {
    if (error instanceof CLIError) {
      throw error;
    }
    throw new CLIError(
      error instanceof Error ? error.message : String(error),
      `Check the [llm] section: ragrail config get llm.provider`
    );
  }
}
