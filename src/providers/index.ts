/**
 * Providers Module
 *
 * LLM provider validation, creation and access.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createLLMProvider } from './providers/index.js';
 * const { provider, name, model } = await createLLMProvider(config);
 * ```
 */

// ============================================================================
// VALIDATION UTILITIES
// ============================================================================

export {
  validateProviderKey,
  validateAnthropicKey,
  validateOpenAIKey,
  validateOllamaHost,
  getProviderKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
  OllamaHostSchema,
  type ValidationResult,
  type KeyedProvider,
} from './validation.js';

// ============================================================================
// LLM PROVIDERS
// ============================================================================

export type {
  ChatMessage,
  ChatOptions,
  ChatResponse,
  ChatRole,
  LLMProvider,
  TokenUsage,
} from './types.js';

export { createLLMProvider, type LLMProviderResult, type LLMProviderOptions } from './llm.js';

export {
  createAnthropicProvider,
  AnthropicChatProvider,
  DEFAULT_ANTHROPIC_MODEL,
  type AnthropicProviderOptions,
} from './anthropic.js';

export {
  createOpenAIProvider,
  OpenAIChatProvider,
  DEFAULT_OPENAI_MODEL,
  type OpenAIProviderOptions,
} from './openai.js';

export {
  createOllamaProvider,
  OllamaChatProvider,
  DEFAULT_OLLAMA_MODEL,
  type OllamaProviderOptions,
} from './ollama.js';
