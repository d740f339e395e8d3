/**
 * Anthropic Claude LLM Provider
 *
 * Chat through the official @anthropic-ai/sdk. System messages are lifted
 * into the request's `system` field, as the Messages API requires.
 *
 * SECURITY: The API key is retrieved only after validation passes and is
 * never logged.
 */

import Anthropic from '@anthropic-ai/sdk';
import { getProviderKey } from './validation.js';
import type {
  BaseProviderOptions,
  ChatMessage,
  ChatOptions,
  ChatResponse,
  LLMProvider,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AnthropicProviderOptions extends BaseProviderOptions {
  /**
   * Maximum number of retries for failed requests.
   * @default 2
   */
  maxRetries?: number;
}

export interface AnthropicProviderResult {
  provider: AnthropicChatProvider;
  name: 'anthropic';
  model: string;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';

const DEFAULT_MAX_TOKENS = 1024;

// ============================================================================
// PROVIDER
// ============================================================================

export class AnthropicChatProvider implements LLMProvider {
  readonly name = 'anthropic';

  constructor(
    private readonly client: Anthropic,
    readonly model: string
  ) {}

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const turns = messages.flatMap((m) =>
      m.role === 'system' ? [] : [{ role: m.role, content: m.content }]
    );

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options.temperature,
        ...(system ? { system } : {}),
        messages: turns,
      },
      { signal: options.signal }
    );

    const content = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    return {
      content,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a configured Anthropic provider.
 *
 * @throws CLIError (exit code 4) if ANTHROPIC_API_KEY is missing or malformed
 *
 * @example
 * ```typescript
 * const { provider } = createAnthropicProvider({ model: 'claude-3-5-haiku-20241022' });
 * const reply = await provider.chat([{ role: 'user', content: 'Hello!' }]);
 * ```
 */
export function createAnthropicProvider(
  options: AnthropicProviderOptions = {}
): AnthropicProviderResult {
  const apiKey = getProviderKey('anthropic');
  const model = options.model ?? DEFAULT_ANTHROPIC_MODEL;

  const client = new Anthropic({
    apiKey,
    timeout: options.timeout,
    maxRetries: options.maxRetries ?? 2,
  });

  return { provider: new AnthropicChatProvider(client, model), name: 'anthropic', model };
}
