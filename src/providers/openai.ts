/**
 * OpenAI LLM Provider
 *
 * Chat completions through the official openai SDK. OPENAI_BASE_URL points
 * it at any OpenAI-compatible endpoint.
 */

import OpenAI from 'openai';
import { getEnv } from '../config/env.js';
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

export interface OpenAIProviderOptions extends BaseProviderOptions {
  /** Overrides OPENAI_BASE_URL */
  baseURL?: string;
  /** @default 2 */
  maxRetries?: number;
}

export interface OpenAIProviderResult {
  provider: OpenAIChatProvider;
  name: 'openai';
  model: string;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

// ============================================================================
// PROVIDER
// ============================================================================

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIChatProvider implements LLMProvider {
  readonly name = 'openai';

  constructor(
    private readonly client: OpenAI,
    readonly model: string
  ) {}

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
      },
      { signal: options.signal }
    );

    const usage = completion.usage;
    return {
      content: completion.choices[0]?.message.content ?? '',
      usage: usage
        ? { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens }
        : undefined,
    };
  }

  /** True when the model can be retrieved with the configured key */
  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model);
      return true;
    } catch {
      return false;
    }
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a configured OpenAI provider.
 *
 * @throws CLIError (exit code 4) if OPENAI_API_KEY is missing or malformed
 * @throws Error if the availability check fails
 */
export async function createOpenAIProvider(
  options: OpenAIProviderOptions = {}
): Promise<OpenAIProviderResult> {
  const apiKey = getProviderKey('openai');
  const model = options.model ?? DEFAULT_OPENAI_MODEL;

  const client = new OpenAI({
    apiKey,
    baseURL: options.baseURL ?? getEnv('OPENAI_BASE_URL'),
    timeout: options.timeout,
    maxRetries: options.maxRetries ?? 2,
  });
  const provider = new OpenAIChatProvider(client, model);

  if (!options.skipAvailabilityCheck && !(await provider.isAvailable())) {
    throw new Error(
      `OpenAI model ${model} is not available. Check your API key and internet connection.`
    );
  }

  return { provider, name: 'openai', model };
}
