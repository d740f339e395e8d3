/**
 * Ollama LLM Provider
 *
 * Chat with local models through the ollama SDK. Runs entirely offline once
 * the model is pulled.
 */

import { Ollama } from 'ollama';
import { getOllamaHost } from '../config/env.js';
import { validateOllamaHost } from './validation.js';
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

export interface OllamaProviderOptions extends BaseProviderOptions {
  /** Overrides OLLAMA_HOST */
  host?: string;
  /** How long the model stays loaded after a request, e.g. '5m' */
  keepAlive?: string;
}

export interface OllamaProviderResult {
  provider: OllamaChatProvider;
  name: 'ollama';
  model: string;
  host: string;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_OLLAMA_MODEL = 'llama3.2';

// ============================================================================
// PROVIDER
// ============================================================================

export class OllamaChatProvider implements LLMProvider {
  readonly name = 'ollama';

  constructor(
    private readonly client: Ollama,
    readonly model: string,
    private readonly keepAlive?: string
  ) {}

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    const onAbort = (): void => this.client.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.client.chat({
        model: this.model,
        messages,
        stream: false,
        keep_alive: this.keepAlive,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens,
        },
      });
      return {
        content: response.message.content,
        usage: { inputTokens: response.prompt_eval_count, outputTokens: response.eval_count },
      };
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /** True when the server is up and the model is pulled */
  async isAvailable(): Promise<boolean> {
    try {
      await this.client.show({ model: this.model });
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
 * Create a configured Ollama provider.
 *
 * @throws Error if the host URL is invalid or the server is not running
 *
 * @example
 * ```typescript
 * const { provider } = await createOllamaProvider({ model: 'llama3.2' });
 * ```
 */
export async function createOllamaProvider(
  options: OllamaProviderOptions = {}
): Promise<OllamaProviderResult> {
  const host = options.host ?? getOllamaHost();
  const validation = validateOllamaHost(host);
  if (!validation.valid) {
    throw new Error(`${validation.error}\n\n${validation.setupInstructions}`);
  }

  const model = options.model ?? DEFAULT_OLLAMA_MODEL;
  const provider = new OllamaChatProvider(new Ollama({ host }), model, options.keepAlive);

  if (!options.skipAvailabilityCheck && !(await provider.isAvailable())) {
    throw new Error(
      `Ollama server is not available at ${host}.\n\n` +
        'To fix this:\n' +
        '1. Make sure Ollama is installed (https://ollama.com/)\n' +
        '2. Start the server: ollama serve\n' +
        `3. Pull the model: ollama pull ${model}`
    );
  }

  return { provider, name: 'ollama', model, host };
}
