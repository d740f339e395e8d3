/**
 * LLM Provider Types
 *
 * One chat interface over Anthropic, OpenAI and Ollama. The agent's answer
 * generator and query refiner only see this interface.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;
  temperature?: number;
  /** Cancels the in-flight request */
  signal?: AbortSignal;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ChatResponse {
  /** Concatenated text of the reply */
  content: string;
  usage?: TokenUsage;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;
}

/** Shared creation options */
export interface BaseProviderOptions {
  model?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /**
   * Skip the reachability check after creation.
   * @default false
   */
  skipAvailabilityCheck?: boolean;
}
