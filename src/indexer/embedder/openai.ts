/**
 * OpenAI Embedding Provider
 *
 * Dense embeddings through the official openai SDK. Also works against
 * OpenAI-compatible endpoints via OPENAI_BASE_URL.
 */

import OpenAI from 'openai';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { EmbeddingProvider } from './types.js';

export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;
  private readonly client: OpenAI;
  private readonly logger: Logger;

  constructor(options: OpenAIEmbeddingOptions) {
    this.model = options.model ?? DEFAULT_OPENAI_EMBEDDING_MODEL;
    this.logger = options.logger ?? silentLogger;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 2,
    });
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new Error(`OpenAI returned no embedding for model ${this.model}`);
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings.create({ model: this.model, input: texts });
    if (response.data.length !== texts.length) {
      throw new Error(
        `OpenAI returned ${response.data.length} embeddings for ${texts.length} inputs`
      );
    }
    // The API tags each vector with its input position
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model);
      return true;
    } catch (error) {
      this.logger.debug?.(
        `OpenAI model ${this.model} unavailable: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }
  }
}
