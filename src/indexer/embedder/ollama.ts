/**
 * Ollama Embedding Provider
 *
 * Dense embeddings from a local Ollama server through the ollama SDK.
 * Requires the model to be pulled (ollama pull nomic-embed-text).
 */

import { Ollama } from 'ollama';
import { silentLogger, type Logger } from '../../utils/logger.js';
import type { EmbeddingProvider } from './types.js';

export const DEFAULT_OLLAMA_EMBEDDING_MODEL = 'nomic-embed-text';

export interface OllamaEmbeddingOptions {
  host: string;
  model?: string;
  logger?: Logger;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly model: string;
  private readonly client: Ollama;
  private readonly logger: Logger;

  constructor(options: OllamaEmbeddingOptions) {
    this.model = options.model ?? DEFAULT_OLLAMA_EMBEDDING_MODEL;
    this.logger = options.logger ?? silentLogger;
    this.client = new Ollama({ host: options.host });
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new Error(`Ollama returned no embedding for model ${this.model}`);
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embed({ model: this.model, input: texts });
    if (response.embeddings.length !== texts.length) {
      throw new Error(
        `Ollama returned ${response.embeddings.length} embeddings for ${texts.length} inputs`
      );
    }
    return response.embeddings;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.show({ model: this.model });
      return true;
    } catch (error) {
      this.logger.debug?.(
        `Ollama model ${this.model} unavailable: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }
  }
}
