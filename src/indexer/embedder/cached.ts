/**
 * Caching Embedding Provider
 *
 * Wraps a provider with a bounded LRU cache keyed by text, so repeated
 * chunks and repeated queries are embedded once per process. Cached
 * vectors are copied on the way out so callers cannot mutate them.
 */

import type { EmbeddingProvider } from './types.js';

export const DEFAULT_CACHE_SIZE = 1000;

export class CachedEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  private readonly cache = new Map<string, number[]>();

  constructor(
    private readonly inner: EmbeddingProvider,
    private readonly maxEntries: number = DEFAULT_CACHE_SIZE
  ) {
    this.name = inner.name;
    this.model = inner.model;
  }

  /** Number of cached vectors */
  get size(): number {
    return this.cache.size;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new Error(`No embedding returned for model ${this.model}`);
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    // Resolve the whole batch before storing, since storing can evict hits
    const resolved = new Map<string, number[]>();
    for (const text of texts) {
      const hit = this.cache.get(text);
      if (hit) {
        resolved.set(text, hit);
      }
    }

    const missing = [...new Set(texts.filter((text) => !resolved.has(text)))];
    if (missing.length > 0) {
      const vectors = await this.inner.embedBatch(missing);
      if (vectors.length !== missing.length) {
        throw new Error(
          `${this.name} returned ${vectors.length} embeddings for ${missing.length} inputs`
        );
      }
      missing.forEach((text, i) => resolved.set(text, vectors[i] ?? []));
    }

    for (const [text, vector] of resolved) {
      this.remember(text, vector);
    }

    return texts.map((text) => [...(resolved.get(text) ?? [])]);
  }

  isAvailable(): Promise<boolean> {
    return this.inner.isAvailable();
  }

  private remember(text: string, vector: number[]): void {
    // Re-inserting moves the entry to the newest position
    this.cache.delete(text);
    this.cache.set(text, vector);
    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}
