/**
 * In-process fakes for tests: a deterministic embedder, a storage wrapper
 * that fails on demand, and an LLM that replies from a script.
 */

import { openDatabase } from '../database/connection.js';
import type {
  CollectionInfo,
  NewCollection,
  ScoredHit,
  StoredEntry,
  VectorStorage,
} from '../database/types.js';
import { SqliteVectorStorage } from '../database/vector-storage.js';
import { DatabaseError } from '../errors/index.js';
import { createHybridEmbedder } from '../indexer/embedder/embedder.js';
import type { EmbeddingProvider, HybridEmbedder } from '../indexer/embedder/types.js';
import { fnv1a32, tokenize } from '../indexer/sparse.js';
import type { IndexEntry, SparseVector } from '../indexer/types.js';
import type { ChatMessage, ChatOptions, ChatResponse, LLMProvider } from '../providers/types.js';

// ============================================================================
// EMBEDDING
// ============================================================================

/**
 * Bag-of-words embedder: each token adds 1 to bucket hash(token) % D, and
 * the vector is L2-normalized. Texts sharing words get similar vectors.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'fake';
  readonly model: string;
  /** Texts seen, one array per embedBatch call */
  readonly calls: string[][] = [];
  /** Makes the next N calls reject */
  failNext = 0;

  constructor(readonly dimensions = 64) {
    this.model = `hashing-${dimensions}`;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector ?? [];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('Simulated embedding failure');
    }
    return texts.map((text) => this.vectorFor(text));
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  private vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const bucket = fnv1a32(token) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

export function createTestEmbedder(dimensions = 64): {
  provider: HashingEmbeddingProvider;
  embedder: HybridEmbedder;
} {
  const provider = new HashingEmbeddingProvider(dimensions);
  return { provider, embedder: createHybridEmbedder(provider) };
}

// ============================================================================
// STORAGE
// ============================================================================

/** Fresh SQLite storage on an in-memory database */
export function createMemoryStorage(): SqliteVectorStorage {
  return new SqliteVectorStorage(openDatabase(':memory:'));
}

type StorageMethod = keyof VectorStorage;

/**
 * Delegates to another storage; selected methods reject while `failures`
 * is positive, consuming one failure per call.
 */
export class FlakyStorage implements VectorStorage {
  /** Remaining calls that will fail */
  failures = 0;
  /** Every call made, by method name */
  readonly calls: StorageMethod[] = [];

  constructor(
    private readonly inner: VectorStorage,
    private readonly failingMethods: ReadonlySet<StorageMethod> = new Set([
      'searchDense',
      'searchSparse',
    ])
  ) {}

  private async guard<T>(method: StorageMethod, fn: () => Promise<T>): Promise<T> {
    this.calls.push(method);
    if (this.failingMethods.has(method) && this.failures > 0) {
      this.failures--;
      throw new DatabaseError(`Simulated outage in ${method}`);
    }
    return fn();
  }

  getCollection(name: string): Promise<CollectionInfo | null> {
    return this.guard('getCollection', () => this.inner.getCollection(name));
  }
  listCollections(): Promise<CollectionInfo[]> {
    return this.guard('listCollections', () => this.inner.listCollections());
  }
  countEntries(name: string): Promise<number> {
    return this.guard('countEntries', () => this.inner.countEntries(name));
  }
  createCollection(input: NewCollection): Promise<CollectionInfo> {
    return this.guard('createCollection', () => this.inner.createCollection(input));
  }
  markReady(name: string): Promise<void> {
    return this.guard('markReady', () => this.inner.markReady(name));
  }
  deleteCollection(name: string): Promise<boolean> {
    return this.guard('deleteCollection', () => this.inner.deleteCollection(name));
  }
  upsert(name: string, entries: IndexEntry[]): Promise<void> {
    return this.guard('upsert', () => this.inner.upsert(name, entries));
  }
  searchDense(name: string, vector: number[], limit: number): Promise<ScoredHit[]> {
    return this.guard('searchDense', () => this.inner.searchDense(name, vector, limit));
  }
  searchSparse(name: string, vector: SparseVector, limit: number): Promise<ScoredHit[]> {
    return this.guard('searchSparse', () => this.inner.searchSparse(name, vector, limit));
  }
  getEntries(name: string, ids: string[]): Promise<Map<string, StoredEntry>> {
    return this.guard('getEntries', () => this.inner.getEntries(name, ids));
  }
}

// ============================================================================
// LLM
// ============================================================================

export interface RecordedChat {
  messages: ChatMessage[];
  options: ChatOptions;
}

/**
 * Replies with the scripted strings in order; an Error in the script is
 * thrown instead. Runs out → throws.
 */
export class ScriptedLLM implements LLMProvider {
  readonly name = 'scripted';
  readonly model = 'scripted-model';
  readonly chats: RecordedChat[] = [];
  private readonly script: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.script = [...replies];
  }

  async chat(messages: ChatMessage[], options: ChatOptions = {}): Promise<ChatResponse> {
    this.chats.push({ messages, options });
    const next = this.script.shift();
    if (next === undefined) {
      throw new Error('ScriptedLLM has no reply left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return { content: next };
  }
}
