/**
 * Index Builder Tests
 *
 * Runs against in-memory SQLite storage and the hashing embedder.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IndexBuilder } from '../builder.js';
import { IncompleteCollectionError, IngestionError } from '../errors.js';
import { chunksFromTexts } from '../source.js';
import type { Chunk } from '../types.js';
import {
  createMemoryStorage,
  createTestEmbedder,
  FlakyStorage,
  type HashingEmbeddingProvider,
} from '../../test-utils/index.js';
import type { SqliteVectorStorage } from '../../database/vector-storage.js';
import type { HybridEmbedder } from '../embedder/types.js';

const TEXTS = ['The sky is blue.', 'Cats are mammals.', 'Qdrant stores vectors.'];

describe('IndexBuilder', () => {
  let storage: SqliteVectorStorage;
  let provider: HashingEmbeddingProvider;
  let embedder: HybridEmbedder;

  beforeEach(() => {
    storage = createMemoryStorage();
    ({ provider, embedder } = createTestEmbedder(16));
  });

  it('creates, populates and marks a new collection ready', async () => {
    const builder = new IndexBuilder({ storage, embedder });

    const result = await builder.buildOrReuse('docs', chunksFromTexts(TEXTS));

    expect(result).toEqual({ created: true, entryCount: 3, skipped: 0, batches: 1 });
    const info = await storage.getCollection('docs');
    expect(info).toMatchObject({
      dimensions: 16,
      distance: 'cosine',
      embeddingModel: 'fake/hashing-16',
      sparseEncoder: 'bm25-tf/fnv1a32/v1',
      status: 'ready',
    });
    expect(await storage.countEntries('docs')).toBe(3);
  });

  it('stores provenance in entry metadata', async () => {
    const builder = new IndexBuilder({ storage, embedder });
    const chunk: Chunk = {
      id: 'c1',
      text: 'The sky is blue.',
      sourcePath: 'sky.txt',
      sequenceIndex: 4,
      metadata: { fileName: 'sky.txt' },
    };

    await builder.buildOrReuse('docs', (async function* () { yield chunk; })());

    const entries = await storage.getEntries('docs', ['c1']);
    expect(entries.get('c1')?.metadata).toEqual({
      fileName: 'sky.txt',
      sourcePath: 'sky.txt',
      sequenceIndex: 4,
    });
  });

  it('reuses a ready collection without embedding anything', async () => {
    const builder = new IndexBuilder({ storage, embedder });
    const first = await builder.buildOrReuse('docs', chunksFromTexts(TEXTS));
    const callsAfterFirst = provider.calls.length;

    const second = await builder.buildOrReuse('docs', chunksFromTexts(TEXTS));

    expect(first.created).toBe(true);
    expect(second).toEqual({ created: false, entryCount: 3, skipped: 0, batches: 0 });
    expect(provider.calls).toHaveLength(callsAfterFirst);
  });

  it('rebuilds on request', async () => {
    const builder = new IndexBuilder({ storage, embedder });
    await builder.buildOrReuse('docs', chunksFromTexts(TEXTS));

    const result = await builder.buildOrReuse('docs', chunksFromTexts(['Only one.']), {
      rebuild: true,
    });

    expect(result.created).toBe(true);
    expect(await storage.countEntries('docs')).toBe(1);
  });

  it('recreates an existing empty collection', async () => {
    await storage.createCollection({
      name: 'docs',
      dimensions: 3,
      distance: 'dot',
      embeddingModel: 'old/model',
      sparseEncoder: 'old',
    });
    const builder = new IndexBuilder({ storage, embedder });

    const result = await builder.buildOrReuse('docs', chunksFromTexts(TEXTS));

    expect(result.created).toBe(true);
    expect(await storage.getCollection('docs')).toMatchObject({
      dimensions: 16,
      embeddingModel: 'fake/hashing-16',
    });
  });

  it('writes in batches and reports progress', async () => {
    const onProgress = vi.fn();
    const builder = new IndexBuilder({ storage, embedder, defaultBatchSize: 2 });

    const result = await builder.buildOrReuse('docs', chunksFromTexts(TEXTS), { onProgress });

    expect(result.batches).toBe(2);
    expect(onProgress.mock.calls).toEqual([
      [0, 2],
      [1, 3],
    ]);
    // Probe, then one request per batch
    expect(provider.calls).toEqual([
      ['dimension probe'],
      ['The sky is blue.', 'Cats are mammals.'],
      ['Qdrant stores vectors.'],
    ]);
  });

  it('skips blank chunks with a warning', async () => {
    const warn = vi.fn();
    const builder = new IndexBuilder({ storage, embedder, logger: { warn } });

    const result = await builder.buildOrReuse('docs', chunksFromTexts(['Text.', '  \n ', 'More.']));

    expect(result).toMatchObject({ entryCount: 2, skipped: 1 });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('reports the failing batch index and leaves the collection building', async () => {
    const flaky = new FlakyStorage(storage, new Set(['upsert']));
    const builder = new IndexBuilder({ storage: flaky, embedder, defaultBatchSize: 1 });
    // The second batch's write fails
    const source = (async function* () {
      for await (const chunk of chunksFromTexts(TEXTS)) {
        if (chunk.sequenceIndex === 1) flaky.failures = 1;
        yield chunk;
      }
    })();

    const error = await builder.buildOrReuse('docs', source).then(
      () => null,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(IngestionError);
    if (error instanceof IngestionError) {
      expect(error.batchIndex).toBe(1);
      expect(error.code).toBe(10);
      expect(error.message).toBe('Batch 1 of "docs" failed: Simulated outage in upsert');
    }
    expect((await storage.getCollection('docs'))?.status).toBe('building');
    expect(await storage.countEntries('docs')).toBe(1);
  });

  it('refuses to reuse a partially built collection', async () => {
    const builder = new IndexBuilder({ storage, embedder, defaultBatchSize: 1 });
    const failing = (async function* () {
      yield* chunksFromTexts(TEXTS.slice(0, 1));
      throw new Error('disk read failed');
    })();
    await expect(builder.buildOrReuse('docs', failing)).rejects.toThrow('disk read failed');

    await expect(builder.buildOrReuse('docs', chunksFromTexts(TEXTS))).rejects.toBeInstanceOf(
      IncompleteCollectionError
    );

    const rebuilt = await builder.buildOrReuse('docs', chunksFromTexts(TEXTS), { rebuild: true });
    expect(rebuilt.entryCount).toBe(3);
  });

  it('wraps embedding failures in IngestionError with the cause', async () => {
    const builder = new IndexBuilder({ storage, embedder });
    // The probe has already run when the first chunk is pulled
    const source = (async function* () {
      for await (const chunk of chunksFromTexts(TEXTS)) {
        if (chunk.sequenceIndex === 0) provider.failNext = 1;
        yield chunk;
      }
    })();

    const error = await builder.buildOrReuse('docs', source).then(
      () => null,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(IngestionError);
    if (error instanceof IngestionError) {
      expect(error.batchIndex).toBe(0);
      expect(error.cause).toBeInstanceOf(Error);
      expect(error.message).toBe('Batch 0 of "docs" failed: Simulated embedding failure');
    }
  });

  it('fails before creating anything when the probe fails', async () => {
    provider.failNext = 1;
    const builder = new IndexBuilder({ storage, embedder });

    await expect(builder.buildOrReuse('docs', chunksFromTexts(TEXTS))).rejects.toThrow(
      'Embedding provider failed the dimension probe: Simulated embedding failure'
    );
    expect(await storage.getCollection('docs')).toBeNull();
  });

  it('keeps the ready collection when the embedder fails during a rebuild', async () => {
    const builder = new IndexBuilder({ storage, embedder });
    await builder.buildOrReuse('docs', chunksFromTexts(TEXTS));
    provider.failNext = 1;

    await expect(
      builder.buildOrReuse('docs', chunksFromTexts(['Only one.']), { rebuild: true })
    ).rejects.toBeInstanceOf(IngestionError);
    expect(await storage.getCollection('docs')).toMatchObject({ status: 'ready' });
    expect(await storage.countEntries('docs')).toBe(3);
  });

  it('stops between batches when aborted', async () => {
    const controller = new AbortController();
    const builder = new IndexBuilder({ storage, embedder, defaultBatchSize: 1 });

    const error = await builder
      .buildOrReuse('docs', chunksFromTexts(TEXTS), {
        signal: controller.signal,
        onProgress: (batchIndex) => {
          if (batchIndex === 0) controller.abort();
        },
      })
      .then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(IngestionError);
    if (error instanceof IngestionError) {
      expect(error.batchIndex).toBe(1);
    }
    expect(await storage.countEntries('docs')).toBe(1);
    expect((await storage.getCollection('docs'))?.status).toBe('building');
  });
});
