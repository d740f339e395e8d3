/**
 * Tests for the index command
 *
 * Runs the real command against a temporary directory, with in-memory
 * storage and the hashing embedder behind the command dependencies.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createIndexCommand } from '../index.js';
import { createContext } from '../../context.js';
import { createTestDeps, type TestDeps } from '../../../test-utils/index.js';
import { FileNotFoundError, ValidationError } from '../../../errors/index.js';
import { IncompleteCollectionError } from '../../../indexer/errors.js';

describe('index command', () => {
  let dir: string;
  let deps: TestDeps;
  let output: string[];

  const ctx = createContext({ verbose: false, json: true });

  async function run(...args: string[]): Promise<void> {
    await createIndexCommand(() => ctx, deps).parseAsync(args, { from: 'user' });
  }

  function events(): Array<{ type: string; data: Record<string, unknown> }> {
    return output.map((line) => JSON.parse(line));
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ragrail-index-'));
    writeFileSync(join(dir, 'sky.txt'), 'The sky is blue.');
    writeFileSync(join(dir, 'cats.md'), 'Cats are mammals.');
    deps = createTestDeps();
    output = [];
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      output.push(line);
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('builds the configured collection and reports NDJSON progress', async () => {
    await run(dir);

    const all = events();
    expect(all[0]).toMatchObject({ type: 'start', data: { collection: 'hybrid_rag', files: 2 } });
    expect(all.at(-1)).toMatchObject({
      type: 'complete',
      data: { collection: 'hybrid_rag', created: true, entryCount: 2, files: 2, skipped: 0 },
    });
    expect(await deps.storage.countEntries('hybrid_rag')).toBe(2);
    expect((await deps.storage.getCollection('hybrid_rag'))?.status).toBe('ready');
  });

  it('reuses a built collection on the second run', async () => {
    await run(dir);
    output = [];
    const embedCalls = deps.provider.calls.length;

    await run(dir);

    expect(events().at(-1)).toMatchObject({
      type: 'complete',
      data: { created: false, entryCount: 2 },
    });
    expect(deps.provider.calls.length).toBe(embedCalls);
  });

  it('honours --collection, --rebuild and --batch-size', async () => {
    await run(dir, '--collection', 'notes');
    output = [];

    await run(dir, '-c', 'notes', '--rebuild', '--batch-size', '1');

    const progress = events().filter((e) => e.type === 'progress');
    expect(progress.map((e) => e.data)).toEqual([
      { batch: 0, entriesWritten: 1 },
      { batch: 1, entriesWritten: 2 },
    ]);
    expect(events().at(-1)).toMatchObject({ data: { collection: 'notes', created: true } });
  });

  it('refuses a half-built collection without --rebuild', async () => {
    await deps.storage.createCollection({
      name: 'hybrid_rag',
      dimensions: 64,
      distance: 'cosine',
      embeddingModel: 'fake/hashing-64',
      sparseEncoder: 'bm25-tf/fnv1a32/v1',
    });
    await deps.storage.upsert('hybrid_rag', [
      {
        id: 'partial',
        text: 'Left over.',
        dense: new Array<number>(64).fill(0.125),
        sparse: { indices: [1], values: [1] },
        metadata: {},
      },
    ]);

    await expect(run(dir)).rejects.toBeInstanceOf(IncompleteCollectionError);
    expect(events().at(-1)).toMatchObject({ type: 'failed' });
  });

  it('rejects a non-positive batch size', async () => {
    await expect(run(dir, '--batch-size', '0')).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects a collection name with spaces', async () => {
    await expect(run(dir, '-c', 'my notes')).rejects.toThrow('Invalid command options');
  });

  it('reports a missing directory', async () => {
    await expect(run(join(dir, 'missing'))).rejects.toBeInstanceOf(FileNotFoundError);
  });
});
