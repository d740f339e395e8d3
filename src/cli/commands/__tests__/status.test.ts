/**
 * Tests for the status command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createStatusCommand, formatBytes } from '../status.js';
import { createContext } from '../../context.js';
import { createTestDeps, type TestDeps } from '../../../test-utils/index.js';
import { chunksFromTexts } from '../../../indexer/source.js';
import { _clearEnvCache } from '../../../config/env.js';

describe('status command', () => {
  let deps: TestDeps;
  let output: string[];
  let home: string;
  const originalHome = process.env.RAGRAIL_HOME;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'ragrail-status-'));
    process.env.RAGRAIL_HOME = home;
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('OPENAI_BASE_URL', '');
    _clearEnvCache();
    deps = createTestDeps();
    output = [];
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      output.push(line);
    });
  });

  afterEach(() => {
    if (originalHome === undefined) {
      delete process.env.RAGRAIL_HOME;
    } else {
      process.env.RAGRAIL_HOME = originalHome;
    }
    rmSync(home, { recursive: true, force: true });
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('lists collections with their entry counts as JSON', async () => {
    const runtime = await deps.createRuntime(deps.config, createContext({ verbose: false, json: true }));
    await runtime.builder.buildOrReuse('docs', chunksFromTexts(['a b', 'c d'], 'x.txt'));
    const ctx = createContext({ verbose: false, json: true });

    await createStatusCommand(() => ctx, deps).parseAsync([], { from: 'user' });

    const parsed = JSON.parse(output[0] ?? '');
    expect(parsed.collections).toEqual([
      expect.objectContaining({
        name: 'docs',
        status: 'ready',
        entries: 2,
        dimensions: 64,
        distance: 'cosine',
        embeddingModel: 'fake/hashing-64',
      }),
    ]);
    expect(parsed.database).toEqual({
      path: join(home, 'ragrail.db'),
      size: 0,
      sizeFormatted: '0 Bytes',
    });
    expect(parsed.llm).toEqual({
      provider: 'openai',
      model: 'gpt-4o-mini',
      ready: false,
      problem: 'OPENAI_API_KEY environment variable is not set',
    });
  });

  it('reports a provider as ready once its key is set', async () => {
    vi.stubEnv('OPENAI_API_KEY', 'sk-test-secret');
    _clearEnvCache();
    const ctx = createContext({ verbose: false, json: true });

    await createStatusCommand(() => ctx, deps).parseAsync([], { from: 'user' });

    const parsed = JSON.parse(output[0] ?? '');
    expect(parsed.embedding).toEqual({
      provider: 'openai',
      model: 'text-embedding-3-small',
      ready: true,
    });
  });

  it('suggests indexing when there are no collections', async () => {
    const ctx = createContext({ verbose: false, json: false });

    await createStatusCommand(() => ctx, deps).parseAsync([], { from: 'user' });

    expect(output[0]).toContain('No collections yet.');
  });
});

describe('formatBytes', () => {
  it('formats sizes with one decimal', () => {
    expect(formatBytes(0)).toBe('0 Bytes');
    expect(formatBytes(512)).toBe('512 Bytes');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5 MB');
  });
});
