/**
 * Tests for the config command
 *
 * RAGRAIL_HOME points at a temporary directory for each test.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createConfigCommand, formatValue } from '../config.js';
import { createContext } from '../../context.js';
import { ConfigError } from '../../../errors/index.js';
import type { GlobalOptions } from '../../types.js';

describe('config command', () => {
  let home: string;
  let output: string[];
  const originalHome = process.env.RAGRAIL_HOME;

  async function run(options: GlobalOptions, ...args: string[]): Promise<void> {
    const ctx = createContext(options);
    await createConfigCommand(() => ctx).parseAsync(args, { from: 'user' });
  }

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'ragrail-config-'));
    process.env.RAGRAIL_HOME = home;
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
  });

  it('gets a default value', async () => {
    await run({ verbose: false, json: true }, 'get', 'retrieval.top_k');

    expect(JSON.parse(output[0] ?? '')).toEqual({ key: 'retrieval.top_k', value: 5 });
  });

  it('sets a value and reads it back', async () => {
    await run({ verbose: false, json: true }, 'set', 'retrieval.top_k', '8');
    await run({ verbose: false, json: false }, 'get', 'retrieval.top_k');

    expect(JSON.parse(output[0] ?? '')).toEqual({ success: true, key: 'retrieval.top_k', value: 8 });
    expect(output[1]).toBe('8');
  });

  it('rejects an unknown key with a ConfigError', async () => {
    await expect(run({ verbose: false, json: true }, 'get', 'retrieval.nope')).rejects.toBeInstanceOf(
      ConfigError
    );
    await expect(
      run({ verbose: false, json: true }, 'set', 'retrieval.nope', '1')
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects an out-of-range value', async () => {
    await expect(
      run({ verbose: false, json: true }, 'set', 'retrieval.dense_weight', '2')
    ).rejects.toThrow("Invalid value for 'retrieval.dense_weight'");
  });

  it('prints the config path', async () => {
    await run({ verbose: false, json: false }, 'path');

    expect(output).toEqual([join(home, 'config.toml')]);
  });

  it('lists every key as JSON', async () => {
    await run({ verbose: false, json: true }, 'list');

    const parsed = JSON.parse(output[0] ?? '');
    expect(parsed['agent.max_tool_calls']).toBe(3);
    expect(parsed['collection.name']).toBe('hybrid_rag');
  });

  it('resets only with --force', async () => {
    await run({ verbose: false, json: true }, 'set', 'retrieval.top_k', '8');
    const configPath = join(home, 'config.toml');

    await run({ verbose: false, json: true }, 'reset', '--force');

    expect(existsSync(configPath)).toBe(true);
    expect(readFileSync(configPath, 'utf-8')).toContain('# ragrail configuration');
    output = [];
    await run({ verbose: false, json: true }, 'get', 'retrieval.top_k');
    expect(JSON.parse(output[0] ?? '')).toEqual({ key: 'retrieval.top_k', value: 5 });
  });
});

describe('formatValue', () => {
  it('renders scalars plainly and lists as JSON', () => {
    expect(formatValue('hybrid_rag')).toBe('hybrid_rag');
    expect(formatValue(true)).toBe('true');
    expect(formatValue(0.5)).toBe('0.5');
    expect(formatValue(['*.log'])).toBe('["*.log"]');
  });
});
