/**
 * Database Module Tests
 *
 * Tests for connection setup, migrations, schema helpers and row validation.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { mkdtempSync, rmSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { openDatabase } from '../connection.js';
import { runMigrations, MIGRATIONS } from '../migrate.js';
import { vectorToBlob, blobToVector } from '../schema.js';
import {
  CollectionRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from '../validation.js';

const TableRowSchema = z.object({ name: z.string() });

function tableNames(db: Database.Database): string[] {
  return db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
    .all()
    .map((row) => TableRowSchema.parse(row).name);
}

describe('openDatabase', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'ragrail-db-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('creates the parent directory and applies migrations', () => {
    const dbPath = join(testDir, 'nested', 'ragrail.db');
    const db = openDatabase(dbPath);

    try {
      expect(existsSync(dbPath)).toBe(true);
      expect(tableNames(db)).toEqual(
        expect.arrayContaining(['_migrations', 'collections', 'entries', 'sparse_terms'])
      );
      expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    } finally {
      db.close();
    }
  });

  it('reopens an existing database without reapplying migrations', () => {
    const dbPath = join(testDir, 'ragrail.db');
    openDatabase(dbPath).close();

    const db = openDatabase(dbPath);
    try {
      expect(runMigrations(db)).toEqual({ applied: [], failed: [] });
    } finally {
      db.close();
    }
  });
});

describe('runMigrations', () => {
  it('records every embedded migration once', () => {
    const db = openDatabase(':memory:');
    const count = db.prepare('SELECT COUNT(*) AS n FROM _migrations').get();

    expect(z.object({ n: z.number() }).parse(count).n).toBe(MIGRATIONS.length);
    db.close();
  });
});

describe('vector BLOB conversion', () => {
  it('round-trips Float32 values', () => {
    const vector = [0.5, -1.25, 3];
    expect(Array.from(blobToVector(vectorToBlob(vector)))).toEqual(vector);
  });

  it('stores four bytes per dimension', () => {
    expect(vectorToBlob([1, 2, 3, 4]).length).toBe(16);
  });

  it('reads BLOBs that start at an unaligned offset', () => {
    const backing = Buffer.alloc(13);
    vectorToBlob([1.5, 2.5, 3.5]).copy(backing, 1);
    const unaligned = backing.subarray(1);

    expect(Array.from(blobToVector(unaligned))).toEqual([1.5, 2.5, 3.5]);
  });
});

describe('row validation', () => {
  const validRow = {
    name: 'docs',
    dimensions: 3,
    distance: 'cosine',
    embedding_model: 'test-model',
    sparse_encoder: 'test-sparse',
    status: 'ready',
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
  };

  it('accepts a valid collection row', () => {
    expect(validateRow(CollectionRowSchema, validRow, 'collections')).toEqual(validRow);
  });

  it('throws SchemaValidationError naming the context', () => {
    const bad = { ...validRow, status: 'half-done' };

    expect(() => validateRow(CollectionRowSchema, bad, 'collections.name=docs')).toThrow(
      'Database schema mismatch in collections.name=docs'
    );
  });

  it('reports issues with their paths', () => {
    try {
      validateRow(CollectionRowSchema, { ...validRow, dimensions: 0 }, 'collections');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      if (error instanceof SchemaValidationError) {
        expect(error.code).toBe(5);
        expect(error.issues[0]?.path).toBe('dimensions');
      }
    }
  });

  it('indexes the failing row in validateRows', () => {
    expect(() =>
      validateRows(CollectionRowSchema, [validRow, { ...validRow, name: 7 }], 'collections')
    ).toThrow('Database schema mismatch in collections[1]');
  });
});
