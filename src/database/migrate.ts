/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied in
 * the _migrations table. Safe to run on every open.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations that were applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// Embedded so the compiled output needs no SQL files beside it
export const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- One row per collection
CREATE TABLE IF NOT EXISTS collections (
  name TEXT PRIMARY KEY,
  dimensions INTEGER NOT NULL,
  distance TEXT NOT NULL,
  embedding_model TEXT NOT NULL,
  sparse_encoder TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'building',
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

-- Dense vectors are Float32 BLOBs; metadata is a JSON object
CREATE TABLE IF NOT EXISTS entries (
  collection TEXT NOT NULL,
  id TEXT NOT NULL,
  text TEXT NOT NULL,
  dense BLOB NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  PRIMARY KEY (collection, id),
  FOREIGN KEY (collection) REFERENCES collections(name) ON DELETE CASCADE
);

-- Inverted index of sparse term weights
CREATE TABLE IF NOT EXISTS sparse_terms (
  collection TEXT NOT NULL,
  term INTEGER NOT NULL,
  id TEXT NOT NULL,
  weight REAL NOT NULL,
  PRIMARY KEY (collection, term, id),
  FOREIGN KEY (collection, id) REFERENCES entries(collection, id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_sparse_terms_entry ON sparse_terms(collection, id);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });

/**
 * Run all pending migrations against a database.
 *
 * Failed migrations do not stop later ones from being attempted.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const done = new Set(
    db
      .prepare('SELECT name FROM _migrations')
      .all()
      .map((row) => MigrationNameRowSchema.parse(row).name)
  );

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}
