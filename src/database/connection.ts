/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database is stored at ~/.ragrail/ragrail.db (see config/paths.ts).
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';
import { DatabaseError } from '../errors/index.js';
import { runMigrations } from './migrate.js';

// Module-level singleton instance
let db: Database.Database | null = null;

/**
 * Open a database file (or ':memory:'), apply pragmas and migrations.
 *
 * @throws DatabaseError if the file cannot be opened or a migration fails
 */
export function openDatabase(path: string): Database.Database {
  let database: Database.Database;
  try {
    if (path !== ':memory:') {
      mkdirSync(dirname(path), { recursive: true });
    }
    database = new Database(path);
  } catch (error) {
    throw new DatabaseError(
      `Cannot open database at ${path}`,
      error instanceof Error ? error : undefined
    );
  }

  // Foreign keys are OFF by default in SQLite
  database.pragma('foreign_keys = ON');
  if (path !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }

  const result = runMigrations(database);
  if (result.failed.length > 0) {
    const details = result.failed.map((f) => `${f.name}: ${f.error}`).join('; ');
    database.close();
    throw new DatabaseError(`Database migration failed (${details})`);
  }

  return database;
}

/**
 * Get the singleton database instance.
 *
 * Creates the database and its directory on first call.
 *
 * @example
 * ```ts
 * const storage = new SqliteVectorStorage(getDb());
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(getDbPath());
  process.on('exit', () => closeDb());
  return db;
}

/**
 * Close the database connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
