/**
 * Database Module
 *
 * SQLite storage for collections and their hybrid index entries.
 *
 * @example
 * ```ts
 * import { getDb, SqliteVectorStorage } from './database/index.js';
 *
 * const storage = new SqliteVectorStorage(getDb());
 * const collection = await storage.getCollection('hybrid_rag');
 * ```
 */

// Connection management
export { getDb, closeDb, openDatabase } from './connection.js';

// Migrations
export { runMigrations, MIGRATIONS, type MigrationResult } from './migrate.js';

// Storage contract and implementation
export type {
  VectorStorage,
  CollectionInfo,
  CollectionStatus,
  DistanceMetric,
  NewCollection,
  ScoredHit,
  StoredEntry,
} from './types.js';
export { SqliteVectorStorage, denseSimilarity } from './vector-storage.js';

// Helpers
export { vectorToBlob, blobToVector } from './schema.js';
export {
  SchemaValidationError,
  validateRow,
  validateRows,
  CollectionRowSchema,
} from './validation.js';
