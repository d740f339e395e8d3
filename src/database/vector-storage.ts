/**
 * SQLite Vector Storage
 *
 * VectorStorage on better-sqlite3. Dense search is an exact scan over the
 * collection's Float32 vectors; sparse search reads the sparse_terms
 * inverted index, so only entries sharing a term with the query are touched.
 *
 * better-sqlite3 is synchronous; the async methods keep the contract open
 * to networked backends.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { DatabaseError } from '../errors/index.js';
import type { IndexEntry, SparseVector } from '../indexer/types.js';
import { safeJsonParse } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { vectorToBlob, blobToVector, nowIso } from './schema.js';
import type {
  CollectionInfo,
  DistanceMetric,
  NewCollection,
  ScoredHit,
  StoredEntry,
  VectorStorage,
} from './types.js';
import {
  CollectionRowSchema,
  CountRowSchema,
  DenseRowSchema,
  EntryRowSchema,
  SchemaValidationError,
  SparseTermRowSchema,
  validateRow,
  validateRows,
  type CollectionRow,
} from './validation.js';

/** Bound parameters per IN (...) list, well under SQLite's variable limit */
const IN_CLAUSE_BATCH = 500;

const MetadataSchema = z.record(z.unknown());

function toCollectionInfo(row: CollectionRow): CollectionInfo {
  return {
    name: row.name,
    dimensions: row.dimensions,
    distance: row.distance,
    embeddingModel: row.embedding_model,
    sparseEncoder: row.sparse_encoder,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function byScoreThenId(a: ScoredHit, b: ScoredHit): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function batches<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * Similarity between a stored vector and the query. Higher is better.
 * Euclidean distance is negated so every metric sorts the same way.
 */
export function denseSimilarity(
  metric: DistanceMetric,
  stored: Float32Array,
  query: readonly number[],
  queryNorm: number
): number {
  let dot = 0;
  let storedNormSq = 0;
  let distSq = 0;
  const n = Math.min(stored.length, query.length);

  for (let i = 0; i < n; i++) {
    const s = stored[i] ?? 0;
    const q = query[i] ?? 0;
    dot += s * q;
    storedNormSq += s * s;
    distSq += (s - q) * (s - q);
  }

  switch (metric) {
    case 'dot':
      return dot;
    case 'euclidean':
      return -Math.sqrt(distSq);
    case 'cosine': {
      const denom = Math.sqrt(storedNormSq) * queryNorm;
      return denom === 0 ? 0 : dot / denom;
    }
  }
}

export class SqliteVectorStorage implements VectorStorage {
  constructor(
    private readonly db: Database.Database,
    private readonly logger: Logger = silentLogger
  ) {}

  async getCollection(name: string): Promise<CollectionInfo | null> {
    return this.run(`read collection "${name}"`, () => {
      const row = this.db.prepare('SELECT * FROM collections WHERE name = ?').get(name);
      return row
        ? toCollectionInfo(validateRow(CollectionRowSchema, row, `collections.name=${name}`))
        : null;
    });
  }

  async listCollections(): Promise<CollectionInfo[]> {
    return this.run('list collections', () => {
      const rows = this.db.prepare('SELECT * FROM collections ORDER BY name').all();
      return validateRows(CollectionRowSchema, rows, 'collections').map(toCollectionInfo);
    });
  }

  async countEntries(name: string): Promise<number> {
    return this.run(`count entries of "${name}"`, () => {
      const row = this.db
        .prepare('SELECT COUNT(*) AS count FROM entries WHERE collection = ?')
        .get(name);
      return validateRow(CountRowSchema, row, `entries.collection=${name}`).count;
    });
  }

  async createCollection(input: NewCollection): Promise<CollectionInfo> {
    return this.run(`create collection "${input.name}"`, () => {
      const now = nowIso();
      this.db
        .prepare(
          `INSERT INTO collections
             (name, dimensions, distance, embedding_model, sparse_encoder, status, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, 'building', ?, ?)`
        )
        .run(
          input.name,
          input.dimensions,
          input.distance,
          input.embeddingModel,
          input.sparseEncoder,
          now,
          now
        );
      return { ...input, status: 'building', createdAt: now, updatedAt: now };
    });
  }

  async markReady(name: string): Promise<void> {
    this.run(`mark collection "${name}" ready`, () => {
      const info = this.db
        .prepare("UPDATE collections SET status = 'ready', updated_at = ? WHERE name = ?")
        .run(nowIso(), name);
      if (info.changes === 0) {
        throw new DatabaseError(`Collection "${name}" does not exist`);
      }
    });
  }

  async deleteCollection(name: string): Promise<boolean> {
    return this.run(`delete collection "${name}"`, () => {
      // Cascades to entries and sparse_terms
      const info = this.db.prepare('DELETE FROM collections WHERE name = ?').run(name);
      return info.changes > 0;
    });
  }

  async upsert(name: string, entries: IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;

    const collection = await this.getCollection(name);
    if (!collection) {
      throw new DatabaseError(`Collection "${name}" does not exist`);
    }
    for (const entry of entries) {
      if (entry.dense.length !== collection.dimensions) {
        throw new DatabaseError(
          `Entry ${entry.id} has ${entry.dense.length} dimensions, collection "${name}" expects ${collection.dimensions}`
        );
      }
    }

    this.run(`write ${entries.length} entries to "${name}"`, () => {
      const upsertEntry = this.db.prepare(
        `INSERT INTO entries (collection, id, text, dense, metadata)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (collection, id) DO UPDATE SET
           text = excluded.text,
           dense = excluded.dense,
           metadata = excluded.metadata`
      );
      const clearTerms = this.db.prepare(
        'DELETE FROM sparse_terms WHERE collection = ? AND id = ?'
      );
      const insertTerm = this.db.prepare(
        'INSERT INTO sparse_terms (collection, term, id, weight) VALUES (?, ?, ?, ?)'
      );
      const touch = this.db.prepare('UPDATE collections SET updated_at = ? WHERE name = ?');

      this.db.transaction(() => {
        for (const entry of entries) {
          upsertEntry.run(
            name,
            entry.id,
            entry.text,
            vectorToBlob(entry.dense),
            JSON.stringify(entry.metadata)
          );
          clearTerms.run(name, entry.id);
          entry.sparse.indices.forEach((term, i) => {
            insertTerm.run(name, term, entry.id, entry.sparse.values[i] ?? 0);
          });
        }
        touch.run(nowIso(), name);
      })();
    });
  }

  async searchDense(name: string, vector: number[], limit: number): Promise<ScoredHit[]> {
    const collection = await this.getCollection(name);
    if (!collection || limit <= 0) return [];

    return this.run(`dense search in "${name}"`, () => {
      const queryNorm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
      const hits: ScoredHit[] = [];
      const rows = this.db
        .prepare('SELECT id, dense FROM entries WHERE collection = ?')
        .iterate(name);

      for (const raw of rows) {
        const row = validateRow(DenseRowSchema, raw, `entries.collection=${name}`);
        hits.push({
          id: row.id,
          score: denseSimilarity(collection.distance, blobToVector(row.dense), vector, queryNorm),
        });
      }

      return hits.sort(byScoreThenId).slice(0, limit);
    });
  }

  async searchSparse(name: string, vector: SparseVector, limit: number): Promise<ScoredHit[]> {
    if (vector.indices.length === 0 || limit <= 0) return [];

    return this.run(`sparse search in "${name}"`, () => {
      const queryWeights = new Map<number, number>();
      vector.indices.forEach((term, i) => queryWeights.set(term, vector.values[i] ?? 0));

      const scores = new Map<string, number>();
      for (const terms of batches(vector.indices, IN_CLAUSE_BATCH)) {
        const placeholders = terms.map(() => '?').join(', ');
        const rows = this.db
          .prepare(
            `SELECT id, term, weight FROM sparse_terms
             WHERE collection = ? AND term IN (${placeholders})`
          )
          .all(name, ...terms);

        for (const row of validateRows(SparseTermRowSchema, rows, `sparse_terms.collection=${name}`)) {
          const contribution = row.weight * (queryWeights.get(row.term) ?? 0);
          scores.set(row.id, (scores.get(row.id) ?? 0) + contribution);
        }
      }

      return Array.from(scores, ([id, score]) => ({ id, score }))
        .filter((hit) => hit.score > 0)
        .sort(byScoreThenId)
        .slice(0, limit);
    });
  }

  async getEntries(name: string, ids: string[]): Promise<Map<string, StoredEntry>> {
    const found = new Map<string, StoredEntry>();
    if (ids.length === 0) return found;

    return this.run(`read entries of "${name}"`, () => {
      for (const idBatch of batches(ids, IN_CLAUSE_BATCH)) {
        const placeholders = idBatch.map(() => '?').join(', ');
        const rows = this.db
          .prepare(
            `SELECT id, text, metadata FROM entries
             WHERE collection = ? AND id IN (${placeholders})`
          )
          .all(name, ...idBatch);

        for (const row of validateRows(EntryRowSchema, rows, `entries.collection=${name}`)) {
          const metadata = safeJsonParse(row.metadata, MetadataSchema, {}, (error) => {
            this.logger.warn(`Corrupted metadata for entry ${row.id}: ${error.message}`);
          });
          found.set(row.id, { id: row.id, text: row.text, metadata });
        }
      }
      return found;
    });
  }

  /**
   * Run a database operation, wrapping raw SQLite failures in DatabaseError.
   */
  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof DatabaseError || error instanceof SchemaValidationError) {
        throw error;
      }
      throw new DatabaseError(
        `Failed to ${operation}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}
