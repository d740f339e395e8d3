/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime. The database can
 * drift from the code (failed migration, manual edits); reads are checked
 * instead of trusted.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM collections WHERE name = ?').get(name);
 * return row ? validateRow(CollectionRowSchema, row, `collections.name=${name}`) : null;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError, ExitCode } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

export const CollectionRowSchema = z.object({
  name: z.string(),
  dimensions: z.number().int().positive(),
  distance: z.enum(['cosine', 'dot', 'euclidean']),
  embedding_model: z.string(),
  sparse_encoder: z.string(),
  status: z.enum(['building', 'ready']),
  created_at: z.string(),
  updated_at: z.string(),
});

export type CollectionRow = z.infer<typeof CollectionRowSchema>;

/** `dense` is a BLOB; better-sqlite3 returns BLOBs as Buffers */
export const DenseRowSchema = z.object({
  id: z.string(),
  dense: z.instanceof(Buffer),
});

export const SparseTermRowSchema = z.object({
  id: z.string(),
  term: z.number().int(),
  weight: z.number(),
});

export const EntryRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  metadata: z.string(),
});

export const CountRowSchema = z.object({
  count: z.number().int().nonnegative(),
});

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nThe index may have been written by another version. Rebuild it with:\n` +
      `  ragrail index <path> --rebuild`;

    super(message, hint, ExitCode.Database);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Shown in the error message (e.g., "collections.name=docs")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate an array of database rows, throwing on the first invalid one.
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
