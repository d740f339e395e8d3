/**
 * Zod validation schemas for CLI inputs
 *
 * Commander hands every option over as a string. These schemas coerce
 * and range-check them so commands work with typed values.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

const positiveInt = (flag: string) =>
  z.coerce
    .number({ invalid_type_error: `${flag} must be a number` })
    .int(`${flag} must be a whole number`)
    .positive(`${flag} must be positive`);

const weight = (flag: string) =>
  z.coerce
    .number({ invalid_type_error: `${flag} must be a number` })
    .min(0, `${flag} must be between 0 and 1`)
    .max(1, `${flag} must be between 0 and 1`);

// ============================================================================
// INDEX COMMAND SCHEMA
// ============================================================================

export const CollectionNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, 'collection names use letters, digits, underscores and hyphens only');

export const IndexOptionsSchema = z.object({
  collection: CollectionNameSchema.optional(),
  rebuild: z.boolean().default(false),
  batchSize: positiveInt('--batch-size').optional(),
});

// ============================================================================
// SEARCH COMMAND SCHEMA
// ============================================================================

export const SearchOptionsSchema = z.object({
  collection: CollectionNameSchema.optional(),
  top: positiveInt('--top').max(100, '--top must be at most 100').optional(),
  denseWeight: weight('--dense-weight').optional(),
  sparseWeight: weight('--sparse-weight').optional(),
});

// ============================================================================
// ASK COMMAND SCHEMA
// ============================================================================

export const AskOptionsSchema = z.object({
  collection: CollectionNameSchema.optional(),
  maxToolCalls: positiveInt('--max-tool-calls').max(10, '--max-tool-calls must be at most 10').optional(),
  ingest: z.string().min(1).optional(),
  refine: z.boolean().default(true),
});

export type IndexOptions = z.output<typeof IndexOptionsSchema>;
export type SearchOptions = z.output<typeof SearchOptionsSchema>;
export type AskOptions = z.output<typeof AskOptionsSchema>;

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate command options, throwing a ValidationError that lists every
 * issue.
 *
 * @example
 * ```typescript
 * const options = parseOptions(SearchOptionsSchema, cmdOptions);
 * ```
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => issue.message);
  throw new ValidationError('Invalid command options', issues);
}
