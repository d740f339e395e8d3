/**
 * Search Module Errors
 *
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError, ExitCode } from '../errors/index.js';

/**
 * The query failed validation. Never retried.
 */
export class InvalidQueryError extends CLIError {
  constructor(
    /** One entry per failed rule, e.g. "topK: must be a positive integer" */
    public readonly issues: string[]
  ) {
    super(`Invalid query: ${issues.join('; ')}`, undefined, ExitCode.InvalidQuery);
    this.name = 'InvalidQueryError';
  }
}

/**
 * Storage or embedding failed twice in a row (the first attempt is retried
 * once after a backoff).
 */
export class RetrievalUnavailableError extends CLIError {
  constructor(message: string, cause?: unknown) {
    super(
      message,
      'Check that the embedding provider is reachable and the database is healthy: ragrail status',
      ExitCode.RetrievalUnavailable,
      { cause }
    );
    this.name = 'RetrievalUnavailableError';
  }
}

/**
 * A search returned ids that the text store does not hold.
 */
export class FusionInconsistencyError extends CLIError {
  constructor(
    public readonly collection: string,
    public readonly missingIds: string[]
  ) {
    super(
      `Collection "${collection}" is inconsistent: no stored text for ${missingIds.join(', ')}`,
      `Rebuild the collection: ragrail index <path> --collection ${collection} --rebuild`,
      ExitCode.FusionInconsistency
    );
    this.name = 'FusionInconsistencyError';
  }
}

/**
 * The collection was built with a different embedding model or sparse
 * encoder than the one querying it.
 */
export class IndexMismatchError extends CLIError {
  constructor(message: string) {
    super(
      message,
      'Query with the embedding model the collection was built with, or rebuild it: ragrail index <path> --rebuild',
      ExitCode.IndexMismatch
    );
    this.name = 'IndexMismatchError';
  }
}
