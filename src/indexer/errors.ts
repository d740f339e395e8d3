/**
 * Index Builder Errors
 */

import { CLIError, ExitCode } from '../errors/index.js';

/**
 * A batch failed to embed or write, or the build was aborted.
 * The partial collection keeps status 'building'.
 */
export class IngestionError extends CLIError {
  constructor(
    message: string,
    /** 0-based index of the batch that failed */
    public readonly batchIndex: number,
    cause?: unknown
  ) {
    super(message, 'Fix the cause and run again with --rebuild', ExitCode.Ingestion, { cause });
    this.name = 'IngestionError';
  }
}

/**
 * A non-empty collection was left 'building' by an earlier run.
 */
export class IncompleteCollectionError extends CLIError {
  constructor(public readonly collection: string) {
    super(
      `Collection "${collection}" was not fully built`,
      `An earlier build stopped partway. Run: ragrail index <path> --collection ${collection} --rebuild`,
      ExitCode.Ingestion
    );
    this.name = 'IncompleteCollectionError';
  }
}
