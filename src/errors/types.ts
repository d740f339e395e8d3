/**
 * Error types shared by the CLI and the library.
 *
 * Each error carries a message, an optional hint for the user and an exit
 * code from {@link ExitCode}. Modules with their own failure modes (search,
 * indexer) subclass {@link CLIError} with the codes reserved for them here.
 */

/** Process exit codes, one per failure family */
export const ExitCode = {
  General: 1,
  Config: 2,
  NotFound: 3,
  APIKey: 4,
  Database: 5,
  IndexMismatch: 6,
  InvalidQuery: 7,
  RetrievalUnavailable: 8,
  FusionInconsistency: 9,
  Ingestion: 10,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class CLIError extends Error {
  /** Recovery suggestion shown under the message */
  public readonly hint?: string;

  public readonly code: ExitCode;

  constructor(
    message: string,
    hint?: string,
    code: ExitCode = ExitCode.General,
    options?: ErrorOptions
  ) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

export class FileNotFoundError extends CLIError {
  constructor(public readonly path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', ExitCode.NotFound);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Bad TOML, out-of-range values or unknown keys in config.toml.
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: ragrail config list  to see valid options', ExitCode.Config);
    this.name = 'ConfigError';
  }
}

export class APIKeyError extends CLIError {
  constructor(
    public readonly provider: string,
    envVar?: string
  ) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (a .env file in the working directory also works)`,
      ExitCode.APIKey
    );
    this.name = 'APIKeyError';
  }
}

/**
 * SQLite failures. The driver's error, when there is one, is the `cause`.
 */
export class DatabaseError extends CLIError {
  constructor(message: string, cause?: unknown) {
    super(
      message,
      'Try running: ragrail status  to check database health',
      ExitCode.Database,
      cause === undefined ? undefined : { cause }
    );
    this.name = 'DatabaseError';
  }
}

/**
 * Input that failed a zod schema. `issues` holds one line per failed field
 * and is printed under the message by the error handler.
 */
export class ValidationError extends CLIError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'Check your input and try again', ExitCode.General);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
