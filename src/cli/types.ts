import type { Logger } from '../utils/logger.js';

/**
 * Flags parsed on the root program and shared by every command.
 */
export interface GlobalOptions {
  verbose: boolean;
  /** Machine-readable output on stdout */
  json: boolean;
}

/**
 * Handed to each command action. Also a {@link Logger}, so the builder,
 * engine and agent log through it directly.
 */
export interface CommandContext extends Required<Logger> {
  options: GlobalOptions;
  /** Normal output, suppressed under --json */
  log: (message: string) => void;
  /** Shown only with --verbose */
  debug: (message: string) => void;
  /** Suppressed under --json */
  warn: (message: string) => void;
  error: (message: string) => void;
}
