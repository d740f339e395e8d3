/**
 * CLI error output.
 *
 * Every failure is first normalized into an {@link ErrorOutput}, then
 * rendered either as coloured text or as JSON (`--json`). `--verbose` adds
 * the cause chain and the stack trace.
 */

import chalk from 'chalk';
import { CLIError, ExitCode, ValidationError } from './types.js';

export interface ErrorHandlerOptions {
  verbose?: boolean;
  json?: boolean;
}

/** Shape printed under `--json` */
export interface ErrorOutput {
  error: string;
  name: string;
  code: number;
  hint?: string;
  issues?: string[];
  /** Messages of nested causes, outermost first (verbose only) */
  causes?: string[];
  stack?: string;
}

const MAX_CAUSE_DEPTH = 5;

function causeChain(error: Error): string[] {
  const messages: string[] = [];
  let current: unknown = error.cause;
  while (current !== undefined && messages.length < MAX_CAUSE_DEPTH) {
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      break;
    }
  }
  return messages;
}

/**
 * Normalize any thrown value. Optional fields are left out rather than
 * set to undefined, so the JSON stays compact.
 */
export function describeError(error: unknown, verbose = false): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), name: 'Error', code: ExitCode.General };
  }

  const output: ErrorOutput = {
    error: error.message,
    name: error.name,
    code: getExitCode(error),
  };
  if (error instanceof CLIError) {
    if (error.hint) output.hint = error.hint;
  } else if (!verbose) {
    output.hint = 'Run with --verbose for more details';
  }
  if (error instanceof ValidationError && error.issues.length > 0) {
    output.issues = error.issues;
  }
  if (verbose) {
    const causes = causeChain(error);
    if (causes.length > 0) output.causes = causes;
    if (error.stack) output.stack = error.stack;
  }
  return output;
}

function renderText(output: ErrorOutput): string {
  const lines = [chalk.red('Error: ') + output.error];
  for (const issue of output.issues ?? []) {
    lines.push(`  - ${issue}`);
  }
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }
  for (const cause of output.causes ?? []) {
    lines.push(chalk.dim('Caused by: ') + cause);
  }
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }
  return lines.join('\n');
}

/**
 * Format an error for display, without printing or exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const output = describeError(error, options.verbose ?? false);
  return options.json ? JSON.stringify(output, null, 2) : renderText(output);
}

export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : ExitCode.General;
}

/**
 * Print the formatted error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * For `uncaughtException` and `unhandledRejection`.
 *
 * Options are read through the getter when an error arrives, so flags
 * parsed after registration still apply.
 */
export function createGlobalErrorHandler(
  getOptions: () => ErrorHandlerOptions
): (error: unknown) => never {
  return (error: unknown) => handleError(error, getOptions());
}
