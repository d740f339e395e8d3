/**
 * Error classes, exit codes and CLI error output.
 */

import { describe, it, expect, beforeAll, vi } from 'vitest';
import chalk from 'chalk';
import {
  ExitCode,
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  describeError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
} from '../index.js';
import {
  FusionInconsistencyError,
  IndexMismatchError,
  InvalidQueryError,
  RetrievalUnavailableError,
} from '../../search/errors.js';
import { IncompleteCollectionError, IngestionError } from '../../indexer/errors.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('Error classes', () => {
  it('defaults CLIError to the general exit code without a hint', () => {
    const error = new CLIError('Something went wrong');

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ name: 'CLIError', code: 1, hint: undefined });
  });

  it('keeps the cause passed through options', () => {
    const cause = new Error('disk full');
    const error = new CLIError('Write failed', undefined, ExitCode.Database, { cause });

    expect(error.cause).toBe(cause);
    expect(error.code).toBe(5);
  });

  it('names the missing path', () => {
    const error = new FileNotFoundError('/docs');

    expect(error.message).toBe('Path does not exist: /docs');
    expect(error.path).toBe('/docs');
    expect(error.code).toBe(ExitCode.NotFound);
  });

  it('points ConfigError at config list unless a hint is given', () => {
    expect(new ConfigError('Bad value').hint).toBe('Run: ragrail config list  to see valid options');
    expect(new ConfigError('Bad value', 'Fix it').hint).toBe('Fix it');
  });

  it('derives the env var name for APIKeyError', () => {
    const error = new APIKeyError('openai');

    expect(error.message).toBe('openai API key not configured');
    expect(error.hint).toContain('OPENAI_API_KEY');
    expect(new APIKeyError('anthropic', 'CLAUDE_KEY').hint).toContain('CLAUDE_KEY');
  });

  it('wraps the driver error as the DatabaseError cause', () => {
    const driverError = new Error('SQLITE_BUSY');

    expect(new DatabaseError('Database locked', driverError).cause).toBe(driverError);
    expect(new DatabaseError('Database locked').cause).toBeUndefined();
  });

  it('keeps validation issues on ValidationError', () => {
    const error = new ValidationError('Invalid command options', ['top: too big']);

    expect(error.issues).toEqual(['top: too big']);
    expect(error.hint).toBe('Check your input and try again');
  });

  it.each([
    [new ValidationError('x'), 1],
    [new ConfigError('x'), 2],
    [new FileNotFoundError('x'), 3],
    [new APIKeyError('x'), 4],
    [new DatabaseError('x'), 5],
    [new IndexMismatchError('x'), 6],
    [new InvalidQueryError(['x']), 7],
    [new RetrievalUnavailableError('x'), 8],
    [new FusionInconsistencyError('docs', ['a']), 9],
    [new IngestionError('x', 0), 10],
    [new IncompleteCollectionError('docs'), 10],
  ])('%s exits with %i', (error, code) => {
    expect(getExitCode(error)).toBe(code);
  });

  it('exits with 1 for anything that is not a CLIError', () => {
    expect(getExitCode(new Error('boom'))).toBe(1);
    expect(getExitCode('boom')).toBe(1);
  });
});

describe('describeError', () => {
  it('normalizes a CLIError', () => {
    expect(describeError(new ConfigError('Bad value', 'Fix it'))).toEqual({
      error: 'Bad value',
      name: 'ConfigError',
      code: 2,
      hint: 'Fix it',
    });
  });

  it('suggests --verbose for plain errors', () => {
    expect(describeError(new Error('boom'))).toEqual({
      error: 'boom',
      name: 'Error',
      code: 1,
      hint: 'Run with --verbose for more details',
    });
  });

  it('stringifies thrown non-errors', () => {
    expect(describeError(42)).toEqual({ error: '42', name: 'Error', code: 1 });
  });

  it('includes validation issues', () => {
    const output = describeError(new ValidationError('Invalid command options', ['a', 'b']));

    expect(output.issues).toEqual(['a', 'b']);
  });

  it('adds the cause chain and stack only when verbose', () => {
    const root = new Error('connection refused');
    const middle = new DatabaseError('Query failed', root);
    const error = new RetrievalUnavailableError('Retrieval unavailable (search)', middle);

    expect(describeError(error).causes).toBeUndefined();
    expect(describeError(error).stack).toBeUndefined();

    const verbose = describeError(error, true);
    expect(verbose.causes).toEqual(['Query failed', 'connection refused']);
    expect(verbose.stack).toBeDefined();
  });

  it('records a non-error cause as a string', () => {
    const error = new IngestionError('Batch 2 failed', 2, 'timeout');

    expect(describeError(error, true).causes).toEqual(['timeout']);
  });
});

describe('formatError', () => {
  it('renders message, issues and hint as text', () => {
    const error = new ValidationError('Invalid command options', ['top: too big']);

    expect(formatError(error)).toBe(
      ['Error: Invalid command options', '  - top: too big', 'Hint: Check your input and try again'].join(
        '\n'
      )
    );
  });

  it('renders causes under the hint when verbose', () => {
    const error = new DatabaseError('Query failed', new Error('SQLITE_BUSY'));
    const lines = formatError(error, { verbose: true }).split('\n');

    expect(lines.slice(0, 3)).toEqual([
      'Error: Query failed',
      'Hint: Try running: ragrail status  to check database health',
      'Caused by: SQLITE_BUSY',
    ]);
    expect(lines[4]).toBe('Stack trace:');
  });

  it('renders JSON', () => {
    const parsed: unknown = JSON.parse(formatError(new FileNotFoundError('/docs'), { json: true }));

    expect(parsed).toEqual({
      error: 'Path does not exist: /docs',
      name: 'FileNotFoundError',
      code: 3,
      hint: 'Check the path and try again',
    });
  });
});

describe('handleError', () => {
  it('prints to stderr and exits with the error code', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exit = vi.spyOn(process, 'exit').mockImplementation((): never => {
      throw new Error('exit');
    });

    expect(() => handleError(new IndexMismatchError('Wrong model'))).toThrow('exit');
    expect(stderr).toHaveBeenCalledWith(expect.stringContaining('Error: Wrong model'));
    expect(exit).toHaveBeenCalledWith(6);

    stderr.mockRestore();
    exit.mockRestore();
  });

  it('reads options when an error arrives', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exit = vi.spyOn(process, 'exit').mockImplementation((): never => {
      throw new Error('exit');
    });
    const options = { json: false };
    const handler = createGlobalErrorHandler(() => options);

    options.json = true;
    expect(() => handler(new ConfigError('Bad value'))).toThrow('exit');
    expect(stderr.mock.calls[0]?.[0]).toContain('"code": 2');

    stderr.mockRestore();
    exit.mockRestore();
  });
});
