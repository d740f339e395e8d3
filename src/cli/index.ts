#!/usr/bin/env node
/**
 * ragrail CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { GlobalOptions } from './types.js';
import { createContext } from './context.js';
import { createAskCommand } from './commands/ask.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import { safeJsonParse } from '../utils/json.js';

// Same relative location from src/cli and dist/cli
const VERSION = safeJsonParse(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
  z.object({ version: z.string() }),
  { version: '0.0.0' }
).version;

const program = new Command();

program
  .name('ragrail')
  .description('Hybrid retrieval over your documents, with an agent that only answers from what it finds')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('ragrail index ./docs')}                     Build the default collection
  ${chalk.cyan('ragrail search "sky color" -k 3')}          Hybrid search
  ${chalk.cyan('ragrail ask "What color is the sky?"')}     Grounded question answering
  ${chalk.cyan('ragrail status')}                           List collections
  ${chalk.cyan('ragrail config set retrieval.top_k 8')}     Change a setting
`);

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createIndexCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createStatusCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    'Run: ragrail --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const getErrorOptions = () => getGlobalOptions();

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
