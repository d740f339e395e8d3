/**
 * Status Command
 *
 * Displays collections, storage size and configured models:
 *   ragrail status         - Show system status
 *   ragrail status --json  - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { statSync, existsSync } from 'node:fs';
import type { CommandContext } from '../types.js';
import { getConfigPath, getDbPath } from '../../config/paths.js';
import type { CollectionInfo } from '../../database/types.js';
import { defaultDeps, type CommandDeps } from '../runtime.js';
import { validateProviderKey, type ValidationResult } from '../../providers/validation.js';

/**
 * One collection as reported by `ragrail status`.
 */
export interface CollectionStatusJSON {
  name: string;
  status: CollectionInfo['status'];
  entries: number;
  dimensions: number;
  distance: CollectionInfo['distance'];
  embeddingModel: string;
  sparseEncoder: string;
  updatedAt: string;
}

/**
 * A configured provider and whether its credentials check out.
 */
export interface ProviderStatusJSON {
  provider: string;
  model: string;
  ready: boolean;
  problem?: string;
}

function providerStatus(
  provider: 'anthropic' | 'openai' | 'ollama',
  model: string
): ProviderStatusJSON {
  const check: ValidationResult = validateProviderKey(provider);
  return check.valid
    ? { provider, model, ready: true }
    : { provider, model, ready: false, problem: check.error };
}

function describeProvider(status: ProviderStatusJSON): string {
  const line = `${status.model} (${status.provider})`;
  return status.problem ? `${line}  ${chalk.yellow(status.problem)}` : line;
}

/**
 * Format bytes to human-readable size (e.g., "127.4 MB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

/**
 * Format a path with ~ for home directory
 */
function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

/**
 * Get the database file size in bytes
 */
function getDbFileSize(dbPath: string): number {
  return existsSync(dbPath) ? statSync(dbPath).size : 0;
}

/**
 * Create the status command
 */
export function createStatusCommand(
  getContext: () => CommandContext,
  deps: CommandDeps = defaultDeps
): Command {
  return new Command('status')
    .description('Show collections, storage size and configured models')
    .action(async () => {
      const ctx = getContext();
      ctx.debug('Fetching system status...');

      const config = deps.loadConfig();
      const storage = deps.openStorage(ctx);
      const dbPath = getDbPath();
      const dbSize = getDbFileSize(dbPath);
      const configPath = getConfigPath();
      const embedding = providerStatus(config.embedding.provider, config.embedding.model);
      const llm = providerStatus(config.llm.provider, config.llm.model);

      const collections: CollectionStatusJSON[] = [];
      for (const info of await storage.listCollections()) {
        collections.push({
          name: info.name,
          status: info.status,
          entries: await storage.countEntries(info.name),
          dimensions: info.dimensions,
          distance: info.distance,
          embeddingModel: info.embeddingModel,
          sparseEncoder: info.sparseEncoder,
          updatedAt: info.updatedAt,
        });
      }

      if (ctx.options.json) {
        const jsonOutput = {
          collections,
          database: {
            path: dbPath,
            size: dbSize,
            sizeFormatted: formatBytes(dbSize),
          },
          embedding,
          llm,
          config: {
            path: configPath,
          },
        };
        console.log(JSON.stringify(jsonOutput, null, 2));
        return;
      }

      const lines: string[] = [];
      lines.push(chalk.bold('ragrail status'));
      lines.push(chalk.dim('─'.repeat(35)));

      if (collections.length === 0) {
        lines.push(chalk.yellow('No collections yet.'));
        lines.push(`Run ${chalk.cyan('ragrail index <path>')} to get started.`);
      } else {
        lines.push(chalk.cyan('Collections:'));
        for (const c of collections) {
          const badge = c.status === 'ready' ? chalk.green('ready') : chalk.yellow('building');
          const marker = c.name === config.collection.name ? '*' : ' ';
          lines.push(
            `  ${marker} ${c.name}  ${badge}  ${c.entries.toLocaleString()} chunks  ` +
              chalk.dim(`${c.embeddingModel}, ${c.dimensions}d, ${c.distance}`)
          );
        }
        if (collections.some((c) => c.status === 'building')) {
          lines.push(chalk.dim('  Collections still building need: ragrail index <path> --rebuild'));
        }
      }

      lines.push('');
      lines.push(`${chalk.cyan('Database:')}     ${formatBytes(dbSize)} (${formatPath(dbPath)})`);
      lines.push(`${chalk.cyan('Embeddings:')}   ${describeProvider(embedding)}`);
      lines.push(`${chalk.cyan('LLM:')}          ${describeProvider(llm)}`);
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(configPath)}`);

      ctx.log(lines.join('\n'));
    });
}
