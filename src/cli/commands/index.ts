/**
 * Index Command
 *
 * Builds a collection from a directory of text documents.
 *
 * Usage:
 *   ragrail index <path>                    Build the configured collection
 *   ragrail index ./docs -c handbook        Build a named collection
 *   ragrail index ./docs --rebuild          Drop and rebuild
 *   ragrail index ./docs --json             Output progress as NDJSON
 *
 * An existing, fully built collection is reused as is. A collection left
 * half-built by an interrupted run is refused until --rebuild is given.
 */

import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import type { Config } from '../../config/schema.js';
import { DirectoryChunkSource } from '../../indexer/source.js';
import type { BuildResult } from '../../indexer/types.js';
import { createProgressReporter } from '../utils/progress.js';
import { defaultDeps, type CommandDeps, type Runtime } from '../runtime.js';
import { IndexOptionsSchema, parseOptions } from '../validation.js';

export interface IngestOptions {
  collection: string;
  rebuild?: boolean;
  batchSize?: number;
}

/**
 * Discover, chunk, embed and store a directory, reporting progress.
 * Shared by `index` and `ask --ingest`.
 */
export async function ingestDirectory(
  ctx: CommandContext,
  config: Config,
  runtime: Runtime,
  path: string,
  options: IngestOptions
): Promise<BuildResult> {
  const source = await DirectoryChunkSource.open(path, {
    chunkSize: config.indexing.chunk_size,
    ignorePatterns: config.indexing.ignore_patterns,
  });
  ctx.debug(`Discovered ${source.files.length} files under ${source.rootPath}`);

  const reporter = createProgressReporter({
    json: ctx.options.json,
    verbose: ctx.options.verbose,
  });

  const started = performance.now();
  reporter.start(options.collection, source.files.length);

  let result: BuildResult;
  try {
    result = await runtime.builder.buildOrReuse(options.collection, source, {
      rebuild: options.rebuild,
      batchSize: options.batchSize,
      onProgress: (batchIndex, written) => reporter.batch(batchIndex, written),
    });
  } catch (error) {
    reporter.fail(error instanceof Error ? error.message : String(error));
    throw error;
  }

  reporter.complete({
    collection: options.collection,
    ...result,
    files: source.files.length,
    durationMs: performance.now() - started,
  });
  return result;
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createIndexCommand(
  getContext: () => CommandContext,
  deps: CommandDeps = defaultDeps
): Command {
  return new Command('index')
    .argument('<path>', 'Directory of documents to index')
    .description('Build a searchable collection from a directory')
    .option('-c, --collection <name>', 'Collection name (default: collection.name)')
    .option('--rebuild', 'Drop the collection and build it again', false)
    .option('-b, --batch-size <n>', 'Chunks embedded and written per batch')
    .action(async (path: string, cmdOptions: Record<string, unknown>) => {
      const ctx = getContext();
      const options = parseOptions(IndexOptionsSchema, cmdOptions);

      const config = deps.loadConfig();
      const collection = options.collection ?? config.collection.name;
      ctx.debug(`Collection: ${collection}${options.rebuild ? ' (rebuild)' : ''}`);

      const runtime = await deps.createRuntime(config, ctx);
      if (runtime.usedFallback) {
        ctx.warn(`Using fallback embedding model ${runtime.embedder.model}`);
      }

      await ingestDirectory(ctx, config, runtime, path, {
        collection,
        rebuild: options.rebuild,
        batchSize: options.batchSize,
      });
    });
}
