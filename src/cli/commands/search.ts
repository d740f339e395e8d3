/**
 * Search Command
 *
 * Hybrid search over a collection: dense vectors + sparse lexical terms,
 * fused with weighted Reciprocal Rank Fusion.
 *
 *   ragrail search "sky color"
 *   ragrail search "login" -k 10 --json
 *   ragrail search "error code E42" --dense-weight 0.2 --sparse-weight 0.8
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { formatResults, formatResultsJSON } from '../../search/formatter.js';
import { defaultDeps, type CommandDeps } from '../runtime.js';
import { parseOptions, SearchOptionsSchema } from '../validation.js';

/**
 * Display empty results message with helpful tips.
 */
function displayEmptyResults(ctx: CommandContext, query: string, collection: string): void {
  ctx.log(chalk.yellow(`No results found for "${query}" in "${collection}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Try different keywords or phrasing'));
  ctx.log(chalk.dim(`  - Check the collection exists: ragrail status`));
}

/**
 * Create the search command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createSearchCommand(
  getContext: () => CommandContext,
  deps: CommandDeps = defaultDeps
): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Search a collection with hybrid retrieval')
    .option('-c, --collection <name>', 'Collection name (default: collection.name)')
    .option('-k, --top <number>', 'Number of results to return (default: retrieval.top_k)')
    .option('--dense-weight <weight>', 'Weight of the semantic ranking, 0-1')
    .option('--sparse-weight <weight>', 'Weight of the keyword ranking, 0-1')
    .action(async (query: string, cmdOptions: Record<string, unknown>) => {
      const ctx = getContext();
      const options = parseOptions(SearchOptionsSchema, cmdOptions);

      const config = deps.loadConfig();
      const collection = options.collection ?? config.collection.name;
      const topK = options.top ?? config.retrieval.top_k;
      const denseWeight = options.denseWeight ?? config.retrieval.dense_weight;
      const sparseWeight = options.sparseWeight ?? config.retrieval.sparse_weight;

      ctx.debug(`Query: "${query}"`);
      ctx.debug(`Collection: ${collection}, top-k: ${topK}, weights: ${denseWeight}/${sparseWeight}`);

      const runtime = await deps.createRuntime(config, ctx);
      const engine = runtime.engineFor(collection);

      const started = performance.now();
      const results = await engine.search({ text: query, topK, denseWeight, sparseWeight });
      ctx.debug(`Found ${results.length} results in ${Math.round(performance.now() - started)}ms`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              query: query.trim(),
              collection,
              count: results.length,
              results: formatResultsJSON(results),
            },
            null,
            2
          )
        );
      } else if (results.length === 0) {
        displayEmptyResults(ctx, query.trim(), collection);
      } else {
        ctx.log(
          chalk.bold(`Found ${results.length} result${results.length === 1 ? '' : 's'}`) +
            chalk.dim(` for "${query.trim()}" in ${collection}`)
        );
        ctx.log('');
        ctx.log(formatResults(results, { snippetLength: 200 }));
      }
    });
}
