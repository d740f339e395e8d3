/**
 * Ask Command
 *
 * Answers a question from a collection with the grounded agent: retrieve
 * first, optionally refine the query, and answer only from what was
 * retrieved.
 *
 *   ragrail ask "What color is the sky?"
 *   ragrail ask "How do refunds work?" --ingest ./handbook
 *   ragrail ask "..." --max-tool-calls 1 --no-refine --json
 *
 * Ctrl+C cancels the turn; the agent stops at its next step and refuses.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { CommandContext } from '../types.js';
import { createGroundedAgent } from '../../agent/agent-loop.js';
import type { AgentTurn } from '../../agent/types.js';
import { createAgentEventRenderer } from '../utils/agent-event-renderer.js';
import { defaultDeps, type CommandDeps } from '../runtime.js';
import { AskOptionsSchema, parseOptions } from '../validation.js';
import { ingestDirectory } from './index.js';

/**
 * JSON output format for the ask command.
 */
export interface AskOutputJSON {
  question: string;
  answer: string;
  grounded: boolean;
  sources: string[];
  toolCalls: Array<{ query: string; passages: number; error?: string }>;
  metadata: {
    collection: string;
    totalMs: number;
    model: string;
    provider: string;
  };
}

/**
 * Distinct source paths of the gathered passages, in first-seen order.
 */
export function collectSources(turn: AgentTurn): string[] {
  const sources: string[] = [];
  for (const passage of turn.passages) {
    const source = passage.sourcePath || '(unknown source)';
    if (!sources.includes(source)) {
      sources.push(source);
    }
  }
  return sources;
}

function displayTurn(ctx: CommandContext, turn: AgentTurn): void {
  ctx.log('');
  ctx.log(turn.grounded ? turn.answer : chalk.yellow(turn.answer));

  const sources = collectSources(turn);
  if (sources.length > 0) {
    ctx.log('');
    ctx.log(chalk.dim('Sources:'));
    for (const [i, source] of sources.entries()) {
      ctx.log(chalk.dim(`  [${i + 1}] ${source}`));
    }
  }
  ctx.log('');
}

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createAskCommand(
  getContext: () => CommandContext,
  deps: CommandDeps = defaultDeps
): Command {
  return new Command('ask')
    .argument('<question>', 'Question about the indexed documents')
    .description('Ask a question answered only from retrieved documents')
    .option('-c, --collection <name>', 'Collection name (default: collection.name)')
    .option('--max-tool-calls <n>', 'Maximum retrieval calls (default: agent.max_tool_calls)')
    .option('--ingest <dir>', 'Build the collection from this directory first (reused if built)')
    .option('--no-refine', 'Retrieve once with the question, without query refinement')
    .action(async (question: string, cmdOptions: Record<string, unknown>) => {
      const ctx = getContext();
      const options = parseOptions(AskOptionsSchema, cmdOptions);
      const started = performance.now();

      const config = deps.loadConfig();
      const collection = options.collection ?? config.collection.name;
      ctx.debug(`Question: "${question}"`);
      ctx.debug(`Collection: ${collection}`);

      const runtime = await deps.createRuntime(config, ctx);
      if (options.ingest) {
        await ingestDirectory(ctx, config, runtime, options.ingest, { collection });
      }

      const llm = await deps.createLLM(config);
      ctx.debug(`LLM: ${llm.name}/${llm.model}`);

      const agent = createGroundedAgent(config, {
        engine: runtime.engineFor(collection),
        llm,
        logger: ctx,
        refine: options.refine,
        maxToolCalls: options.maxToolCalls,
      });

      const interactive = !ctx.options.json && (process.stdout.isTTY ?? false);
      const spinner: Ora | null = interactive ? ora('Searching...').start() : null;

      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);

      let turn: AgentTurn;
      try {
        turn = await agent.ask(question, {
          signal: controller.signal,
          onEvent: createAgentEventRenderer(ctx, spinner),
        });
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        spinner?.stop();
      }

      if (ctx.options.json) {
        const output: AskOutputJSON = {
          question: turn.question,
          answer: turn.answer,
          grounded: turn.grounded,
          sources: collectSources(turn),
          toolCalls: turn.toolCalls.map((call) => ({
            query: call.query,
            passages: call.passages.length,
            error: call.error,
          })),
          metadata: {
            collection,
            totalMs: Math.round(performance.now() - started),
            model: llm.model,
            provider: llm.name,
          },
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      displayTurn(ctx, turn);
    });
}
