/**
 * Agent Event Renderer
 *
 * Turns GroundedAgent progress events into terminal output: spinner text
 * for tool activity and [debug] lines with --verbose.
 *
 * ```
 * GroundedAgent.ask({ onEvent })
 *     │
 *     └── createAgentEventRenderer(ctx, spinner) → ora text + ctx.debug()
 * ```
 */

import chalk from 'chalk';
import type { Ora } from 'ora';
import type { AgentEvent } from '../../agent/types.js';
import type { CommandContext } from '../types.js';

const QUERY_DISPLAY_LENGTH = 60;

function shorten(query: string): string {
  return query.length > QUERY_DISPLAY_LENGTH
    ? `${query.slice(0, QUERY_DISPLAY_LENGTH - 3)}...`
    : query;
}

/**
 * One-line description of an event, or null for events that are not shown.
 */
export function describeAgentEvent(event: AgentEvent): string | null {
  switch (event.type) {
    case 'state':
      return `State: ${event.state}`;
    case 'tool_start':
      return `Search ${event.call}: "${shorten(event.query)}"`;
    case 'tool_result':
      return `Search ${event.call}: ${event.passages} passage${event.passages === 1 ? '' : 's'}, ${event.added} new`;
    case 'tool_error':
      return `Search ${event.call} failed: ${event.error}`;
    case 'answer':
      return null;
  }
}

/**
 * Build an onEvent callback for GroundedAgent.ask().
 *
 * @param spinner - Updated with the current activity when present
 */
export function createAgentEventRenderer(
  ctx: CommandContext,
  spinner: Pick<Ora, 'text'> | null = null
): (event: AgentEvent) => void {
  return (event) => {
    const description = describeAgentEvent(event);
    if (description) {
      ctx.debug(description);
    }
    if (!spinner) {
      return;
    }

    switch (event.type) {
      case 'tool_start':
        spinner.text = chalk.cyan(`Searching: "${shorten(event.query)}"...`);
        break;
      case 'tool_error':
        spinner.text = chalk.yellow('Search unavailable, preparing answer...');
        break;
      case 'state':
        if (event.state === 'ANSWERING') {
          spinner.text = 'Writing answer...';
        }
        break;
      default:
        break;
    }
  };
}
