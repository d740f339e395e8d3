/**
 * Agent Types
 *
 * Type definitions for the grounded agent loop, its retrieval tool and the
 * generation boundary.
 */

import type { Logger } from '../utils/logger.js';

// ============================================================================
// PASSAGES AND TURNS
// ============================================================================

/**
 * Retrieved text plus provenance, as the agent sees it. Scores and ranks
 * stay inside the search module.
 */
export interface RetrievedPassage {
  /** Used for deduplication only; never shown to the model */
  chunkId: string;
  text: string;
  sourcePath: string;
}

/**
 * One invocation of the retrieval tool during a turn.
 */
export interface ToolCallRecord {
  query: string;
  passages: RetrievedPassage[];
  /** Set when retrieval failed for this call */
  error?: string;
}

/**
 * The outcome of one question.
 */
export interface AgentTurn {
  question: string;
  toolCalls: ToolCallRecord[];
  answer: string;
  /** False for refusals: no evidence, outages, cancellations, unusable replies */
  grounded: boolean;
  /** Every distinct passage gathered, in first-seen order */
  passages: RetrievedPassage[];
}

// ============================================================================
// STATE MACHINE
// ============================================================================

export type AgentState = 'AWAITING_DECISION' | 'RETRIEVING' | 'ANSWERING' | 'DONE';

/**
 * Progress events emitted during a turn.
 *
 * The caller (CLI renderer, tests) decides how to display each event.
 */
export type AgentEvent =
  | { type: 'state'; state: AgentState }
  | { type: 'tool_start'; call: number; query: string }
  | { type: 'tool_result'; call: number; query: string; passages: number; added: number }
  | { type: 'tool_error'; call: number; query: string; error: string }
  | { type: 'answer'; answer: string; grounded: boolean };

export interface AskOptions {
  /** Checked at every state change; aborting ends the turn with a refusal */
  signal?: AbortSignal;
  onEvent?: (event: AgentEvent) => void;
}

// ============================================================================
// COLLABORATORS
// ============================================================================

/**
 * The only surface the agent uses to reach the index.
 */
export interface PassageRetriever {
  invoke(question: string): Promise<RetrievedPassage[]>;
}

export interface GenerationInput {
  question: string;
  /** Passages rendered by formatPassages() */
  context: string;
  signal?: AbortSignal;
}

export interface GeneratedAnswer {
  answer: string;
  grounded: boolean;
}

/**
 * Produces the final answer from the question and the retrieved context.
 */
export interface AnswerGenerator {
  generate(input: GenerationInput): Promise<GeneratedAnswer>;
}

export interface RefinerInput {
  question: string;
  /** Queries already issued this turn, in order */
  queries: string[];
  passages: RetrievedPassage[];
  signal?: AbortSignal;
}

export type RefinerDecision = { action: 'answer' } | { action: 'retrieve'; query: string };

/**
 * Decides whether another retrieval would help, and with which query.
 */
export interface QueryRefiner {
  next(input: RefinerInput): Promise<RefinerDecision>;
}

export interface GroundedAgentOptions {
  tool: PassageRetriever;
  generator: AnswerGenerator;
  /** Without a refiner the agent retrieves once per question */
  refiner?: QueryRefiner;
  /** Hard cap on retrieval calls per turn (default: 3) */
  maxToolCalls?: number;
  logger?: Logger;
}
