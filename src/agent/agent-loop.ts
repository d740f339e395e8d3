/**
 * Grounded Agent
 *
 * Retrieval-first question answering with a hard cap on tool calls:
 *
 *   AWAITING_DECISION → (RETRIEVING)* → ANSWERING → DONE
 *
 * The first retrieval always uses the question itself. The model is only
 * called when at least one passage was gathered, so an empty index or a
 * retrieval outage yields a refusal rather than an unsupported answer.
 */

import {
  FusionInconsistencyError,
  InvalidQueryError,
  RetrievalUnavailableError,
} from '../search/errors.js';
import type { Config } from '../config/schema.js';
import type { LLMProvider } from '../providers/types.js';
import type { HybridQueryEngine } from '../search/engine.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { LLMAnswerGenerator } from './generator.js';
import {
  CANCELLED_REFUSAL,
  INCONSISTENT_INDEX_REFUSAL,
  NO_CONTEXT_REFUSAL,
  OUTAGE_REFUSAL,
} from './prompt.js';
import { LLMQueryRefiner } from './refiner.js';
import { formatPassages, RetrievalTool } from './tools/retrieval-tool.js';
import type {
  AgentEvent,
  AgentState,
  AgentTurn,
  AnswerGenerator,
  AskOptions,
  GeneratedAnswer,
  GroundedAgentOptions,
  PassageRetriever,
  QueryRefiner,
  RefinerDecision,
  RetrievedPassage,
  ToolCallRecord,
} from './types.js';

export const DEFAULT_MAX_TOOL_CALLS = 3;

/**
 * Mutable bookkeeping for one turn. Never shared across turns.
 */
interface TurnState {
  question: string;
  toolCalls: ToolCallRecord[];
  passages: RetrievedPassage[];
  seen: Set<string>;
  outage: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class GroundedAgent {
  private readonly tool: PassageRetriever;
  private readonly generator: AnswerGenerator;
  private readonly refiner?: QueryRefiner;
  private readonly maxToolCalls: number;
  private readonly logger: Logger;

  constructor(options: GroundedAgentOptions) {
    const maxToolCalls = options.maxToolCalls ?? DEFAULT_MAX_TOOL_CALLS;
    if (!Number.isInteger(maxToolCalls) || maxToolCalls < 1) {
      throw new RangeError(`maxToolCalls must be a positive integer, got ${maxToolCalls}`);
    }

    this.tool = options.tool;
    this.generator = options.generator;
    this.refiner = options.refiner;
    this.maxToolCalls = maxToolCalls;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Answer one question from the index.
   *
   * @throws InvalidQueryError for a blank question
   */
  async ask(question: string, options: AskOptions = {}): Promise<AgentTurn> {
    const trimmed = question.trim();
    if (trimmed === '') {
      throw new InvalidQueryError(['question must not be blank']);
    }

    const { signal, onEvent } = options;
    const emit = (event: AgentEvent): void => onEvent?.(event);
    const turn: TurnState = {
      question: trimmed,
      toolCalls: [],
      passages: [],
      seen: new Set(),
      outage: false,
    };

    // Returns false once the signal has fired
    const enter = (state: AgentState): boolean => {
      emit({ type: 'state', state });
      return !signal?.aborted;
    };

    if (!enter('AWAITING_DECISION')) {
      return this.finish(turn, { grounded: false, answer: CANCELLED_REFUSAL }, emit);
    }

    let query: string | null = trimmed;
    while (query !== null) {
      if (!enter('RETRIEVING')) {
        return this.finish(turn, { grounded: false, answer: CANCELLED_REFUSAL }, emit);
      }

      const outcome = await this.retrieve(turn, query, emit);
      if (outcome === 'inconsistent') {
        return this.finish(turn, { grounded: false, answer: INCONSISTENT_INDEX_REFUSAL }, emit);
      }
      if (outcome === 'outage' || !this.refiner || turn.toolCalls.length >= this.maxToolCalls) {
        break;
      }

      if (!enter('AWAITING_DECISION')) {
        return this.finish(turn, { grounded: false, answer: CANCELLED_REFUSAL }, emit);
      }
      query = this.nextQuery(turn, await this.decide(this.refiner, turn, signal));
    }

    if (!enter('ANSWERING')) {
      return this.finish(turn, { grounded: false, answer: CANCELLED_REFUSAL }, emit);
    }

    if (turn.passages.length === 0) {
      const answer = turn.outage ? OUTAGE_REFUSAL : NO_CONTEXT_REFUSAL;
      return this.finish(turn, { grounded: false, answer }, emit);
    }

    let generated: GeneratedAnswer;
    try {
      generated = await this.generator.generate({
        question: turn.question,
        context: formatPassages(turn.passages),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        return this.finish(turn, { grounded: false, answer: CANCELLED_REFUSAL }, emit);
      }
      throw error;
    }

    return this.finish(turn, generated, emit);
  }

  /**
   * One tool call. Outages and fusion inconsistencies are recorded on the
   * call; anything else propagates.
   */
  private async retrieve(
    turn: TurnState,
    query: string,
    emit: (event: AgentEvent) => void
  ): Promise<'ok' | 'outage' | 'inconsistent'> {
    const call = turn.toolCalls.length + 1;
    const record: ToolCallRecord = { query, passages: [] };
    turn.toolCalls.push(record);
    emit({ type: 'tool_start', call, query });

    try {
      record.passages = await this.tool.invoke(query);
    } catch (error) {
      if (error instanceof RetrievalUnavailableError || error instanceof FusionInconsistencyError) {
        record.error = error.message;
        emit({ type: 'tool_error', call, query, error: error.message });
        this.logger.warn(`Retrieval call ${call} failed: ${error.message}`);
        if (error instanceof FusionInconsistencyError) {
          return 'inconsistent';
        }
        turn.outage = true;
        return 'outage';
      }
      throw error;
    }

    let added = 0;
    for (const passage of record.passages) {
      if (!turn.seen.has(passage.chunkId)) {
        turn.seen.add(passage.chunkId);
        turn.passages.push(passage);
        added++;
      }
    }
    emit({ type: 'tool_result', call, query, passages: record.passages.length, added });
    return 'ok';
  }

  private async decide(
    refiner: QueryRefiner,
    turn: TurnState,
    signal: AbortSignal | undefined
  ): Promise<RefinerDecision> {
    try {
      return await refiner.next({
        question: turn.question,
        queries: turn.toolCalls.map((c) => c.query),
        passages: [...turn.passages],
        signal,
      });
    } catch (error) {
      this.logger.warn(`Query refinement failed; answering: ${errorMessage(error)}`);
      return { action: 'answer' };
    }
  }

  /**
   * The follow-up query, or null when the turn should move on to answering.
   * Blank and already-issued queries (ignoring case) count as "answer".
   */
  private nextQuery(turn: TurnState, decision: RefinerDecision): string | null {
    if (decision.action === 'answer') {
      return null;
    }
    const query = decision.query.trim();
    if (query === '') {
      return null;
    }
    const normalized = query.toLowerCase();
    const repeated = turn.toolCalls.some((c) => c.query.trim().toLowerCase() === normalized);
    if (repeated) {
      this.logger.debug?.(`Refiner repeated query "${query}"; answering`);
      return null;
    }
    return query;
  }

  private finish(
    turn: TurnState,
    result: GeneratedAnswer,
    emit: (event: AgentEvent) => void
  ): AgentTurn {
    emit({ type: 'state', state: 'DONE' });
    emit({ type: 'answer', answer: result.answer, grounded: result.grounded });
    return {
      question: turn.question,
      toolCalls: turn.toolCalls,
      answer: result.answer,
      grounded: result.grounded,
      passages: turn.passages,
    };
  }
}

export interface CreateGroundedAgentOptions {
  engine: Pick<HybridQueryEngine, 'search'>;
  llm: LLMProvider;
  logger?: Logger;
  /** Overrides agent.refine_queries */
  refine?: boolean;
  /** Overrides agent.max_tool_calls */
  maxToolCalls?: number;
}

/**
 * Wire an agent from configuration: retrieval defaults come from
 * [retrieval], generation settings from [llm], loop limits from [agent].
 */
export function createGroundedAgent(
  config: Pick<Config, 'llm' | 'retrieval' | 'agent'>,
  options: CreateGroundedAgentOptions
): GroundedAgent {
  const { engine, llm, logger } = options;
  const refine = options.refine ?? config.agent.refine_queries;

  return new GroundedAgent({
    tool: new RetrievalTool({
      engine,
      topK: config.retrieval.top_k,
      denseWeight: config.retrieval.dense_weight,
      sparseWeight: config.retrieval.sparse_weight,
    }),
    generator: new LLMAnswerGenerator({
      llm,
      maxTokens: config.llm.max_tokens,
      temperature: config.llm.temperature,
      logger,
    }),
    refiner: refine ? new LLMQueryRefiner({ llm, logger }) : undefined,
    maxToolCalls: options.maxToolCalls ?? config.agent.max_tool_calls,
    logger,
  });
}
