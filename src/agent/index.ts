/**
 * Agent Module
 *
 * Retrieval-first question answering over an indexed collection. The agent
 * reaches the index only through the retrieval tool and refuses when it has
 * no evidence.
 *
 * @example
 * ```typescript
 * import { createGroundedAgent } from './agent';
 *
 * const agent = createGroundedAgent(config, { engine, llm });
 * const turn = await agent.ask('What color is the sky?');
 *
 * if (!turn.grounded) {
 *   console.log('No grounded answer:', turn.answer);
 * }
 * ```
 *
 * @packageDocumentation
 */

export { GroundedAgent, createGroundedAgent, DEFAULT_MAX_TOOL_CALLS } from './agent-loop.js';
export type { CreateGroundedAgentOptions } from './agent-loop.js';

export { LLMAnswerGenerator, parseAnswer, DEFAULT_ANSWER_TEMPERATURE } from './generator.js';
export type { LLMAnswerGeneratorOptions } from './generator.js';

export { LLMQueryRefiner } from './refiner.js';
export type { LLMQueryRefinerOptions } from './refiner.js';

export {
  SYSTEM_PROMPT,
  REFINER_PROMPT,
  NO_CONTEXT_REFUSAL,
  OUTAGE_REFUSAL,
  INCONSISTENT_INDEX_REFUSAL,
  UNUSABLE_REPLY_REFUSAL,
  CANCELLED_REFUSAL,
  buildAnswerMessages,
  buildRefinerMessages,
} from './prompt.js';

export { RetrievalTool, formatPassages } from './tools/index.js';
export type { RetrievalToolOptions } from './tools/index.js';

export type {
  RetrievedPassage,
  ToolCallRecord,
  AgentTurn,
  AgentState,
  AgentEvent,
  AskOptions,
  PassageRetriever,
  GenerationInput,
  GeneratedAnswer,
  AnswerGenerator,
  RefinerInput,
  RefinerDecision,
  QueryRefiner,
  GroundedAgentOptions,
} from './types.js';
