/**
 * LLM Query Refiner
 *
 * After each retrieval, asks the model whether to answer now or search
 * again with a new query. Unreadable replies mean "answer".
 */

import { z } from 'zod';
import type { LLMProvider } from '../providers/types.js';
import { extractJsonObject, safeJsonParse } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { buildRefinerMessages } from './prompt.js';
import type { QueryRefiner, RefinerDecision, RefinerInput } from './types.js';

const RefinerDecisionSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('answer') }),
  z.object({ action: z.literal('retrieve'), query: z.string() }),
]);

const ANSWER: RefinerDecision = { action: 'answer' };

export interface LLMQueryRefinerOptions {
  llm: LLMProvider;
  /** Default: 256 */
  maxTokens?: number;
  logger?: Logger;
}

export class LLMQueryRefiner implements QueryRefiner {
  private readonly llm: LLMProvider;
  private readonly maxTokens: number;
  private readonly logger: Logger;

  constructor(options: LLMQueryRefinerOptions) {
    this.llm = options.llm;
    this.maxTokens = options.maxTokens ?? 256;
    this.logger = options.logger ?? silentLogger;
  }

  async next(input: RefinerInput): Promise<RefinerDecision> {
    const reply = await this.llm.chat(
      buildRefinerMessages(input.question, input.queries, input.passages),
      { maxTokens: this.maxTokens, temperature: 0, signal: input.signal }
    );

    const json = extractJsonObject(reply.content);
    if (json === null) {
      this.logger.warn('Refiner reply held no JSON object; answering');
      return ANSWER;
    }
    return safeJsonParse(json, RefinerDecisionSchema, ANSWER, (error) => {
      this.logger.warn(`Unreadable refiner reply: ${error.message}`);
    });
  }
}
