/**
 * LLM Answer Generator
 *
 * Asks the model for a JSON verdict {grounded, answer} over the retrieved
 * context. Anything that does not parse into that shape becomes a refusal.
 */

import { z } from 'zod';
import type { LLMProvider } from '../providers/types.js';
import { extractJsonObject, safeJsonParse } from '../utils/json.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { buildAnswerMessages, UNUSABLE_REPLY_REFUSAL } from './prompt.js';
import type { AnswerGenerator, GeneratedAnswer, GenerationInput } from './types.js';

export const DEFAULT_ANSWER_TEMPERATURE = 0.1;

const AnswerSchema = z.object({
  grounded: z.boolean(),
  answer: z.string(),
});

const UNUSABLE: GeneratedAnswer = { grounded: false, answer: UNUSABLE_REPLY_REFUSAL };

export interface LLMAnswerGeneratorOptions {
  llm: LLMProvider;
  maxTokens?: number;
  /** Default: 0.1 */
  temperature?: number;
  logger?: Logger;
}

/**
 * Parse a model reply into an answer, or a refusal when it is unusable.
 * Accepts the object bare, inside prose or inside a code fence.
 */
export function parseAnswer(reply: string, logger: Logger = silentLogger): GeneratedAnswer {
  const json = extractJsonObject(reply);
  if (json === null) {
    logger.warn('Model reply held no JSON object; refusing');
    return UNUSABLE;
  }

  // An empty answer doubles as the parse-failure fallback
  const parsed = safeJsonParse(json, AnswerSchema, { grounded: false, answer: '' }, (error) => {
    logger.warn(`Model reply did not match {grounded, answer}: ${error.message}`);
  });

  const answer = parsed.answer.trim();
  if (answer === '') {
    return UNUSABLE;
  }
  return { grounded: parsed.grounded, answer };
}

export class LLMAnswerGenerator implements AnswerGenerator {
  private readonly llm: LLMProvider;
  private readonly maxTokens?: number;
  private readonly temperature: number;
  private readonly logger: Logger;

  constructor(options: LLMAnswerGeneratorOptions) {
    this.llm = options.llm;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature ?? DEFAULT_ANSWER_TEMPERATURE;
    this.logger = options.logger ?? silentLogger;
  }

  async generate(input: GenerationInput): Promise<GeneratedAnswer> {
    const reply = await this.llm.chat(buildAnswerMessages(input.question, input.context), {
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      signal: input.signal,
    });
    if (reply.usage) {
      this.logger.debug?.(
        `Answer used ${reply.usage.inputTokens} input / ${reply.usage.outputTokens} output tokens`
      );
    }
    return parseAnswer(reply.content, this.logger);
  }
}
