/**
 * Query Refiner Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { LLMQueryRefiner } from '../refiner.js';
import { REFINER_PROMPT } from '../prompt.js';
import { ScriptedLLM } from '../../test-utils/index.js';
import type { RefinerInput } from '../types.js';

const INPUT: RefinerInput = {
  question: 'What color is the sky at sunset?',
  queries: ['What color is the sky at sunset?'],
  passages: [{ chunkId: 'a', text: 'The sky is blue.', sourcePath: 'sky.txt' }],
};

describe('LLMQueryRefiner', () => {
  it('returns a retrieve decision', async () => {
    const refiner = new LLMQueryRefiner({
      llm: new ScriptedLLM(['{"action": "retrieve", "query": "sunset colors"}']),
    });

    expect(await refiner.next(INPUT)).toEqual({ action: 'retrieve', query: 'sunset colors' });
  });

  it('returns an answer decision from a fenced reply', async () => {
    const refiner = new LLMQueryRefiner({
      llm: new ScriptedLLM(['```json\n{"action": "answer"}\n```']),
    });

    expect(await refiner.next(INPUT)).toEqual({ action: 'answer' });
  });

  it('shows the question, the queries used and the passages at temperature 0', async () => {
    const llm = new ScriptedLLM(['{"action": "answer"}']);
    const refiner = new LLMQueryRefiner({ llm });

    await refiner.next(INPUT);

    const chat = llm.chats[0];
    expect(chat?.options).toEqual({ maxTokens: 256, temperature: 0, signal: undefined });
    expect(chat?.messages[0]).toEqual({ role: 'system', content: REFINER_PROMPT });
    expect(chat?.messages[1]?.content).toBe(
      'QUESTION:\nWhat color is the sky at sunset?\n\n' +
        'QUERIES USED:\n- What color is the sky at sunset?\n\n' +
        'RETRIEVED CONTEXT:\n\n--- SOURCE 1 ---\nFile: sky.txt\nThe sky is blue.\n\n\nSOURCES:\n- sky.txt'
    );
  });

  it('marks an empty context', async () => {
    const llm = new ScriptedLLM(['{"action": "answer"}']);
    const refiner = new LLMQueryRefiner({ llm });

    await refiner.next({ ...INPUT, passages: [] });

    expect(llm.chats[0]?.messages[1]?.content).toContain('RETRIEVED CONTEXT: (none)');
  });

  it('answers when the reply is not JSON', async () => {
    const logger = { warn: vi.fn() };
    const refiner = new LLMQueryRefiner({ llm: new ScriptedLLM(['search again']), logger });

    expect(await refiner.next(INPUT)).toEqual({ action: 'answer' });
    expect(logger.warn).toHaveBeenCalledWith('Refiner reply held no JSON object; answering');
  });

  it('answers when the action is unknown or the query is missing', async () => {
    const logger = { warn: vi.fn() };
    const refiner = new LLMQueryRefiner({
      llm: new ScriptedLLM(['{"action": "stop"}', '{"action": "retrieve"}']),
      logger,
    });

    expect(await refiner.next(INPUT)).toEqual({ action: 'answer' });
    expect(await refiner.next(INPUT)).toEqual({ action: 'answer' });
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('propagates provider errors', async () => {
    const refiner = new LLMQueryRefiner({ llm: new ScriptedLLM([new Error('rate limited')]) });

    await expect(refiner.next(INPUT)).rejects.toThrow('rate limited');
  });
});
