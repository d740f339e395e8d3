/**
 * Answer Generator Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { LLMAnswerGenerator, parseAnswer } from '../generator.js';
import { SYSTEM_PROMPT, UNUSABLE_REPLY_REFUSAL } from '../prompt.js';
import { ScriptedLLM } from '../../test-utils/index.js';

const CONTEXT = 'RETRIEVED CONTEXT:\n\n--- SOURCE 1 ---\nFile: sky.txt\nThe sky is blue.\n';

describe('parseAnswer', () => {
  it('parses a bare JSON reply', () => {
    expect(parseAnswer('{"grounded": true, "answer": "Blue (sky.txt)."}')).toEqual({
      grounded: true,
      answer: 'Blue (sky.txt).',
    });
  });

  it('parses a fenced reply with surrounding prose', () => {
    const reply = 'Here you go:\n```json\n{"grounded": false, "answer": "Not in the documents."}\n```';
    expect(parseAnswer(reply)).toEqual({ grounded: false, answer: 'Not in the documents.' });
  });

  it('parses a reply followed by braces in prose', () => {
    const reply = '{"grounded": true, "answer": "The sky is blue."}\nSources: {sky.txt}';
    expect(parseAnswer(reply)).toEqual({ grounded: true, answer: 'The sky is blue.' });
  });

  it('trims the answer', () => {
    expect(parseAnswer('{"grounded": true, "answer": "  Blue.  "}').answer).toBe('Blue.');
  });

  it('refuses when the reply has no JSON object', () => {
    const logger = { warn: vi.fn() };

    expect(parseAnswer('The sky is blue.', logger)).toEqual({
      grounded: false,
      answer: UNUSABLE_REPLY_REFUSAL,
    });
    expect(logger.warn).toHaveBeenCalledWith('Model reply held no JSON object; refusing');
  });

  it('refuses when the JSON is malformed', () => {
    const logger = { warn: vi.fn() };

    expect(parseAnswer('{"grounded": true, "answer": }', logger)).toEqual({
      grounded: false,
      answer: UNUSABLE_REPLY_REFUSAL,
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('refuses when fields have the wrong type', () => {
    expect(parseAnswer('{"grounded": "yes", "answer": "Blue."}')).toEqual({
      grounded: false,
      answer: UNUSABLE_REPLY_REFUSAL,
    });
  });

  it('refuses a blank grounded answer', () => {
    expect(parseAnswer('{"grounded": true, "answer": "   "}')).toEqual({
      grounded: false,
      answer: UNUSABLE_REPLY_REFUSAL,
    });
  });
});

describe('LLMAnswerGenerator', () => {
  it('sends the system prompt and the question with its context', async () => {
    const llm = new ScriptedLLM(['{"grounded": true, "answer": "Blue."}']);
    const generator = new LLMAnswerGenerator({ llm });

    const result = await generator.generate({ question: 'What color is the sky?', context: CONTEXT });

    expect(result).toEqual({ grounded: true, answer: 'Blue.' });
    expect(llm.chats).toHaveLength(1);
    expect(llm.chats[0]?.messages).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: `QUESTION:\nWhat color is the sky?\n\n${CONTEXT}` },
    ]);
  });

  it('uses temperature 0.1 by default and forwards maxTokens and the signal', async () => {
    const llm = new ScriptedLLM(['{"grounded": true, "answer": "Blue."}']);
    const controller = new AbortController();
    const generator = new LLMAnswerGenerator({ llm, maxTokens: 512 });

    await generator.generate({ question: 'q', context: CONTEXT, signal: controller.signal });

    expect(llm.chats[0]?.options).toEqual({
      maxTokens: 512,
      temperature: 0.1,
      signal: controller.signal,
    });
  });

  it('returns a refusal for an unusable reply', async () => {
    const generator = new LLMAnswerGenerator({ llm: new ScriptedLLM(['I think it is blue.']) });

    const result = await generator.generate({ question: 'q', context: CONTEXT });

    expect(result).toEqual({ grounded: false, answer: UNUSABLE_REPLY_REFUSAL });
  });

  it('propagates provider errors', async () => {
    const generator = new LLMAnswerGenerator({
      llm: new ScriptedLLM([new Error('connection reset')]),
    });

    await expect(generator.generate({ question: 'q', context: CONTEXT })).rejects.toThrow(
      'connection reset'
    );
  });
});
