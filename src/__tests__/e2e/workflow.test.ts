/**
 * E2E Workflow Tests
 *
 * Index → search → ask, wired from the real builder, engine and agent.
 * Only the edges are faked: in-memory SQLite, the hashing embedder and a
 * scripted LLM.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { IndexBuilder } from '../../indexer/builder.js';
import { chunksFromTexts } from '../../indexer/source.js';
import type { HybridEmbedder } from '../../indexer/embedder/types.js';
import { HybridQueryEngine } from '../../search/engine.js';
import type { VectorStorage } from '../../database/types.js';
import type { SqliteVectorStorage } from '../../database/vector-storage.js';
import { GroundedAgent } from '../../agent/agent-loop.js';
import { LLMAnswerGenerator } from '../../agent/generator.js';
import { RetrievalTool } from '../../agent/tools/retrieval-tool.js';
import { NO_CONTEXT_REFUSAL, OUTAGE_REFUSAL } from '../../agent/prompt.js';
import {
  createMemoryStorage,
  createTestEmbedder,
  FlakyStorage,
  ScriptedLLM,
} from '../../test-utils/index.js';

const TEXTS = ['The sky is blue.', 'Cats are mammals.', 'Qdrant stores vectors.'];

describe('E2E: index, search, ask', () => {
  let storage: SqliteVectorStorage;
  let embedder: HybridEmbedder;

  beforeEach(() => {
    storage = createMemoryStorage();
    ({ embedder } = createTestEmbedder(256));
  });

  function engineFor(collection: string, store: VectorStorage = storage): HybridQueryEngine {
    return new HybridQueryEngine({ storage: store, embedder, collection, retryBackoffMs: 0 });
  }

  function agentFor(engine: HybridQueryEngine, llm: ScriptedLLM): GroundedAgent {
    return new GroundedAgent({
      tool: new RetrievalTool({ engine, topK: 1 }),
      generator: new LLMAnswerGenerator({ llm }),
    });
  }

  it('answers from the single matching chunk', async () => {
    const summary = await new IndexBuilder({ storage, embedder }).buildOrReuse(
      'docs',
      chunksFromTexts(TEXTS, 'notes.txt')
    );
    expect(summary).toMatchObject({ created: true, entryCount: 3 });

    const results = await engineFor('docs').search({
      text: 'What color is the sky?',
      topK: 1,
      denseWeight: 0.5,
      sparseWeight: 0.5,
    });
    expect(results.map((r) => r.text)).toEqual(['The sky is blue.']);

    const llm = new ScriptedLLM(['{"grounded": true, "answer": "Blue (notes.txt)."}']);
    const turn = await agentFor(engineFor('docs'), llm).ask('What color is the sky?');

    expect(turn).toMatchObject({ grounded: true, answer: 'Blue (notes.txt).' });
    expect(turn.passages).toEqual([
      { chunkId: results[0]?.chunkId, text: 'The sky is blue.', sourcePath: 'notes.txt' },
    ]);
    const prompt = llm.chats[0]?.messages[1]?.content ?? '';
    expect(prompt).toContain('The sky is blue.');
    expect(prompt).not.toContain('Cats are mammals.');
  });

  it('reuses a ready collection on the second build', async () => {
    const builder = new IndexBuilder({ storage, embedder });
    await builder.buildOrReuse('docs', chunksFromTexts(TEXTS));

    const again = await builder.buildOrReuse('docs', chunksFromTexts(['Something else.']));

    expect(again).toMatchObject({ created: false, entryCount: 3 });
  });

  it('refuses without calling the model when the collection is empty', async () => {
    await storage.createCollection({
      name: 'empty',
      dimensions: 256,
      distance: 'cosine',
      embeddingModel: embedder.model,
      sparseEncoder: embedder.sparseEncoder,
    });
    const llm = new ScriptedLLM([]);

    const turn = await agentFor(engineFor('empty'), llm).ask('What color is the sky?');

    expect(turn).toMatchObject({ grounded: false, answer: NO_CONTEXT_REFUSAL });
    expect(turn.toolCalls).toEqual([{ query: 'What color is the sky?', passages: [] }]);
    expect(llm.chats).toHaveLength(0);
  });

  it('completes the turn with a refusal when storage stays down', async () => {
    await new IndexBuilder({ storage, embedder }).buildOrReuse('docs', chunksFromTexts(TEXTS));
    const flaky = new FlakyStorage(storage, new Set(['searchDense']));
    flaky.failures = 2;
    const llm = new ScriptedLLM([]);

    const turn = await agentFor(engineFor('docs', flaky), llm).ask('What color is the sky?');

    expect(turn).toMatchObject({ grounded: false, answer: OUTAGE_REFUSAL });
    expect(turn.toolCalls[0]?.error).toBe(
      'Retrieval unavailable (search): Simulated outage in searchDense'
    );
    // One attempt plus one retry
    expect(flaky.calls.filter((c) => c === 'searchDense')).toHaveLength(2);
    expect(llm.chats).toHaveLength(0);
  });

  it('recovers from a single storage failure', async () => {
    await new IndexBuilder({ storage, embedder }).buildOrReuse('docs', chunksFromTexts(TEXTS));
    const flaky = new FlakyStorage(storage, new Set(['searchDense']));
    flaky.failures = 1;
    const llm = new ScriptedLLM(['{"grounded": true, "answer": "Blue."}']);

    const turn = await agentFor(engineFor('docs', flaky), llm).ask('What color is the sky?');

    expect(turn).toMatchObject({ grounded: true, answer: 'Blue.' });
    expect(turn.toolCalls[0]?.error).toBeUndefined();
  });
});
