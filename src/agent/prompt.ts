/**
 * Prompts and refusal messages for the grounded agent.
 */

import type { ChatMessage } from '../providers/types.js';
import { formatPassages } from './tools/retrieval-tool.js';
import type { RetrievedPassage } from './types.js';

/**
 * System prompt for answer generation. The model only ever sees retrieved
 * context and must say so when that context falls short.
 */
export const SYSTEM_PROMPT = `You answer questions about a private document collection using only the retrieved context you are given.

## Rules
- Base every statement strictly on the retrieved context.
- Do not use prior knowledge or assumptions beyond the retrieved documents.
- If the context does not contain the answer, say clearly that the information is not available.
- Never invent facts, explanations or sources.

## Style
- Be precise, factual and concise.
- Cite the file names of the sources you rely on.
- Prefer quoting or closely paraphrasing the retrieved text.

## Output format
Reply with a single JSON object and nothing else:
{"grounded": true, "answer": "<your answer>"}
Set "grounded" to false when the context does not answer the question; "answer" then explains that the information is not available.`;

/**
 * System prompt for deciding whether another retrieval is worthwhile.
 */
export const REFINER_PROMPT = `You decide whether the retrieved passages are enough to answer a question from a private document collection.

If they are enough, or no better search is likely to help, reply:
{"action": "answer"}

If a different search query would likely find missing information, reply:
{"action": "retrieve", "query": "<new search query>"}

Never repeat a query that was already used. Reply with the JSON object only.`;

// ============================================================================
// Refusals
// ============================================================================

export const NO_CONTEXT_REFUSAL =
  'No relevant context was found in the indexed documents, so this question cannot be answered.';

export const OUTAGE_REFUSAL =
  'Document retrieval is currently unavailable, so this question cannot be answered from the indexed documents. Please try again later.';

export const INCONSISTENT_INDEX_REFUSAL =
  'The document index is inconsistent, so no reliable answer can be given. Rebuild the index and ask again.';

export const UNUSABLE_REPLY_REFUSAL =
  'An answer grounded in the retrieved documents could not be produced.';

export const CANCELLED_REFUSAL = 'The question was cancelled before an answer was produced.';

// ============================================================================
// Messages
// ============================================================================

export function buildAnswerMessages(question: string, context: string): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: `QUESTION:\n${question}\n\n${context}` },
  ];
}

export function buildRefinerMessages(
  question: string,
  queries: readonly string[],
  passages: readonly RetrievedPassage[]
): ChatMessage[] {
  const used = queries.map((q) => `- ${q}`).join('\n');
  const context = passages.length > 0 ? formatPassages(passages) : 'RETRIEVED CONTEXT: (none)';
  return [
    { role: 'system', content: REFINER_PROMPT },
    {
      role: 'user',
      content: `QUESTION:\n${question}\n\nQUERIES USED:\n${used}\n\n${context}`,
    },
  ];
}
