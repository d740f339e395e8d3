/**
 * Retrieval Tool
 *
 * The callable surface the agent uses to search the index. Wraps the
 * hybrid query engine with input validation and strips scores, ranks and
 * metadata so only text and provenance reach the agent.
 */

import { z } from 'zod';
import type { HybridQueryEngine } from '../../search/engine.js';
import { InvalidQueryError } from '../../search/errors.js';
import type { PassageRetriever, RetrievedPassage } from '../types.js';

// ============================================================================
// Input Schema
// ============================================================================

const retrievalInputSchema = z
  .string({ invalid_type_error: 'question must be a string' })
  .trim()
  .min(1, 'question must not be blank')
  .describe('Natural-language question or search query for the indexed documents');

// ============================================================================
// Formatting
// ============================================================================

/**
 * Render passages as numbered source blocks followed by the distinct
 * source files.
 *
 * @example
 * ```typescript
 * formatPassages([{ chunkId: 'a', text: 'The sky is blue.', sourcePath: 'sky.txt' }]);
 * // RETRIEVED CONTEXT:
 * //
 * // --- SOURCE 1 ---
 * // File: sky.txt
 * // The sky is blue.
 * //
 * //
 * // SOURCES:
 * // - sky.txt
 * ```
 */
export function formatPassages(passages: readonly RetrievedPassage[]): string {
  if (passages.length === 0) {
    return '';
  }

  const sources: string[] = [];
  const blocks = passages.map((passage, i) => {
    const source = passage.sourcePath || `Document ${i + 1}`;
    if (!sources.includes(source)) {
      sources.push(source);
    }
    return `--- SOURCE ${i + 1} ---\nFile: ${source}\n${passage.text}\n`;
  });

  return (
    'RETRIEVED CONTEXT:\n\n' +
    blocks.join('\n') +
    '\n\nSOURCES:\n' +
    sources.map((source) => `- ${source}`).join('\n')
  );
}

// ============================================================================
// Tool
// ============================================================================

export interface RetrievalToolOptions {
  engine: Pick<HybridQueryEngine, 'search'>;
  /** Results per call (default: 5) */
  topK?: number;
  /** Default: 0.5 */
  denseWeight?: number;
  /** Default: 0.5 */
  sparseWeight?: number;
}

/**
 * @example
 * ```typescript
 * const tool = new RetrievalTool({ engine, topK: config.retrieval.top_k });
 * const passages = await tool.invoke('What color is the sky?');
 * ```
 */
export class RetrievalTool implements PassageRetriever {
  readonly name = 'search_documents';
  readonly description =
    'Search the indexed documents with hybrid (semantic + keyword) retrieval.';

  private readonly engine: Pick<HybridQueryEngine, 'search'>;
  private readonly topK: number;
  private readonly denseWeight: number;
  private readonly sparseWeight: number;

  constructor(options: RetrievalToolOptions) {
    this.engine = options.engine;
    this.topK = options.topK ?? 5;
    this.denseWeight = options.denseWeight ?? 0.5;
    this.sparseWeight = options.sparseWeight ?? 0.5;
  }

  /**
   * @throws InvalidQueryError for a blank question
   */
  async invoke(question: string): Promise<RetrievedPassage[]> {
    const input = retrievalInputSchema.safeParse(question);
    if (!input.success) {
      throw new InvalidQueryError(input.error.issues.map((issue) => issue.message));
    }

    const results = await this.engine.search({
      text: input.data,
      topK: this.topK,
      denseWeight: this.denseWeight,
      sparseWeight: this.sparseWeight,
    });

    return results.map((result) => ({
      chunkId: result.chunkId,
      text: result.text,
      sourcePath: result.sourcePath,
    }));
  }
}
