/**
 * Rendering of retrieval results for `ragrail search`.
 *
 * Text output, one block per result:
 * ```
 * 1. [0.0328] notes/sky.txt (part 1)
 *   The sky is blue.
 * ```
 */

import type { FormatOptions, FormattedResultJSON, RetrievedChunk } from './types.js';

const DEFAULT_SNIPPET_LENGTH = 200;

/** RRF scores are at most 2/61 with k=60, so four decimals */
export function formatScore(score: number): string {
  return score.toFixed(4);
}

/**
 * Collapse whitespace onto one line and cut at `maxLength`, adding "...".
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const oneLine = content.replace(/\s+/g, ' ').trim();
  return oneLine.length <= maxLength ? oneLine : `${oneLine.slice(0, maxLength)}...`;
}

function sequenceIndexOf(result: RetrievedChunk): number | undefined {
  const value = result.metadata['sequenceIndex'];
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

/** Source path plus the 1-based part number within the file, when known */
function describeSource(result: RetrievedChunk): string {
  const path = result.sourcePath || '(unknown source)';
  const index = sequenceIndexOf(result);
  return index === undefined ? path : `${path} (part ${index + 1})`;
}

export function formatResult(result: RetrievedChunk, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true } = options;
  const score = showScore ? ` [${formatScore(result.score)}]` : '';
  const snippet = truncateSnippet(result.text, snippetLength);
  return `${result.rank}.${score} ${describeSource(result)}\n  ${snippet}`;
}

export function formatResults(results: RetrievedChunk[], options: FormatOptions = {}): string {
  return results.map((result) => formatResult(result, options)).join('\n\n');
}

export function formatResultJSON(result: RetrievedChunk): FormattedResultJSON {
  const json: FormattedResultJSON = {
    rank: result.rank,
    score: result.score,
    chunkId: result.chunkId,
    sourcePath: result.sourcePath,
    text: result.text,
  };
  const sequenceIndex = sequenceIndexOf(result);
  if (sequenceIndex !== undefined) {
    json.sequenceIndex = sequenceIndex;
  }
  return json;
}

export function formatResultsJSON(results: RetrievedChunk[]): FormattedResultJSON[] {
  return results.map(formatResultJSON);
}
