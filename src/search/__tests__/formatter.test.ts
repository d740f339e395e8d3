/**
 * Formatter Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatResult,
  formatResults,
  formatResultJSON,
  formatScore,
  truncateSnippet,
} from '../formatter.js';
import type { RetrievedChunk } from '../types.js';

function createResult(overrides: Partial<RetrievedChunk> = {}): RetrievedChunk {
  return {
    chunkId: 'c-1',
    text: 'The sky is blue.',
    sourcePath: 'notes/sky.txt',
    score: 1 / 61,
    rank: 1,
    metadata: { sourcePath: 'notes/sky.txt', sequenceIndex: 0 },
    ...overrides,
  };
}

describe('formatScore', () => {
  it('shows four decimals', () => {
    expect(formatScore(1 / 61)).toBe('0.0164');
    expect(formatScore(0)).toBe('0.0000');
  });
});

describe('truncateSnippet', () => {
  it('collapses whitespace', () => {
    expect(truncateSnippet('Line 1\n\n  Line 2', 20)).toBe('Line 1 Line 2');
  });

  it('adds an ellipsis when truncating', () => {
    expect(truncateSnippet('Hello world', 5)).toBe('Hello...');
  });
});

describe('formatResult', () => {
  it('shows rank, score, source and snippet', () => {
    expect(formatResult(createResult())).toBe(
      '1. [0.0164] notes/sky.txt (part 1)\n  The sky is blue.'
    );
  });

  it('can hide the score', () => {
    expect(formatResult(createResult(), { showScore: false })).toBe(
      '1. notes/sky.txt (part 1)\n  The sky is blue.'
    );
  });

  it('labels results without provenance', () => {
    expect(formatResult(createResult({ sourcePath: '' })).split('\n')[0]).toBe(
      '1. [0.0164] (unknown source) (part 1)'
    );
  });

  it('omits the part number when the position is unknown', () => {
    expect(formatResult(createResult({ metadata: {} })).split('\n')[0]).toBe(
      '1. [0.0164] notes/sky.txt'
    );
  });
});

describe('formatResults', () => {
  it('separates results with blank lines', () => {
    const text = formatResults([
      createResult(),
      createResult({ rank: 2, sourcePath: 'cats.txt', text: 'Cats are mammals.', metadata: {} }),
    ]);

    expect(text).toBe(
      '1. [0.0164] notes/sky.txt (part 1)\n  The sky is blue.\n\n2. [0.0164] cats.txt\n  Cats are mammals.'
    );
  });

  it('returns an empty string for no results', () => {
    expect(formatResults([])).toBe('');
  });
});

describe('formatResultJSON', () => {
  it('keeps the sequence index and drops other metadata', () => {
    expect(formatResultJSON(createResult())).toEqual({
      rank: 1,
      score: 1 / 61,
      chunkId: 'c-1',
      sourcePath: 'notes/sky.txt',
      text: 'The sky is blue.',
      sequenceIndex: 0,
    });
  });

  it('leaves sequenceIndex out when it is not an integer', () => {
    const json = formatResultJSON(createResult({ metadata: { sequenceIndex: 'x' } }));

    expect(json).not.toHaveProperty('sequenceIndex');
  });
});
