/**
 * Text Chunker
 *
 * Splits document text into chunks of at most `chunkSize` UTF-16 code
 * units, keeping paragraphs together where they fit and falling back to
 * sentence boundaries, then hard splits, for oversized paragraphs. A hard
 * split never separates a surrogate pair.
 */

/** Default maximum characters per chunk */
export const DEFAULT_CHUNK_SIZE = 2000;

export interface SplitOptions {
  /** Maximum characters per chunk (default: 2000) */
  chunkSize?: number;
}

const PARAGRAPH_SEPARATOR = '\n\n';
const SENTENCE_BOUNDARY = /(?<=[.!?。！？])\s+/u;

/**
 * Greedily join parts with `separator` into strings no longer than `max`.
 * Every part must already fit within `max`.
 */
function pack(parts: string[], separator: string, max: number): string[] {
  const packed: string[] = [];
  let current = '';

  for (const part of parts) {
    if (current === '') {
      current = part;
    } else if (current.length + separator.length + part.length <= max) {
      current += separator + part;
    } else {
      packed.push(current);
      current = part;
    }
  }
  if (current !== '') {
    packed.push(current);
  }
  return packed;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut into pieces of at most `max` code units, never between the halves of
 * a surrogate pair. With `max` 1 a pair becomes a piece of its own.
 */
function hardSplit(text: string, max: number): string[] {
  const pieces: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + max, text.length);
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
      end = end - 1 > start ? end - 1 : end + 1;
    }
    pieces.push(text.slice(start, end));
    start = end;
  }
  return pieces;
}

function splitParagraph(paragraph: string, max: number): string[] {
  if (paragraph.length <= max) {
    return [paragraph];
  }
  const sentences = paragraph
    .split(SENTENCE_BOUNDARY)
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .flatMap((s) => (s.length <= max ? [s] : hardSplit(s, max)));
  return pack(sentences, ' ', max);
}

/**
 * Split text into chunks.
 *
 * @example
 * ```typescript
 * splitText('First paragraph.\n\nSecond one.', { chunkSize: 20 });
 * // ['First paragraph.', 'Second one.']
 * ```
 */
export function splitText(text: string, options: SplitOptions = {}): string[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }

  const paragraphs = text
    .replace(/\r\n?/g, '\n')
    .split(/\n[ \t]*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  const pieces = paragraphs.flatMap((p) => splitParagraph(p, chunkSize));
  return pack(pieces, PARAGRAPH_SEPARATOR, chunkSize);
}
