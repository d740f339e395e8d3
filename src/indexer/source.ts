/**
 * Directory Chunk Source
 *
 * Discovers text documents under a directory with fast-glob, filters them
 * through .gitignore and the configured ignore patterns, and yields their
 * chunks lazily in a stable order (files sorted by relative path, chunks in
 * document order).
 */

import { createHash } from 'node:crypto';
import { existsSync, statSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { extname, basename, resolve } from 'node:path';
import fg from 'fast-glob';
import { CLIError, FileNotFoundError } from '../errors/index.js';
import { createIgnoreFilter } from './ignore.js';
import { splitText, DEFAULT_CHUNK_SIZE } from './chunker.js';
import type { Chunk, ChunkSource } from './types.js';

/** File extensions read as plain text (without the dot) */
export const DEFAULT_TEXT_EXTENSIONS: readonly string[] = [
  'txt',
  'md',
  'markdown',
  'mdx',
  'rst',
  'csv',
  'json',
  'yaml',
  'yml',
  'html',
  'htm',
  'xml',
  'log',
];

export interface DirectorySourceOptions {
  /** Maximum characters per chunk */
  chunkSize?: number;
  /** Extensions to include, without the dot */
  extensions?: readonly string[];
  /** Extra gitignore-style patterns */
  ignorePatterns?: readonly string[];
}

/**
 * Deterministic, UUID-shaped chunk id derived from provenance, so
 * re-ingesting the same corpus produces the same ids.
 */
export function chunkIdFor(sourcePath: string, sequenceIndex: number): string {
  const hex = createHash('sha256').update(`${sourcePath}:${sequenceIndex}`).digest('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}

/**
 * Find indexable files under a directory.
 *
 * @returns Root-relative paths with forward slashes, sorted
 */
export async function discoverFiles(
  rootPath: string,
  options: Pick<DirectorySourceOptions, 'extensions' | 'ignorePatterns'> = {}
): Promise<string[]> {
  const extensions = options.extensions ?? DEFAULT_TEXT_EXTENSIONS;
  if (extensions.length === 0) {
    return [];
  }
  const pattern =
    extensions.length === 1 ? `**/*.${extensions[0]}` : `**/*.{${extensions.join(',')}}`;

  const shouldIgnore = createIgnoreFilter({
    rootPath,
    additionalPatterns: options.ignorePatterns,
  });

  const entries = await fg(pattern, {
    cwd: rootPath,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    caseSensitiveMatch: false,
    suppressErrors: true,
  });

  return entries.filter((relativePath) => !shouldIgnore(relativePath)).sort();
}

/**
 * Chunk source over the text files of a directory.
 *
 * @example
 * ```typescript
 * const source = await DirectoryChunkSource.open('./docs', { chunkSize: 1500 });
 * await builder.buildOrReuse('docs', source);
 * ```
 */
export class DirectoryChunkSource implements ChunkSource {
  private constructor(
    readonly rootPath: string,
    readonly files: readonly string[],
    private readonly chunkSize: number
  ) {}

  /**
   * Validate the directory and discover its files.
   *
   * @throws FileNotFoundError if the path does not exist
   * @throws CLIError if it is not a directory or holds no indexable files
   */
  static async open(
    rootPath: string,
    options: DirectorySourceOptions = {}
  ): Promise<DirectoryChunkSource> {
    const absoluteRoot = resolve(rootPath);
    if (!existsSync(absoluteRoot)) {
      throw new FileNotFoundError(absoluteRoot);
    }
    if (!statSync(absoluteRoot).isDirectory()) {
      throw new CLIError(
        `Not a directory: ${absoluteRoot}`,
        'Pass the folder that contains your documents'
      );
    }

    const files = await discoverFiles(absoluteRoot, options);
    if (files.length === 0) {
      const extensions = (options.extensions ?? DEFAULT_TEXT_EXTENSIONS).join(', ');
      throw new CLIError(
        `No indexable files found in ${absoluteRoot}`,
        `Supported extensions: ${extensions}. Hidden and ignored files are skipped.`
      );
    }

    return new DirectoryChunkSource(absoluteRoot, files, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Chunk> {
    for (const sourcePath of this.files) {
      const content = await readFile(resolve(this.rootPath, sourcePath), 'utf-8');
      const pieces = splitText(content, { chunkSize: this.chunkSize });

      for (const [sequenceIndex, text] of pieces.entries()) {
        yield {
          id: chunkIdFor(sourcePath, sequenceIndex),
          text,
          sourcePath,
          sequenceIndex,
          metadata: {
            fileName: basename(sourcePath),
            extension: extname(sourcePath).slice(1).toLowerCase(),
          },
        };
      }
    }
  }
}

/**
 * Chunk source over in-memory texts, one chunk per text.
 * Handy for small corpora, scripts and tests.
 */
export async function* chunksFromTexts(
  texts: readonly string[],
  sourcePath = 'inline'
): AsyncGenerator<Chunk> {
  for (const [sequenceIndex, text] of texts.entries()) {
    yield { id: chunkIdFor(sourcePath, sequenceIndex), text, sourcePath, sequenceIndex };
  }
}
