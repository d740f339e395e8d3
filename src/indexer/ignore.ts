/**
 * Gitignore Pattern Handling
 *
 * Loads and applies gitignore-style patterns with the 'ignore' package,
 * which implements the full gitignore syntax.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import ignore from 'ignore';

/**
 * Always-ignored locations: VCS metadata, dependency and build output,
 * editor state and local secrets.
 */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  '.git/',
  '.hg/',
  '.svn/',
  'node_modules/',
  'vendor/',
  'dist/',
  'build/',
  'out/',
  'coverage/',
  '.cache/',
  '.venv/',
  'venv/',
  '__pycache__/',
  '.idea/',
  '.vscode/',
  '.env',
  '.env.*',
  '*.lock',
  'package-lock.json',
];

export interface IgnoreFilterOptions {
  /** Root directory containing .gitignore */
  rootPath: string;
  /** Additional patterns to ignore (merged with .gitignore) */
  additionalPatterns?: readonly string[];
  /** Whether to use DEFAULT_IGNORE_PATTERNS (default: true) */
  useDefaults?: boolean;
}

/** Returns true when a path should be IGNORED */
export type IgnoreFilter = (filePath: string) => boolean;

/**
 * Parse gitignore file content into patterns, dropping blank lines and
 * comments (negations starting with ! are kept).
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Load gitignore patterns from a file. Missing file means no patterns.
 */
export function loadGitignoreFile(gitignorePath: string): string[] {
  if (!existsSync(gitignorePath)) {
    return [];
  }
  return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
}

/**
 * Create an ignore filter for a root directory.
 *
 * Patterns come from, in increasing priority:
 * 1. DEFAULT_IGNORE_PATTERNS (if useDefaults)
 * 2. .gitignore in the root directory
 * 3. additionalPatterns
 *
 * @example
 * ```ts
 * const shouldIgnore = createIgnoreFilter({ rootPath: '/docs', additionalPatterns: ['drafts/'] });
 * shouldIgnore('drafts/todo.md'); // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true } = options;
  const ig = ignore();

  if (useDefaults) {
    ig.add([...DEFAULT_IGNORE_PATTERNS]);
  }
  ig.add(loadGitignoreFile(join(rootPath, '.gitignore')));
  if (additionalPatterns.length > 0) {
    ig.add([...additionalPatterns]);
  }

  // The ignore library expects root-relative paths with forward slashes
  return (filePath: string): boolean => {
    let relativePath = filePath.startsWith(rootPath) ? relative(rootPath, filePath) : filePath;
    if (sep === '\\') {
      relativePath = relativePath.split(sep).join('/');
    }
    if (relativePath === '') {
      return false;
    }
    return ig.ignores(relativePath);
  };
}
