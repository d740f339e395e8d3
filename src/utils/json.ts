/**
 * JSON Utilities
 *
 * Schema-checked JSON parsing with fallback for corrupted data.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it against a schema, falling back on
 * any parse or validation failure.
 *
 * Use this when parsing JSON from external sources (database rows, model
 * output) where corruption is possible.
 *
 * @param onError - Called with the failure and the raw string before the fallback is returned
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, MetadataSchema, {});
 *
 * const decision = safeJsonParse(reply, DecisionSchema, { action: 'answer' }, (err) => {
 *   logger.warn(`Unreadable refiner reply: ${err.message}`);
 * });
 * ```
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
  onError?: (error: Error, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    onError?.(new Error(result.error.issues.map((i) => i.message).join('; ')), json);
    return fallback;
  }
  return result.data;
}

/**
 * Index one past the `}` that closes the object opening at `start`, or -1
 * when the text ends first. Braces inside string literals do not count.
 */
function closingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }
  return -1;
}

/**
 * Extract the first JSON object embedded in free-form text, such as a model
 * reply wrapped in prose or a ```json fence. Balanced spans that do not
 * parse (`{sky.txt}` in prose) are skipped.
 *
 * @returns The object's source text, or null when the text holds none
 */
export function extractJsonObject(text: string): string | null {
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = closingBrace(text, start);
    if (end === -1) {
      continue;
    }
    const candidate = text.slice(start, end);
    try {
      JSON.parse(candidate);
      return candidate;
    } catch {
      // Not JSON; try the next opening brace
    }
  }
  return null;
}
