/**
 * Provider credentials and endpoints from the environment.
 *
 * A `.env` file in the working directory is read on first access. Key
 * values never reach logs or error messages; callers only learn whether a
 * key is present.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/** Blank strings are treated as unset */
const blankAsUnset = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.preprocess(blankAsUnset, z.string().optional()),
  OPENAI_API_KEY: z.preprocess(blankAsUnset, z.string().optional()),
  /** OpenAI-compatible endpoint for chat and embeddings */
  OPENAI_BASE_URL: z.preprocess(blankAsUnset, z.string().optional()),
  OLLAMA_HOST: z.preprocess(blankAsUnset, z.string().default(DEFAULT_OLLAMA_HOST)),
});

export type EnvVars = z.infer<typeof EnvSchema>;

export type KeyedProvider = 'anthropic' | 'openai';

/** Environment variable holding each provider's API key */
export const API_KEY_ENV = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const satisfies Record<KeyedProvider, keyof EnvVars>;

let envCache: EnvVars | null = null;
let dotenvLoaded = false;

/**
 * Parse the environment once and cache it. Key presence is not required
 * here; a provider checks for its own key when it is created.
 */
export function loadEnv(): EnvVars {
  if (envCache) {
    return envCache;
  }
  if (!dotenvLoaded) {
    dotenvConfig();
    dotenvLoaded = true;
  }

  envCache = EnvSchema.parse({
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OPENAI_BASE_URL: process.env.OPENAI_BASE_URL,
    OLLAMA_HOST: process.env.OLLAMA_HOST,
  });
  return envCache;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/** The provider's key, for handing to its client only */
export function getApiKey(provider: KeyedProvider): string | undefined {
  return getEnv(API_KEY_ENV[provider]);
}

export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Drop the cached environment so the next access re-reads process.env.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

function keyInstructions(what: string, provider: KeyedProvider, keyUrl: string): string {
  return [
    `To use ${what}:`,
    '',
    `1. Get an API key from ${keyUrl}`,
    '2. Set it in the environment or in a .env file:',
    '',
    `   ${API_KEY_ENV[provider]}="..."`,
  ].join('\n');
}

/**
 * Shown as the hint when a provider cannot be used.
 */
export const SETUP_INSTRUCTIONS: Record<KeyedProvider | 'ollama', string> = {
  anthropic: keyInstructions('Anthropic models', 'anthropic', 'https://console.anthropic.com/'),

  openai: [
    keyInstructions('OpenAI chat and embeddings', 'openai', 'https://platform.openai.com/api-keys'),
    '',
    '3. (Optional) Point at an OpenAI-compatible endpoint:',
    '',
    '   OPENAI_BASE_URL="https://example.com/v1"',
  ].join('\n'),

  ollama: [
    'To use Ollama (local models):',
    '',
    '1. Install Ollama from https://ollama.com/ and run: ollama serve',
    '2. Pull the chat and embedding models named in config.toml, e.g.:',
    '',
    '   ollama pull llama3.2',
    '   ollama pull nomic-embed-text',
    '',
    `3. (Optional) Set OLLAMA_HOST if the server is not at ${DEFAULT_OLLAMA_HOST}`,
  ].join('\n'),
};
