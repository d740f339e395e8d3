/**
 * Provider credential checks.
 *
 * Results name the environment variable and the rule that failed, never
 * the key itself. Only getProviderKey() returns a key, and its result goes
 * straight to an API client.
 */

import { z } from 'zod';
import {
  API_KEY_ENV,
  getApiKey,
  getEnv,
  SETUP_INSTRUCTIONS,
  type KeyedProvider,
} from '../config/env.js';
import { CLIError, ExitCode } from '../errors/index.js';

export type { KeyedProvider } from '../config/env.js';

export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

// ============================================================================
// FORMAT SCHEMAS
// ============================================================================

function prefixedKey(prefix: string, provider: string) {
  return z
    .string()
    .min(1, 'API key cannot be empty')
    .refine(
      (key) => key.startsWith(prefix),
      `Invalid ${provider} API key format (should start with "${prefix}")`
    );
}

export const AnthropicKeySchema = prefixedKey('sk-ant-', 'Anthropic');

/** Covers sk-, sk-proj- and sk-svcacct- keys */
export const OpenAIKeySchema = prefixedKey('sk-', 'OpenAI');

export const OllamaHostSchema = z
  .string()
  .url('Invalid Ollama host URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'Ollama host must be an HTTP(S) URL'
  );

/**
 * Format rule per provider. OpenAI-compatible endpoints issue keys in
 * their own formats, so OPENAI_BASE_URL turns the OpenAI rule off.
 */
function formatRule(provider: KeyedProvider): z.ZodType<string> | null {
  if (provider === 'anthropic') {
    return AnthropicKeySchema;
  }
  return getEnv('OPENAI_BASE_URL') === undefined ? OpenAIKeySchema : null;
}

function invalid(error: string, provider: KeyedProvider | 'ollama'): ValidationResult {
  return { valid: false, error, setupInstructions: SETUP_INSTRUCTIONS[provider] };
}

// ============================================================================
// VALIDATION
// ============================================================================

function validateKey(provider: KeyedProvider): ValidationResult {
  const key = getApiKey(provider);
  if (key === undefined) {
    return invalid(`${API_KEY_ENV[provider]} environment variable is not set`, provider);
  }
  const result = formatRule(provider)?.safeParse(key);
  if (result && !result.success) {
    return invalid(result.error.issues[0]?.message ?? 'Invalid API key format', provider);
  }
  return { valid: true };
}

export function validateAnthropicKey(): ValidationResult {
  return validateKey('anthropic');
}

export function validateOpenAIKey(): ValidationResult {
  return validateKey('openai');
}

/**
 * Validate an Ollama host URL (defaults to OLLAMA_HOST).
 */
export function validateOllamaHost(host: string = getEnv('OLLAMA_HOST')): ValidationResult {
  const result = OllamaHostSchema.safeParse(host);
  if (!result.success) {
    return invalid(result.error.issues[0]?.message ?? 'Invalid Ollama host URL', 'ollama');
  }
  return { valid: true };
}

/**
 * @example
 * ```typescript
 * const result = validateProviderKey(config.llm.provider);
 * if (!result.valid) {
 *   ctx.warn(result.error);
 * }
 * ```
 */
export function validateProviderKey(provider: KeyedProvider | 'ollama'): ValidationResult {
  return provider === 'ollama' ? validateOllamaHost() : validateKey(provider);
}

/**
 * The provider's API key, checked first. Never log it.
 *
 * @throws CLIError (exit code 4) with setup instructions as the hint
 */
export function getProviderKey(provider: KeyedProvider): string {
  const validation = validateKey(provider);
  if (!validation.valid) {
    throw new CLIError(validation.error, validation.setupInstructions, ExitCode.APIKey);
  }
  const key = getApiKey(provider);
  if (key === undefined) {
    throw new CLIError(`${API_KEY_ENV[provider]} is not configured`, undefined, ExitCode.APIKey);
  }
  return key;
}
