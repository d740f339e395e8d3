/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { safeJsonParse, extractJsonObject } from './json.js';
export { consoleLogger, silentLogger, type Logger } from './logger.js';
