/**
 * Environment variable helpers
 *
 * Numeric helpers fall back to the default on unparsable values; range checks
 * happen in the zod schemas that consume them.
 */

import { ConfigurationError } from '../errors/index.js';

/**
 * Get an environment variable or throw if not set
 *
 * @example
 * const apiKey = getEnvOrThrow('OPENAI_API_KEY', 'OpenAI API key');
 */
export function getEnvOrThrow(key: string, description?: string): string {
  const value = process.env[key];
  if (!value) {
    const desc = description ? ` (${description})` : '';
    throw new ConfigurationError(`Environment variable ${key}${desc} is required but not set`, {
      code: 'MISSING_ENV',
    });
  }
  return value;
}

/**
 * @example
 * const datasetsDir = getEnvWithDefault('BENCH_DATASETS_DIR', 'datasets');
 */
export function getEnvWithDefault(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value || defaultValue;
}

export function getEnvOptional(key: string): string | undefined {
  const value = process.env[key];
  return value ? value : undefined;
}

/**
 * Integer environment variable
 *
 * @example
 * const concurrency = getEnvNumber('BENCH_CONCURRENCY', 2);
 */
export function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}
