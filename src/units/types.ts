/**
 * Options shared by model-backed units
 */

import type { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { formatZodIssues } from '../utils/validation.js';

export interface ModelUnitOptions<TClient> {
  /** API key (overrides the environment variable named by the config) */
  apiKey?: string;
  /** Pre-configured client instance (for testing or custom configuration) */
  client?: TClient;
}

/**
 * Validate a unit config, filling its defaults
 *
 * @throws ConfigurationError listing every schema issue
 */
export function parseUnitConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  framework: string
): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error).join('; ');
    throw new ConfigurationError(
      `Invalid unit config for framework "${framework}": ${issues}`,
      { code: 'INVALID_UNIT_CONFIG', cause: result.error }
    );
  }
  return result.data;
}
