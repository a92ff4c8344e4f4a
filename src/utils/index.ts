/**
 * Utility functions and helpers
 */

export {
  withRetry,
  sleep,
  calculateBackoffDelay,
  DEFAULT_RETRY_OPTIONS,
  type RetryOptions,
  type RetryAttemptInfo,
} from './retry.js';

export { logger, createLogger, createCellLogger } from './logger.js';

export {
  getEnvOrThrow,
  getEnvWithDefault,
  getEnvOptional,
  getEnvNumber,
} from './env.js';

export { cleanJsonText, parseJsonLenient, parseUnitOutput } from './json-parser.js';

export { formatZodIssues } from './validation.js';

export { deepFreeze } from './freeze.js';
