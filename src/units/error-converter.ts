/**
 * SDK Error Converter - maps provider SDK errors onto the benchmark error kinds
 *
 * The OpenAI and Anthropic SDKs share their error class names, so one set of
 * patterns serves both. The first matching pattern wins.
 */

import {
  BenchError,
  FatalExecutionError,
  TransientExecutionError,
  ValidationError,
} from '../errors/index.js';

export type SdkProvider = 'openai' | 'anthropic';

interface ErrorPattern {
  matches: (error: unknown) => boolean;
  convert: (message: string, provider: SdkProvider, cause: Error | undefined) => BenchError;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * HTTP status carried by the error, if any
 */
function getErrorStatus(error: unknown): number | undefined {
  if (error && typeof error === 'object') {
    if ('status' in error && typeof error.status === 'number') {
      return error.status;
    }
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      return error.statusCode;
    }
  }
  return undefined;
}

function getErrorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  if (error && typeof error === 'object' && 'name' in error) {
    return String(error.name);
  }
  return '';
}

function isRateLimitMessage(message: string): boolean {
  return [/rate.?limit/i, /too.?many.?requests/i, /throttl/i, /overloaded/i].some((p) =>
    p.test(message)
  );
}

function isNetworkMessage(message: string): boolean {
  const networkPatterns = [
    /network/i,
    /connection/i,
    /ECONNREFUSED/i,
    /ENOTFOUND/i,
    /ECONNRESET/i,
    /socket/i,
    /fetch failed/i,
  ];
  return networkPatterns.some((pattern) => pattern.test(message));
}

function isTimeoutMessage(message: string): boolean {
  return [/timeout/i, /timed.?out/i, /ETIMEDOUT/i].some((p) => p.test(message));
}

const transient =
  (label: string) =>
  (message: string, provider: SdkProvider, cause: Error | undefined): BenchError =>
    new TransientExecutionError(`${provider} ${label}: ${message}`, { cause });

/**
 * Patterns shared by both SDKs
 *
 * - RateLimitError (429), InternalServerError (5xx), APIConnectionError,
 *   APIConnectionTimeoutError: transient
 * - BadRequestError (400), UnprocessableEntityError (422), NotFoundError (404): validation
 * - AuthenticationError (401), PermissionDeniedError (403): fatal
 */
const sdkPatterns: ErrorPattern[] = [
  {
    matches: (error) => getErrorName(error) === 'RateLimitError' || getErrorStatus(error) === 429,
    convert: transient('rate limit'),
  },
  {
    matches: (error) => {
      const status = getErrorStatus(error);
      return (
        getErrorName(error) === 'InternalServerError' ||
        (status !== undefined && status >= 500 && status < 600)
      );
    },
    convert: transient('server error'),
  },
  {
    matches: (error) =>
      getErrorName(error) === 'APIConnectionTimeoutError' ||
      isTimeoutMessage(getErrorMessage(error)),
    convert: transient('timeout'),
  },
  {
    matches: (error) =>
      getErrorName(error) === 'APIConnectionError' || isNetworkMessage(getErrorMessage(error)),
    convert: transient('connection error'),
  },
  {
    matches: (error) =>
      getErrorName(error) === 'AuthenticationError' ||
      getErrorName(error) === 'PermissionDeniedError' ||
      getErrorStatus(error) === 401 ||
      getErrorStatus(error) === 403,
    convert: (message, provider, cause) =>
      new FatalExecutionError(`${provider} authentication failed: ${message}`, {
        code: 'AUTH_FAILED',
        cause,
      }),
  },
  {
    matches: (error) => {
      const status = getErrorStatus(error);
      return status === 400 || status === 404 || status === 422;
    },
    convert: (message, provider, cause) =>
      new ValidationError(`${provider} rejected the request: ${message}`, { cause }),
  },
];

/**
 * Convert an SDK error into a BenchError whose kind drives retries
 *
 * @example
 * ```typescript
 * try {
 *   await client.chat.completions.create(body, { signal });
 * } catch (error) {
 *   throw convertSDKError(error, 'openai');
 * }
 * ```
 */
export function convertSDKError(error: unknown, provider: SdkProvider): BenchError {
  if (error instanceof BenchError) {
    return error;
  }

  const message = getErrorMessage(error);
  const cause = error instanceof Error ? error : undefined;
  for (const pattern of sdkPatterns) {
    if (pattern.matches(error)) {
      return pattern.convert(message, provider, cause);
    }
  }

  if (isRateLimitMessage(message)) {
    return transient('rate limit')(message, provider, cause);
  }

  return new FatalExecutionError(`${provider} request failed: ${message}`, { cause });
}
