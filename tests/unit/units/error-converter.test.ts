import { describe, it, expect } from 'vitest';
import { convertSDKError } from '../../../src/units/error-converter.js';
import {
  FatalExecutionError,
  TransientExecutionError,
  ValidationError,
} from '../../../src/errors/index.js';
import { sdkError } from '../../utils/mocks.js';

describe('convertSDKError', () => {
  describe('transient errors', () => {
    it('should treat rate limits as transient', () => {
      const original = sdkError('RateLimitError', 429, 'Too many requests');
      const converted = convertSDKError(original, 'openai');

      expect(converted).toBeInstanceOf(TransientExecutionError);
      expect(converted.message).toBe('openai rate limit: Too many requests');
      expect(converted.kind).toBe('transient');
      expect(converted.retryable).toBe(true);
      expect(converted.cause).toBe(original);
    });

    it('should treat 5xx responses as transient', () => {
      const converted = convertSDKError(sdkError('InternalServerError', 500, 'boom'), 'anthropic');

      expect(converted).toBeInstanceOf(TransientExecutionError);
      expect(converted.message).toBe('anthropic server error: boom');
    });

    it('should treat any 5xx status as transient whatever the error name', () => {
      const converted = convertSDKError(sdkError('APIError', 529, 'busy'), 'anthropic');

      expect(converted.message).toBe('anthropic server error: busy');
    });

    it('should treat request timeouts as transient', () => {
      const converted = convertSDKError(
        sdkError('APIConnectionTimeoutError', undefined, 'Request timed out.'),
        'openai'
      );

      expect(converted).toBeInstanceOf(TransientExecutionError);
      expect(converted.message).toBe('openai timeout: Request timed out.');
    });

    it('should treat connection failures as transient', () => {
      const converted = convertSDKError(
        sdkError('APIConnectionError', undefined, 'Connection error.'),
        'openai'
      );

      expect(converted).toBeInstanceOf(TransientExecutionError);
      expect(converted.message).toBe('openai connection error: Connection error.');
    });

    it('should fall back to the message for overload errors without a status', () => {
      const converted = convertSDKError(new Error('Service overloaded, try later'), 'anthropic');

      expect(converted).toBeInstanceOf(TransientExecutionError);
      expect(converted.message).toBe('anthropic rate limit: Service overloaded, try later');
    });
  });

  describe('permanent errors', () => {
    it('should treat authentication failures as fatal', () => {
      const converted = convertSDKError(
        sdkError('AuthenticationError', 401, 'invalid x-api-key'),
        'anthropic'
      );

      expect(converted).toBeInstanceOf(FatalExecutionError);
      expect(converted.code).toBe('AUTH_FAILED');
      expect(converted.message).toBe('anthropic authentication failed: invalid x-api-key');
    });

    it('should treat permission errors as fatal', () => {
      const converted = convertSDKError(sdkError('PermissionDeniedError', 403, 'nope'), 'openai');

      expect(converted.code).toBe('AUTH_FAILED');
      expect(converted.kind).toBe('fatal');
    });

    it.each([400, 404, 422])('should treat status %i as a validation error', (status) => {
      const error = sdkError('APIError', status, 'max_tokens too large');
      const converted = convertSDKError(error, 'openai');

      expect(converted).toBeInstanceOf(ValidationError);
      expect(converted.kind).toBe('validation');
      expect(converted.message).toBe('openai rejected the request: max_tokens too large');
    });

    it('should treat unknown failures as fatal', () => {
      const converted = convertSDKError('weird', 'openai');

      expect(converted).toBeInstanceOf(FatalExecutionError);
      expect(converted.code).toBe('FATAL_EXECUTION');
      expect(converted.message).toBe('openai request failed: weird');
      expect(converted.cause).toBeUndefined();
    });
  });

  it('should pass benchmark errors through unchanged', () => {
    const original = new ValidationError('already classified');

    expect(convertSDKError(original, 'openai')).toBe(original);
  });
});
