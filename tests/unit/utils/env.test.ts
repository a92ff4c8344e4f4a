import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  getEnvOrThrow,
  getEnvWithDefault,
  getEnvOptional,
  getEnvNumber,
} from '../../../src/utils/env.js';
import { ConfigurationError } from '../../../src/errors/index.js';

describe('Environment Variable Utilities', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('getEnvOrThrow', () => {
    it('should return value when env var is set', () => {
      process.env.BENCH_TEST_VAR = 'test-value';
      expect(getEnvOrThrow('BENCH_TEST_VAR')).toBe('test-value');
    });

    it('should throw a ConfigurationError with the description', () => {
      delete process.env.BENCH_TEST_VAR;
      expect(() => getEnvOrThrow('BENCH_TEST_VAR', 'Test variable')).toThrow(ConfigurationError);
      expect(() => getEnvOrThrow('BENCH_TEST_VAR', 'Test variable')).toThrow(
        'Environment variable BENCH_TEST_VAR (Test variable) is required but not set'
      );
    });

    it('should throw when env var is empty string', () => {
      process.env.BENCH_TEST_VAR = '';
      expect(() => getEnvOrThrow('BENCH_TEST_VAR')).toThrow(
        'Environment variable BENCH_TEST_VAR is required but not set'
      );
    });
  });

  describe('getEnvWithDefault', () => {
    it('should prefer the set value', () => {
      process.env.BENCH_TEST_VAR = 'custom-value';
      expect(getEnvWithDefault('BENCH_TEST_VAR', 'default')).toBe('custom-value');
    });

    it('should fall back on unset or empty values', () => {
      delete process.env.BENCH_TEST_VAR;
      expect(getEnvWithDefault('BENCH_TEST_VAR', 'default')).toBe('default');
      process.env.BENCH_TEST_VAR = '';
      expect(getEnvWithDefault('BENCH_TEST_VAR', 'default')).toBe('default');
    });
  });

  describe('getEnvOptional', () => {
    it('should return undefined for empty values', () => {
      process.env.BENCH_TEST_VAR = '';
      expect(getEnvOptional('BENCH_TEST_VAR')).toBeUndefined();
      process.env.BENCH_TEST_VAR = 'x';
      expect(getEnvOptional('BENCH_TEST_VAR')).toBe('x');
    });
  });

  describe('getEnvNumber', () => {
    it('should parse integers', () => {
      process.env.BENCH_TEST_VAR = '8';
      expect(getEnvNumber('BENCH_TEST_VAR', 2)).toBe(8);
    });

    it('should fall back on invalid numbers', () => {
      process.env.BENCH_TEST_VAR = 'many';
      expect(getEnvNumber('BENCH_TEST_VAR', 2)).toBe(2);
    });

    it('should truncate decimals', () => {
      process.env.BENCH_TEST_VAR = '3.9';
      expect(getEnvNumber('BENCH_TEST_VAR', 2)).toBe(3);
    });
  });
});
