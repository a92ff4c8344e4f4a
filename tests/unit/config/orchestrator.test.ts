import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ORCHESTRATOR_DEFAULTS, loadOrchestratorDefaults } from '../../../src/config/index.js';

describe('Orchestrator defaults', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    Object.keys(process.env)
      .filter((key) => key.startsWith('BENCH_'))
      .forEach((key) => delete process.env[key]);
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should use the built-in defaults without environment overrides', () => {
    expect(loadOrchestratorDefaults()).toEqual(ORCHESTRATOR_DEFAULTS);
    expect(ORCHESTRATOR_DEFAULTS).toMatchObject({
      concurrency: 2,
      cellTimeoutMs: 300_000,
      graceMs: 5_000,
      maxRetries: 2,
      retryBaseDelayMs: 500,
      sampleIntervalMs: 100,
    });
  });

  it('should read overrides from the environment', () => {
    process.env.BENCH_CONCURRENCY = '8';
    process.env.BENCH_CELL_TIMEOUT_MS = '60000';
    process.env.BENCH_MAX_RETRIES = '0';

    expect(loadOrchestratorDefaults()).toMatchObject({
      concurrency: 8,
      cellTimeoutMs: 60_000,
      maxRetries: 0,
    });
  });

  it('should keep the default for out-of-range values', () => {
    process.env.BENCH_CONCURRENCY = '500';
    process.env.BENCH_SAMPLE_INTERVAL_MS = '1';

    const defaults = loadOrchestratorDefaults();

    expect(defaults.concurrency).toBe(2);
    expect(defaults.sampleIntervalMs).toBe(100);
  });

  it('should keep the default for unparsable values', () => {
    process.env.BENCH_GRACE_MS = 'soon';

    expect(loadOrchestratorDefaults().graceMs).toBe(5_000);
  });
});
