/**
 * Orchestrator Defaults Configuration
 *
 * Values used for any manifest field a benchmark file leaves out.
 *
 * Environment variables:
 * - BENCH_CONCURRENCY: Worker pool size, 1-32 (default: 2)
 * - BENCH_CELL_TIMEOUT_MS: Wall-clock budget per cell (default: 300000)
 * - BENCH_GRACE_MS: Wait for a cancelled unit before finalizing (default: 5000)
 * - BENCH_MAX_RETRIES: Retries after the first attempt, 0-10 (default: 2)
 * - BENCH_RETRY_BASE_DELAY_MS: First backoff delay (default: 500)
 * - BENCH_SAMPLE_INTERVAL_MS: Resource sampling interval (default: 100)
 */

import { z } from 'zod';
import { getEnvNumber } from '../utils/env.js';

export const OrchestratorDefaultsSchema = z.object({
  concurrency: z.number().int().min(1).max(32).default(2),
  cellTimeoutMs: z.number().int().positive().default(300_000),
  graceMs: z.number().int().min(0).default(5_000),
  maxRetries: z.number().int().min(0).max(10).default(2),
  retryBaseDelayMs: z.number().int().min(0).default(500),
  retryMaxDelayMs: z.number().int().min(0).default(30_000),
  retryBackoffFactor: z.number().min(1).default(2),
  sampleIntervalMs: z.number().int().min(10).default(100),
});

export type OrchestratorDefaults = z.infer<typeof OrchestratorDefaultsSchema>;

export const ORCHESTRATOR_DEFAULTS: Readonly<OrchestratorDefaults> = Object.freeze(
  OrchestratorDefaultsSchema.parse({})
);

/**
 * Read a numeric variable, keeping the default when the value is out of range
 */
function envField<K extends keyof OrchestratorDefaults>(key: K, envName: string): number {
  const fallback = ORCHESTRATOR_DEFAULTS[key];
  const result = OrchestratorDefaultsSchema.shape[key].safeParse(getEnvNumber(envName, fallback));
  return result.success ? result.data : fallback;
}

/**
 * Load orchestrator defaults from environment variables
 */
export function loadOrchestratorDefaults(): OrchestratorDefaults {
  return {
    ...ORCHESTRATOR_DEFAULTS,
    concurrency: envField('concurrency', 'BENCH_CONCURRENCY'),
    cellTimeoutMs: envField('cellTimeoutMs', 'BENCH_CELL_TIMEOUT_MS'),
    graceMs: envField('graceMs', 'BENCH_GRACE_MS'),
    maxRetries: envField('maxRetries', 'BENCH_MAX_RETRIES'),
    retryBaseDelayMs: envField('retryBaseDelayMs', 'BENCH_RETRY_BASE_DELAY_MS'),
    sampleIntervalMs: envField('sampleIntervalMs', 'BENCH_SAMPLE_INTERVAL_MS'),
  };
}
