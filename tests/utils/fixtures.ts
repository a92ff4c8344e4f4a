/**
 * Test data factories for manifests, task inputs and ledger records
 */

import type {
  CostBreakdown,
  DatasetSample,
  FailedRecord,
  RunManifest,
  SucceededRecord,
  TaskInput,
} from '../../src/types/index.js';
import { cellIdOf } from '../../src/manifest/index.js';

export function createTestManifest(overrides: Partial<RunManifest> = {}): RunManifest {
  return {
    runId: 'run-test',
    entries: [
      { framework: 'alpha', useCase: 'capitals', family: 'qa', repetitions: 3 },
      { framework: 'beta', useCase: 'capitals', family: 'qa', repetitions: 3 },
    ],
    concurrency: 2,
    cellTimeoutMs: 1000,
    graceMs: 50,
    retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0, backoffFactor: 2 },
    ...overrides,
  };
}

export function createTaskInput(
  sample: Partial<DatasetSample> = {},
  overrides: Partial<Omit<TaskInput, 'sample'>> = {}
): TaskInput {
  return {
    framework: 'alpha',
    useCase: 'capitals',
    family: 'qa',
    repetitionIndex: 0,
    sample: { id: 's1', input: 'What is the capital of France?', expected: 'Paris', ...sample },
    ...overrides,
  };
}

export function createTestCost(overrides: Partial<CostBreakdown> = {}): CostBreakdown {
  return {
    currency: 'USD',
    rateCardVersion: 'test-card',
    byProvider: {},
    total: '0',
    pricedEventCount: 0,
    unpricedEventCount: 0,
    unpricedEvents: [],
    ...overrides,
  };
}

interface RecordKey {
  runId?: string;
  framework?: string;
  useCase?: string;
  repetitionIndex?: number;
}

function baseRecord(key: RecordKey) {
  const runId = key.runId ?? 'run-test';
  const framework = key.framework ?? 'alpha';
  const useCase = key.useCase ?? 'capitals';
  const repetitionIndex = key.repetitionIndex ?? 0;
  return {
    cellId: cellIdOf(framework, useCase, repetitionIndex),
    runId,
    framework,
    useCase,
    family: 'qa' as const,
    repetitionIndex,
    status: 'RECORDED' as const,
    costBreakdown: createTestCost(),
    attempts: 1,
    warnings: [],
    metadata: {
      scheduledAt: '2024-01-01T00:00:00.000Z',
      startedAt: '2024-01-01T00:00:00.000Z',
      finishedAt: '2024-01-01T00:00:01.000Z',
      sampleCount: 1,
    },
  };
}

export function createSucceededRecord(
  key: RecordKey = {},
  overrides: Partial<SucceededRecord> = {}
): SucceededRecord {
  return {
    ...baseRecord(key),
    outcome: 'SUCCEEDED',
    executionTimeMs: 100,
    resourceUsage: { peakMemoryBytes: 1024, averageCpuPercent: 10, sampleCount: 2 },
    qualityMetrics: { exact_match: 1 },
    rawOutput: [{ sampleId: 's1', output: 'Paris' }],
    ...overrides,
  };
}

export function createFailedRecord(
  key: RecordKey = {},
  overrides: Partial<FailedRecord> = {}
): FailedRecord {
  return {
    ...baseRecord(key),
    outcome: 'FAILED',
    executionTimeMs: 50,
    qualityMetrics: {},
    error: { kind: 'validation', code: 'VALIDATION_FAILED', message: 'bad output' },
    ...overrides,
  };
}
