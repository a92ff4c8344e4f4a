import { describe, it, expect } from 'vitest';
import { aggregate } from '../../../src/report/aggregate.js';
import type { ResultRecord } from '../../../src/types/index.js';
import {
  createFailedRecord,
  createSucceededRecord,
  createTestCost,
  createTestManifest,
} from '../../utils/fixtures.js';

function mixedRun(): ResultRecord[] {
  return [
    createSucceededRecord(
      { framework: 'alpha', repetitionIndex: 0 },
      {
        executionTimeMs: 100,
        qualityMetrics: { exact_match: 1 },
        costBreakdown: createTestCost({ total: '0.01', byProvider: { openai: '0.01' } }),
      }
    ),
    createFailedRecord({ framework: 'beta', repetitionIndex: 0 }),
    createSucceededRecord(
      { framework: 'alpha', repetitionIndex: 1 },
      {
        executionTimeMs: 200,
        qualityMetrics: { exact_match: 0 },
        costBreakdown: createTestCost({ total: '0.02', byProvider: { openai: '0.02' } }),
      }
    ),
    createFailedRecord({ framework: 'beta', repetitionIndex: 1 }),
    createSucceededRecord(
      { framework: 'alpha', repetitionIndex: 2 },
      { executionTimeMs: 300, qualityMetrics: { exact_match: 1 } }
    ),
    createFailedRecord({ framework: 'beta', repetitionIndex: 2 }),
  ];
}

describe('aggregate', () => {
  it('should summarize a group of successful cells', () => {
    const report = aggregate(mixedRun(), createTestManifest());
    const alpha = report.groups[0];

    expect(alpha).toMatchObject({
      framework: 'alpha',
      useCase: 'capitals',
      family: 'qa',
      cellCount: 3,
      succeededCount: 3,
      failedCount: 0,
      timedOutCount: 0,
      failureRate: 0,
      peakMemoryBytes: 1024,
      averageCpuPercent: 10,
      currency: 'USD',
      totalCost: '0.03',
      costByProvider: { openai: '0.03' },
      unpricedEventCount: 0,
      errorKinds: {},
      totalAttempts: 3,
    });
    expect(alpha?.executionTimeMs?.mean).toBe(200);
    expect(alpha?.executionTimeMs?.median).toBe(200);
    expect(alpha?.executionTimeMs?.stdDev).toBeCloseTo(81.65, 2);
    expect(alpha?.qualityMeans?.['exact_match']).toBeCloseTo(2 / 3, 10);
  });

  it('should report "no data" quality for a group with no successful cell', () => {
    const report = aggregate(mixedRun(), createTestManifest());
    const beta = report.groups[1];

    expect(beta?.framework).toBe('beta');
    expect(beta?.cellCount).toBe(3);
    expect(beta?.failedCount).toBe(3);
    expect(beta?.failureRate).toBe(1);
    expect(beta?.qualityMeans).toBeNull();
    expect(beta?.errorKinds).toEqual({ validation: 3 });
    expect(beta?.executionTimeMs).toEqual({
      count: 3,
      mean: 50,
      median: 50,
      stdDev: 0,
      min: 50,
      max: 50,
    });
    expect(beta?.totalCost).toBe('0');
    expect(beta?.costByProvider).toEqual({});
  });

  it('should compute run totals', () => {
    const report = aggregate(mixedRun(), createTestManifest());

    expect(report.runId).toBe('run-test');
    expect(report.totals).toEqual({
      cellCount: 6,
      succeededCount: 3,
      failedCount: 3,
      timedOutCount: 0,
      failureRate: 0.5,
      currency: 'USD',
      totalCost: '0.03',
      costByProvider: { openai: '0.03' },
      unpricedEventCount: 0,
    });
  });

  it('should count timed-out cells as failures', () => {
    const records = [
      createSucceededRecord({ repetitionIndex: 0 }),
      createFailedRecord(
        { repetitionIndex: 1 },
        {
          outcome: 'TIMED_OUT',
          error: { kind: 'timeout', code: 'CELL_TIMEOUT', message: 'too slow' },
        }
      ),
    ];

    const [group] = aggregate(records).groups;

    expect(group?.timedOutCount).toBe(1);
    expect(group?.failureRate).toBe(0.5);
    expect(group?.errorKinds).toEqual({ timeout: 1 });
    expect(group?.qualityMeans).toEqual({ exact_match: 1 });
  });

  it('should exclude failed cells from quality means', () => {
    const records = [
      createSucceededRecord({ repetitionIndex: 0 }, { qualityMetrics: { exact_match: 0.5 } }),
      createFailedRecord({ repetitionIndex: 1 }, { qualityMetrics: { exact_match: 0 } }),
    ];

    const [group] = aggregate(records).groups;

    expect(group?.qualityMeans).toEqual({ exact_match: 0.5 });
  });

  it('should keep a row for a manifest entry without records', () => {
    const manifest = createTestManifest({
      entries: [{ framework: 'gamma', useCase: 'capitals', family: 'qa', repetitions: 1 }],
    });

    const report = aggregate([], manifest);

    expect(report.groups).toHaveLength(1);
    expect(report.groups[0]).toMatchObject({
      framework: 'gamma',
      cellCount: 0,
      failureRate: null,
      executionTimeMs: null,
      peakMemoryBytes: null,
      averageCpuPercent: null,
      qualityMeans: null,
      totalCost: '0',
    });
    expect(report.totals.failureRate).toBeNull();
  });

  it('should order groups by first record without a manifest', () => {
    const records = [
      createFailedRecord({ framework: 'beta' }),
      createSucceededRecord({ framework: 'alpha' }),
    ];

    const report = aggregate(records);

    expect(report.groups.map((g) => g.framework)).toEqual(['beta', 'alpha']);
    expect(report.runId).toBe('run-test');
  });

  it('should sum unpriced events', () => {
    const records = [
      createSucceededRecord(
        { repetitionIndex: 0 },
        { costBreakdown: createTestCost({ unpricedEventCount: 2 }) }
      ),
      createSucceededRecord(
        { repetitionIndex: 1 },
        { costBreakdown: createTestCost({ unpricedEventCount: 1 }) }
      ),
    ];

    const report = aggregate(records);

    expect(report.groups[0]?.unpricedEventCount).toBe(3);
    expect(report.totals.unpricedEventCount).toBe(3);
  });

  it('should not modify the records', () => {
    const records = mixedRun();
    const before = JSON.stringify(records);

    aggregate(records, createTestManifest());

    expect(JSON.stringify(records)).toBe(before);
  });
});
