import { describe, it, expect } from 'vitest';
import { aggregate } from '../../../src/report/aggregate.js';
import {
  formatReportCsv,
  formatReportJson,
  formatReportTable,
  toReportRows,
} from '../../../src/report/format.js';
import {
  createFailedRecord,
  createSucceededRecord,
  createTestCost,
  createTestManifest,
} from '../../utils/fixtures.js';

const CSV_HEADER = [
  'run_id',
  'framework',
  'use_case',
  'family',
  'cells',
  'succeeded',
  'failed',
  'timed_out',
  'failure_rate',
  'time_mean_ms',
  'time_median_ms',
  'time_stddev_ms',
  'peak_memory_bytes',
  'avg_cpu_percent',
  'currency',
  'total_cost',
  'unpriced_events',
  'attempts',
  'warnings',
].join(',');

describe('toReportRows', () => {
  it('should give every row the same dynamic columns', () => {
    const report = aggregate([
      createSucceededRecord(
        { framework: 'alpha' },
        { costBreakdown: createTestCost({ total: '0.5', byProvider: { openai: '0.5' } }) }
      ),
      createFailedRecord({ framework: 'beta' }),
    ]);

    const [alpha, beta] = toReportRows(report);

    expect(alpha?.['quality.exact_match']).toBe(1);
    expect(alpha?.['cost.openai']).toBe('0.5');
    expect(alpha?.['errors.validation']).toBe(0);
    expect(beta?.['quality.exact_match']).toBeNull();
    expect(beta?.['cost.openai']).toBe('0');
    expect(beta?.['errors.validation']).toBe(1);
    expect(Object.keys(alpha ?? {})).toEqual(Object.keys(beta ?? {}));
  });
});

describe('formatReportCsv', () => {
  it('should write a header and one line per group', () => {
    const report = aggregate([createSucceededRecord()]);

    const lines = formatReportCsv(report).split('\r\n');

    expect(lines[0]).toBe(
      CSV_HEADER +
        ',quality.exact_match,errors.transient,errors.validation,errors.fatal,errors.timeout'
    );
    expect(lines[1]).toBe(
      'run-test,alpha,capitals,qa,1,1,0,0,0,100,100,0,1024,10,USD,0,0,1,0,1,0,0,0,0'
    );
    expect(lines[2]).toBe('');
    expect(lines).toHaveLength(3);
  });

  it('should leave null cells empty', () => {
    const manifest = createTestManifest({
      entries: [{ framework: 'gamma', useCase: 'capitals', family: 'qa', repetitions: 1 }],
    });

    const lines = formatReportCsv(aggregate([], manifest)).split('\r\n');

    expect(lines[1]).toBe('run-test,gamma,capitals,qa,0,0,0,0,,,,,,,USD,0,0,0,0,0,0,0,0');
  });

  it('should quote fields holding commas and quotes', () => {
    const report = aggregate([createSucceededRecord({ framework: 'say "a,b"' })]);

    const lines = formatReportCsv(report).split('\r\n');

    expect(lines[1]?.startsWith('run-test,"say ""a,b""",capitals,')).toBe(true);
  });

  it('should return an empty string for an empty report', () => {
    expect(formatReportCsv(aggregate([]))).toBe('');
  });
});

describe('formatReportJson', () => {
  it('should serialize the full report', () => {
    const report = aggregate([createSucceededRecord(), createFailedRecord({ repetitionIndex: 1 })]);

    expect(JSON.parse(formatReportJson(report))).toEqual(report);
  });
});

describe('formatReportTable', () => {
  it('should render groups and totals', () => {
    const report = aggregate(
      [createSucceededRecord({ framework: 'alpha' }), createFailedRecord({ framework: 'beta' })],
      createTestManifest()
    );

    const lines = formatReportTable(report).split('\n');

    expect(lines[0]).toBe('Run run-test');
    expect(lines[1]?.startsWith('┌')).toBe(true);
    expect(lines[2]?.startsWith('│ Framework │ Use case │')).toBe(true);
    expect(lines.find((line) => line.startsWith('│ beta '))?.includes('no data')).toBe(true);
    expect(lines.find((line) => line.startsWith('│ alpha '))?.includes('exact_match=1.00')).toBe(
      true
    );
    expect(lines[lines.length - 1]).toBe(
      'Total: 2 cells, 1 succeeded, 1 failed, 0 timed out, cost 0 USD'
    );
  });

  it('should mention unpriced events in the totals', () => {
    const report = aggregate([
      createSucceededRecord({}, { costBreakdown: createTestCost({ unpricedEventCount: 2 }) }),
    ]);

    const lines = formatReportTable(report).split('\n');

    expect(lines[lines.length - 1]).toBe(
      'Total: 1 cells, 1 succeeded, 0 failed, 0 timed out, cost 0 USD (2 unpriced events)'
    );
  });
});
