/**
 * Report export: flat rows, CSV, JSON and a console table
 */

import type { ErrorKind } from '../types/index.js';
import type { AggregateReport, ReportGroup, ReportRow } from './types.js';

const ERROR_KINDS: readonly ErrorKind[] = ['transient', 'validation', 'fatal', 'timeout'];

const NO_DATA = 'no data';

interface DynamicColumns {
  metrics: string[];
  providers: string[];
}

function dynamicColumns(groups: readonly ReportGroup[]): DynamicColumns {
  const metrics: string[] = [];
  const providers = new Set<string>();
  for (const group of groups) {
    for (const metric of Object.keys(group.qualityMeans ?? {})) {
      if (!metrics.includes(metric)) {
        metrics.push(metric);
      }
    }
    for (const provider of Object.keys(group.costByProvider)) {
      providers.add(provider);
    }
  }
  return { metrics, providers: [...providers].sort() };
}

/**
 * One flat row per group. Every row carries the same columns:
 * `quality.<metric>` (null = no data), `cost.<provider>` and `errors.<kind>`.
 */
export function toReportRows(report: AggregateReport): ReportRow[] {
  const { metrics, providers } = dynamicColumns(report.groups);

  return report.groups.map((group) => {
    const row: ReportRow = {
      run_id: report.runId,
      framework: group.framework,
      use_case: group.useCase,
      family: group.family,
      cells: group.cellCount,
      succeeded: group.succeededCount,
      failed: group.failedCount,
      timed_out: group.timedOutCount,
      failure_rate: group.failureRate,
      time_mean_ms: group.executionTimeMs?.mean ?? null,
      time_median_ms: group.executionTimeMs?.median ?? null,
      time_stddev_ms: group.executionTimeMs?.stdDev ?? null,
      peak_memory_bytes: group.peakMemoryBytes,
      avg_cpu_percent: group.averageCpuPercent,
      currency: group.currency,
      total_cost: group.totalCost,
      unpriced_events: group.unpricedEventCount,
      attempts: group.totalAttempts,
      warnings: group.warningCount,
    };
    for (const metric of metrics) {
      row[`quality.${metric}`] = group.qualityMeans?.[metric] ?? null;
    }
    for (const provider of providers) {
      row[`cost.${provider}`] = group.costByProvider[provider] ?? '0';
    }
    for (const kind of ERROR_KINDS) {
      row[`errors.${kind}`] = group.errorKinds[kind] ?? 0;
    }
    return row;
  });
}

function csvField(value: string | number | null): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * RFC 4180 CSV with a header line; null cells are empty
 */
export function formatReportCsv(report: AggregateReport): string {
  const rows = toReportRows(report);
  const first = rows[0];
  if (!first) {
    return '';
  }
  const columns = Object.keys(first);
  const lines = [
    columns.map(csvField).join(','),
    ...rows.map((row) => columns.map((column) => csvField(row[column] ?? null)).join(',')),
  ];
  return lines.join('\r\n') + '\r\n';
}

export function formatReportJson(report: AggregateReport): string {
  return JSON.stringify(report, null, 2);
}

// ============================================
// Console Table
// ============================================

function fixed(value: number | null | undefined, digits: number): string {
  return value === null || value === undefined ? '-' : value.toFixed(digits);
}

function qualityText(group: ReportGroup): string {
  if (group.qualityMeans === null) {
    return NO_DATA;
  }
  const parts = Object.entries(group.qualityMeans).map(
    ([metric, score]) => `${metric}=${score.toFixed(2)}`
  );
  return parts.length > 0 ? parts.join(' ') : '-';
}

/**
 * Box-drawn table for terminals
 */
export function formatReportTable(report: AggregateReport): string {
  const header = [
    'Framework',
    'Use case',
    'Cells',
    'OK',
    'Failed',
    'Timeout',
    'Fail %',
    'Mean ms',
    'Median ms',
    'Std ms',
    'Cost',
    'Quality',
  ];
  const body = report.groups.map((group) => [
    group.framework,
    group.useCase,
    String(group.cellCount),
    String(group.succeededCount),
    String(group.failedCount),
    String(group.timedOutCount),
    group.failureRate === null ? '-' : (group.failureRate * 100).toFixed(1),
    fixed(group.executionTimeMs?.mean, 1),
    fixed(group.executionTimeMs?.median, 1),
    fixed(group.executionTimeMs?.stdDev, 1),
    `${group.totalCost} ${group.currency}`,
    qualityText(group),
  ]);

  const widths = header.map((title, i) =>
    Math.max(title.length, ...body.map((cells) => (cells[i] ?? '').length))
  );
  // Text columns left-aligned, numbers right-aligned
  const leftAligned = new Set([0, 1, 10, 11]);
  const line = (cells: readonly string[]): string =>
    '│ ' +
    cells
      .map((cell, i) => {
        const width = widths[i] ?? cell.length;
        return leftAligned.has(i) ? cell.padEnd(width) : cell.padStart(width);
      })
      .join(' │ ') +
    ' │';
  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const { totals } = report;
  return [
    `Run ${report.runId}`,
    rule('┌', '┬', '┐'),
    line(header),
    rule('├', '┼', '┤'),
    ...body.map(line),
    rule('└', '┴', '┘'),
    `Total: ${totals.cellCount} cells, ${totals.succeededCount} succeeded, ` +
      `${totals.failedCount} failed, ${totals.timedOutCount} timed out, ` +
      `cost ${totals.totalCost} ${totals.currency}` +
      (totals.unpricedEventCount > 0 ? ` (${totals.unpricedEventCount} unpriced events)` : ''),
  ].join('\n');
}
