/**
 * Aggregation
 *
 * Recomputes summary statistics from a snapshot of result records. Records are
 * never modified; the report can be rebuilt at any time from a ledger.
 */

import type {
  ErrorKind,
  ResultRecord,
  RunManifest,
  UseCaseFamily,
} from '../types/index.js';
import { ZERO, formatMoney, parseMoney, type Money } from '../cost/money.js';
import { laneKeyOf } from '../manifest/index.js';
import { describeDistribution, mean } from './stats.js';
import type { AggregateReport, ReportGroup, ReportTotals } from './types.js';

const DEFAULT_CURRENCY = 'USD';

interface GroupKey {
  framework: string;
  useCase: string;
  family: UseCaseFamily;
}

function failureRate(cells: number, failed: number, timedOut: number): number | null {
  return cells === 0 ? null : (failed + timedOut) / cells;
}

function addByProvider(target: Map<string, Money>, byProvider: Record<string, string>): void {
  for (const [provider, amount] of Object.entries(byProvider)) {
    target.set(provider, (target.get(provider) ?? ZERO) + parseMoney(amount));
  }
}

function formatByProvider(amounts: Map<string, Money>): Record<string, string> {
  const formatted: Record<string, string> = {};
  for (const provider of [...amounts.keys()].sort()) {
    formatted[provider] = formatMoney(amounts.get(provider) ?? ZERO);
  }
  return formatted;
}

/**
 * Mean of each metric over SUCCEEDED records; null when none succeeded
 */
function qualityMeansOf(records: readonly ResultRecord[]): Record<string, number> | null {
  const succeeded = records.filter((r) => r.outcome === 'SUCCEEDED');
  if (succeeded.length === 0) {
    return null;
  }

  const values = new Map<string, number[]>();
  for (const record of succeeded) {
    for (const [metric, score] of Object.entries(record.qualityMetrics)) {
      const list = values.get(metric) ?? [];
      list.push(score);
      values.set(metric, list);
    }
  }

  const means: Record<string, number> = {};
  for (const [metric, scores] of values) {
    means[metric] = mean(scores);
  }
  return means;
}

function summarizeGroup(key: GroupKey, records: readonly ResultRecord[]): ReportGroup {
  const succeededCount = records.filter((r) => r.outcome === 'SUCCEEDED').length;
  const failedCount = records.filter((r) => r.outcome === 'FAILED').length;
  const timedOutCount = records.filter((r) => r.outcome === 'TIMED_OUT').length;

  const durations = records.map((r) => r.executionTimeMs).filter((ms) => Number.isFinite(ms));
  const usages = records.flatMap((r) => (r.resourceUsage ? [r.resourceUsage] : []));

  let totalCost = ZERO;
  const byProvider = new Map<string, Money>();
  const errorKinds: Partial<Record<ErrorKind, number>> = {};
  let unpricedEventCount = 0;
  let totalAttempts = 0;
  let warningCount = 0;

  for (const record of records) {
    totalCost += parseMoney(record.costBreakdown.total);
    addByProvider(byProvider, record.costBreakdown.byProvider);
    unpricedEventCount += record.costBreakdown.unpricedEventCount;
    totalAttempts += record.attempts;
    warningCount += record.warnings.length;
    if (record.error) {
      errorKinds[record.error.kind] = (errorKinds[record.error.kind] ?? 0) + 1;
    }
  }

  return {
    ...key,
    cellCount: records.length,
    succeededCount,
    failedCount,
    timedOutCount,
    failureRate: failureRate(records.length, failedCount, timedOutCount),
    executionTimeMs: describeDistribution(durations),
    peakMemoryBytes: usages.length > 0 ? Math.max(...usages.map((u) => u.peakMemoryBytes)) : null,
    averageCpuPercent: usages.length > 0 ? mean(usages.map((u) => u.averageCpuPercent)) : null,
    currency: records[0]?.costBreakdown.currency ?? DEFAULT_CURRENCY,
    totalCost: formatMoney(totalCost),
    costByProvider: formatByProvider(byProvider),
    unpricedEventCount,
    qualityMeans: qualityMeansOf(records),
    errorKinds,
    totalAttempts,
    warningCount,
  };
}

function summarizeTotals(groups: readonly ReportGroup[]): ReportTotals {
  let totalCost = ZERO;
  const byProvider = new Map<string, Money>();
  let cellCount = 0;
  let succeededCount = 0;
  let failedCount = 0;
  let timedOutCount = 0;
  let unpricedEventCount = 0;

  for (const group of groups) {
    cellCount += group.cellCount;
    succeededCount += group.succeededCount;
    failedCount += group.failedCount;
    timedOutCount += group.timedOutCount;
    unpricedEventCount += group.unpricedEventCount;
    totalCost += parseMoney(group.totalCost);
    addByProvider(byProvider, group.costByProvider);
  }

  return {
    cellCount,
    succeededCount,
    failedCount,
    timedOutCount,
    failureRate: failureRate(cellCount, failedCount, timedOutCount),
    currency: groups.find((g) => g.cellCount > 0)?.currency ?? DEFAULT_CURRENCY,
    totalCost: formatMoney(totalCost),
    costByProvider: formatByProvider(byProvider),
    unpricedEventCount,
  };
}

/**
 * Group records by (framework, use case) and summarize each group
 *
 * With a manifest, groups follow the manifest's entry order and every entry
 * gets a row, even one without records. Without one, groups appear in the
 * order their first record does.
 */
export function aggregate(
  records: readonly ResultRecord[],
  manifest?: RunManifest
): AggregateReport {
  const keys = new Map<string, GroupKey>();
  const buckets = new Map<string, ResultRecord[]>();

  for (const entry of manifest?.entries ?? []) {
    const key = laneKeyOf(entry);
    keys.set(key, { framework: entry.framework, useCase: entry.useCase, family: entry.family });
    buckets.set(key, []);
  }

  for (const record of records) {
    const key = laneKeyOf(record);
    if (!keys.has(key)) {
      keys.set(key, {
        framework: record.framework,
        useCase: record.useCase,
        family: record.family,
      });
    }
    const bucket = buckets.get(key) ?? [];
    bucket.push(record);
    buckets.set(key, bucket);
  }

  const groups = [...keys].map(([key, groupKey]) =>
    summarizeGroup(groupKey, buckets.get(key) ?? [])
  );

  return {
    runId: manifest?.runId ?? records[0]?.runId ?? '',
    groups,
    totals: summarizeTotals(groups),
  };
}
