/**
 * Report Types
 *
 * Summary statistics recomputed from a ledger snapshot, one group per
 * (framework, use case).
 */

import type { ErrorKind, UseCaseFamily } from '../types/index.js';

// ============================================
// Statistics Types
// ============================================

export interface DistributionStats {
  count: number;
  mean: number;
  median: number;
  /** Population standard deviation */
  stdDev: number;
  min: number;
  max: number;
}

// ============================================
// Report Types
// ============================================

/**
 * Statistics of one (framework, use case) pair
 */
export interface ReportGroup {
  framework: string;
  useCase: string;
  family: UseCaseFamily;

  /** Recorded cells, whatever their outcome */
  cellCount: number;
  succeededCount: number;
  failedCount: number;
  timedOutCount: number;
  /** (failed + timed out) / cells; null without cells */
  failureRate: number | null;

  /** Execution time over every recorded cell; null without cells */
  executionTimeMs: DistributionStats | null;
  /** Highest peak memory among cells with resource usage */
  peakMemoryBytes: number | null;
  /** Mean of the cells' average CPU */
  averageCpuPercent: number | null;

  currency: string;
  totalCost: string;
  costByProvider: Record<string, string>;
  unpricedEventCount: number;

  /**
   * Mean score per metric over SUCCEEDED cells only.
   * null means "no data": no cell of the group succeeded.
   */
  qualityMeans: Record<string, number> | null;

  errorKinds: Partial<Record<ErrorKind, number>>;
  totalAttempts: number;
  warningCount: number;
}

export interface ReportTotals {
  cellCount: number;
  succeededCount: number;
  failedCount: number;
  timedOutCount: number;
  failureRate: number | null;
  currency: string;
  totalCost: string;
  costByProvider: Record<string, string>;
  unpricedEventCount: number;
}

export interface AggregateReport {
  runId: string;
  groups: ReportGroup[];
  totals: ReportTotals;
}

/**
 * Flat row for CSV and external tooling
 */
export type ReportRow = Record<string, string | number | null>;
