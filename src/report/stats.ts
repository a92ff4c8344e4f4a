/**
 * Descriptive statistics
 */

import type { DistributionStats } from './types.js';

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  return ((sorted[middle - 1] ?? upper) + upper) / 2;
}

/**
 * Population standard deviation
 */
export function stdDev(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const m = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - m) ** 2)));
}

export function describeDistribution(values: readonly number[]): DistributionStats | null {
  if (values.length === 0) {
    return null;
  }
  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    stdDev: stdDev(values),
    min: Math.min(...values),
    max: Math.max(...values),
  };
}
