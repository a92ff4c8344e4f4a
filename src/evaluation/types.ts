/**
 * Quality evaluator contracts
 */

import type { UseCaseFamily } from '../types/index.js';

/**
 * Per-sample evaluation context, taken from the dataset sample
 *
 * Known keys are read with narrowing; anything else is ignored.
 */
export type EvaluationContext = Record<string, unknown>;

export interface EvaluationResult {
  /** Metric name -> score in [0, 1] */
  scores: Record<string, number>;
  /** Why a metric fell back to its minimum or was skipped */
  diagnostics: string[];
}

/**
 * Deterministic scorer for one use-case family
 *
 * evaluate() is pure: no clock, no randomness, no I/O. Malformed output
 * yields minimum scores and a diagnostic instead of an exception.
 */
export interface QualityEvaluator {
  readonly family: UseCaseFamily;
  /** Every metric this evaluator can report */
  readonly metricNames: readonly string[];
  evaluate(expected: unknown, actual: unknown, context?: EvaluationContext): EvaluationResult;
}

export interface EvaluatorOptions {
  /** Search freshness window (default 365) */
  maxAgeDays?: number;
}
