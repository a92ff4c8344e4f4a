/**
 * Base Evaluator - shared output normalization and malformed-output handling
 */

import type { UseCaseFamily } from '../types/index.js';
import { parseUnitOutput } from '../utils/json-parser.js';
import { clamp01 } from './text.js';
import type { EvaluationContext, EvaluationResult, QualityEvaluator } from './types.js';

export const MALFORMED_OUTPUT_PREFIX = 'malformed-output';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First string-valued key of a record
 */
export function readString(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

/**
 * Text of a scalar value; undefined for objects, arrays and null
 */
export function scalarText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

/**
 * Abstract base class for quality evaluators
 *
 * Subclasses implement score() against already-normalized output and throw
 * ValidationError for shapes they cannot read. Any error raised while scoring
 * becomes a malformed-output result.
 */
export abstract class BaseEvaluator implements QualityEvaluator {
  abstract readonly family: UseCaseFamily;
  abstract readonly metricNames: readonly string[];

  evaluate(expected: unknown, actual: unknown, context: EvaluationContext = {}): EvaluationResult {
    let result: EvaluationResult;
    try {
      const normalized = typeof actual === 'string' ? parseUnitOutput(actual) : actual;
      result = this.score(expected, normalized, context);
    } catch (error) {
      return this.malformed(expected, error instanceof Error ? error.message : String(error));
    }

    const scores: Record<string, number> = {};
    for (const [name, value] of Object.entries(result.scores)) {
      scores[name] = clamp01(value);
    }
    return { scores, diagnostics: result.diagnostics };
  }

  protected abstract score(
    expected: unknown,
    actual: unknown,
    context: EvaluationContext
  ): EvaluationResult;

  /**
   * Metrics a well-formed output would be scored on for this expectation
   */
  protected metricsFor(_expected: unknown): readonly string[] {
    return this.metricNames;
  }

  /**
   * Every metric reported for `expected`, at its minimum
   */
  protected malformed(expected: unknown, reason: string): EvaluationResult {
    let names: readonly string[];
    try {
      names = this.metricsFor(expected);
    } catch {
      // An unreadable expectation reports the whole family
      names = this.metricNames;
    }

    const scores: Record<string, number> = {};
    for (const name of names) {
      scores[name] = 0;
    }
    return { scores, diagnostics: [`${MALFORMED_OUTPUT_PREFIX}: ${reason}`] };
  }
}
