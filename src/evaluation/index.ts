/**
 * Quality evaluation
 */

import type { UseCaseFamily } from '../types/index.js';
import { QAEvaluator } from './qa.js';
import { RAGEvaluator } from './rag.js';
import { SearchEvaluator } from './search.js';
import type { EvaluatorOptions, QualityEvaluator } from './types.js';

export type {
  QualityEvaluator,
  EvaluationResult,
  EvaluationContext,
  EvaluatorOptions,
} from './types.js';
export { BaseEvaluator, MALFORMED_OUTPUT_PREFIX } from './base.js';
export { QAEvaluator, QA_METRICS } from './qa.js';
export { RAGEvaluator, RAG_METRICS } from './rag.js';
export { SearchEvaluator, SEARCH_METRICS, DEFAULT_MAX_AGE_DAYS } from './search.js';

/**
 * Evaluator for a use-case family
 */
export function createEvaluator(
  family: UseCaseFamily,
  options: EvaluatorOptions = {}
): QualityEvaluator {
  switch (family) {
    case 'qa':
      return new QAEvaluator();
    case 'rag':
      return new RAGEvaluator();
    case 'search':
      return new SearchEvaluator(options);
  }
}
