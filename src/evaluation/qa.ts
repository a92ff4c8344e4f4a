/**
 * Question-answering evaluator
 *
 * Lexical metrics only: exact match, token F1, BLEU, ROUGE, term-frequency
 * cosine similarity and factual accuracy.
 */

import { ValidationError } from '../errors/index.js';
import { BaseEvaluator, isRecord, readString, scalarText } from './base.js';
import {
  STOP_WORDS,
  contentTokens,
  cosineSimilarity,
  countTokens,
  f1,
  lcsLength,
  ngrams,
  overlapCount,
  overlapF1,
  preprocessText,
  safeDivide,
  tokenF1,
  tokenize,
} from './text.js';
import type { EvaluationResult } from './types.js';

export const QA_METRICS = [
  'exact_match',
  'token_f1',
  'bleu',
  'rouge_1',
  'rouge_2',
  'rouge_l',
  'semantic_similarity',
  'factual_accuracy',
] as const;

const BLEU_MAX_N = 4;

/**
 * Answer text of a QA value: a scalar, or an object with an `answer` string
 */
export function answerText(value: unknown, role: 'expected' | 'actual'): string {
  const scalar = scalarText(value);
  if (scalar !== undefined) {
    return scalar;
  }
  if (isRecord(value)) {
    const answer = readString(value, 'answer', 'text', 'output');
    if (answer !== undefined) {
      return answer;
    }
  }
  throw new ValidationError(`${role} is not a string or an object with an "answer" string`);
}

// ============================================
// Individual Metrics
// ============================================

export function exactMatch(expected: string, actual: string): number {
  return tokenize(expected).join(' ') === tokenize(actual).join(' ') ? 1 : 0;
}

/**
 * BLEU with n-grams up to 4 over whitespace tokens
 *
 * Zero when any n-gram precision is zero. Brevity penalty exp(1 - ref/cand)
 * applies when the candidate is shorter than the reference.
 */
export function bleu(expected: string, actual: string, maxN: number = BLEU_MAX_N): number {
  const expectedTokens = preprocessText(expected).split(' ').filter(Boolean);
  const actualTokens = preprocessText(actual).split(' ').filter(Boolean);
  if (actualTokens.length === 0) {
    return 0;
  }

  const precisions: number[] = [];
  for (let n = 1; n <= maxN; n++) {
    const candidate = ngrams(actualTokens, n);
    const candidateCount = Math.max(0, actualTokens.length - n + 1);
    precisions.push(safeDivide(overlapCount(candidate, ngrams(expectedTokens, n)), candidateCount));
  }

  if (precisions.some((p) => p === 0)) {
    return 0;
  }

  const logMean = precisions.reduce((sum, p) => sum + Math.log(p), 0) / precisions.length;
  const brevityPenalty =
    actualTokens.length >= expectedTokens.length
      ? 1
      : Math.exp(1 - expectedTokens.length / actualTokens.length);

  return brevityPenalty * Math.exp(logMean);
}

/**
 * ROUGE-N F1
 */
export function rougeN(expected: string, actual: string, n: number): number {
  return overlapF1(ngrams(tokenize(expected), n), ngrams(tokenize(actual), n));
}

/**
 * ROUGE-L F1 from the longest common subsequence
 */
export function rougeL(expected: string, actual: string): number {
  const expectedTokens = tokenize(expected);
  const actualTokens = tokenize(actual);
  const lcs = lcsLength(expectedTokens, actualTokens);
  return f1(safeDivide(lcs, actualTokens.length), safeDivide(lcs, expectedTokens.length));
}

export function semanticSimilarity(expected: string, actual: string): number {
  return cosineSimilarity(countTokens(contentTokens(expected)), countTokens(contentTokens(actual)));
}

/**
 * Facts: numbers, quoted phrases and content words longer than 3 characters
 */
export function extractFacts(text: string): Set<string> {
  const lower = text.toLowerCase();
  const facts = new Set<string>();

  for (const match of lower.matchAll(/\b\d+(?:\.\d+)?\b/g)) {
    facts.add(match[0]);
  }
  for (const match of lower.matchAll(/"([^"]*)"/g)) {
    const phrase = match[1]?.trim();
    if (phrase) {
      facts.add(phrase);
    }
  }
  for (const match of lower.matchAll(/\b\w+\b/g)) {
    const word = match[0];
    if (word.length > 3 && !STOP_WORDS.has(word)) {
      facts.add(word);
    }
  }

  return facts;
}

function factPresent(fact: string, actualFacts: ReadonlySet<string>): boolean {
  if (actualFacts.has(fact)) {
    return true;
  }
  // Longer facts also match on containment either way
  if (fact.length > 5) {
    for (const actualFact of actualFacts) {
      if (fact.includes(actualFact) || actualFact.includes(fact)) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Share of expected facts preserved in the answer; 1 when there are none
 */
export function factualAccuracy(expected: string, actual: string): number {
  const expectedFacts = extractFacts(expected);
  if (expectedFacts.size === 0) {
    return 1;
  }
  const actualFacts = extractFacts(actual);
  let preserved = 0;
  for (const fact of expectedFacts) {
    if (factPresent(fact, actualFacts)) {
      preserved++;
    }
  }
  return preserved / expectedFacts.size;
}

// ============================================
// Evaluator
// ============================================

export class QAEvaluator extends BaseEvaluator {
  readonly family = 'qa' as const;
  readonly metricNames: readonly string[] = QA_METRICS;

  protected score(expected: unknown, actual: unknown): EvaluationResult {
    const expectedText = answerText(expected, 'expected');
    const actualText = answerText(actual, 'actual');
    const diagnostics: string[] = [];

    if (actualText.trim().length === 0) {
      diagnostics.push('empty-answer');
    }

    return {
      scores: {
        exact_match: exactMatch(expectedText, actualText),
        token_f1: tokenF1(expectedText, actualText),
        bleu: bleu(expectedText, actualText),
        rouge_1: rougeN(expectedText, actualText, 1),
        rouge_2: rougeN(expectedText, actualText, 2),
        rouge_l: rougeL(expectedText, actualText),
        semantic_similarity: semanticSimilarity(expectedText, actualText),
        factual_accuracy: factualAccuracy(expectedText, actualText),
      },
      diagnostics,
    };
  }
}
