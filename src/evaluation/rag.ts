/**
 * Retrieval-augmented generation evaluator
 */

import { ValidationError } from '../errors/index.js';
import { BaseEvaluator, isRecord, readString, scalarText } from './base.js';
import { contentTokens, coverage, f1, safeDivide, tokenF1, tokenize } from './text.js';
import type { EvaluationContext, EvaluationResult } from './types.js';

export const RAG_METRICS = [
  'retrieval_precision',
  'retrieval_recall',
  'retrieval_f1',
  'citation_accuracy',
  'answer_groundedness',
  'answer_similarity',
] as const;

interface RetrievedDocument {
  id: string;
  text?: string;
}

interface RagOutput {
  answer?: string;
  retrieved: RetrievedDocument[];
  citations: string[];
}

interface RagExpectation {
  relevant: string[];
  answer?: string;
}

function readList(record: Record<string, unknown>, keys: string[], role: string): unknown[] {
  for (const key of keys) {
    const value = record[key];
    if (value === undefined) {
      continue;
    }
    if (!Array.isArray(value)) {
      throw new ValidationError(`${role}.${key} is not an array`);
    }
    return value;
  }
  return [];
}

function toId(item: unknown, role: string): string {
  const text = scalarText(item);
  if (text === undefined) {
    throw new ValidationError(`${role} contains a non-scalar id`);
  }
  return text;
}

function toDocument(item: unknown): RetrievedDocument {
  const scalar = scalarText(item);
  if (scalar !== undefined) {
    return { id: scalar };
  }
  if (isRecord(item)) {
    const id = scalarText(item.id) ?? readString(item, 'source', 'url');
    if (id !== undefined) {
      return { id, text: readString(item, 'text', 'content', 'snippet') };
    }
  }
  throw new ValidationError('actual.retrieved contains an entry without an id');
}

export function readRagOutput(actual: unknown): RagOutput {
  if (!isRecord(actual)) {
    throw new ValidationError('actual is not an object with retrieved documents');
  }
  return {
    answer: readString(actual, 'answer'),
    retrieved: readList(actual, ['retrieved', 'documents', 'contexts'], 'actual').map(toDocument),
    citations: readList(actual, ['citations', 'cited'], 'actual').map((id) =>
      toId(id, 'actual.citations')
    ),
  };
}

export function readRagExpectation(expected: unknown): RagExpectation {
  if (Array.isArray(expected)) {
    return { relevant: expected.map((id) => toId(id, 'expected')) };
  }
  if (isRecord(expected)) {
    return {
      relevant: readList(expected, ['relevant', 'relevantIds', 'documents'], 'expected').map((id) =>
        toId(id, 'expected.relevant')
      ),
      answer: readString(expected, 'answer'),
    };
  }
  throw new ValidationError('expected is not a list of relevant ids or an object');
}

function documentTexts(
  retrieved: RetrievedDocument[],
  context: EvaluationContext
): string[] {
  const corpus = isRecord(context.documents) ? context.documents : {};
  return retrieved.map((doc) => doc.text ?? scalarText(corpus[doc.id]) ?? doc.id);
}

export class RAGEvaluator extends BaseEvaluator {
  readonly family = 'rag' as const;
  readonly metricNames: readonly string[] = RAG_METRICS;

  protected override metricsFor(expected: unknown): readonly string[] {
    const expectation = readRagExpectation(expected);
    return expectation.answer === undefined
      ? this.metricNames.filter((name) => name !== 'answer_similarity')
      : this.metricNames;
  }

  protected score(
    expected: unknown,
    actual: unknown,
    context: EvaluationContext
  ): EvaluationResult {
    const expectation = readRagExpectation(expected);
    const output = readRagOutput(actual);
    const diagnostics: string[] = [];

    const relevant = new Set(expectation.relevant);
    const retrieved = new Set(output.retrieved.map((doc) => doc.id));
    const relevantRetrieved = [...retrieved].filter((id) => relevant.has(id)).length;

    if (retrieved.size === 0) {
      diagnostics.push('no-documents-retrieved');
    }
    const precision = safeDivide(relevantRetrieved, retrieved.size);
    const recall = relevant.size === 0 ? 1 : relevantRetrieved / relevant.size;

    const cited = new Set(output.citations);
    if (cited.size === 0) {
      diagnostics.push('no-citations');
    }
    const citedRelevant = [...cited].filter((id) => relevant.has(id)).length;
    const citationAccuracy = safeDivide(citedRelevant, cited.size);

    const answer = output.answer ?? '';
    const answerTokens = contentTokens(answer);
    if (answerTokens.length === 0) {
      diagnostics.push('empty-answer');
    }
    const contextTokens = new Set(
      documentTexts(output.retrieved, context).flatMap((text) => tokenize(text))
    );
    const groundedness = coverage(answerTokens, contextTokens);

    const scores: Record<string, number> = {
      retrieval_precision: precision,
      retrieval_recall: recall,
      retrieval_f1: f1(precision, recall),
      citation_accuracy: citationAccuracy,
      answer_groundedness: groundedness,
    };

    if (expectation.answer !== undefined) {
      scores.answer_similarity = tokenF1(expectation.answer, answer);
    }

    return { scores, diagnostics };
  }
}
