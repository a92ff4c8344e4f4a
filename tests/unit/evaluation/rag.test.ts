import { describe, it, expect } from 'vitest';
import { RAGEvaluator } from '../../../src/evaluation/rag.js';

describe('RAGEvaluator', () => {
  const evaluator = new RAGEvaluator();

  const expected = {
    relevant: ['d1', 'd2', 'd3'],
    answer: 'Paris is the capital of France',
  };

  const actual = {
    answer: 'Paris is the capital of France',
    retrieved: [
      { id: 'd1', text: 'Paris is the capital and largest city of France.' },
      { id: 'd4', text: 'Berlin is the capital of Germany.' },
    ],
    citations: ['d1', 'd4'],
  };

  it('should score retrieval, citations and grounding', () => {
    const { scores, diagnostics } = evaluator.evaluate(expected, actual);

    expect(scores.retrieval_precision).toBe(0.5);
    expect(scores.retrieval_recall).toBeCloseTo(1 / 3, 10);
    expect(scores.retrieval_f1).toBeCloseTo(0.4, 10);
    expect(scores.citation_accuracy).toBe(0.5);
    expect(scores.answer_groundedness).toBe(1);
    expect(scores.answer_similarity).toBe(1);
    expect(diagnostics).toEqual([]);
  });

  it('should omit answer similarity without an expected answer', () => {
    const { scores } = evaluator.evaluate(['d1'], actual);

    expect(scores.answer_similarity).toBeUndefined();
    expect(scores.retrieval_recall).toBe(1);
    expect(Object.keys(scores).sort()).toEqual([
      'answer_groundedness',
      'citation_accuracy',
      'retrieval_f1',
      'retrieval_precision',
      'retrieval_recall',
    ]);
  });

  it('should score zero precision when nothing is retrieved', () => {
    const { scores, diagnostics } = evaluator.evaluate(expected, {
      answer: 'Paris',
      retrieved: [],
    });

    expect(scores.retrieval_precision).toBe(0);
    expect(scores.retrieval_recall).toBe(0);
    expect(scores.retrieval_f1).toBe(0);
    expect(scores.answer_groundedness).toBe(0);
    expect(diagnostics).toEqual(['no-documents-retrieved', 'no-citations']);
  });

  it('should score full recall when nothing is relevant', () => {
    const { scores } = evaluator.evaluate({ relevant: [] }, actual);

    expect(scores.retrieval_recall).toBe(1);
    expect(scores.retrieval_precision).toBe(0);
  });

  it('should count duplicate retrievals once', () => {
    const { scores } = evaluator.evaluate(['d1'], { answer: '', retrieved: ['d1', 'd1', 'd2'] });

    expect(scores.retrieval_precision).toBe(0.5);
  });

  it('should ground bare ids through the context documents', () => {
    const { scores, diagnostics } = evaluator.evaluate(
      ['d1'],
      { answer: 'Paris', retrieved: ['d1'] },
      { documents: { d1: 'Paris is in France' } }
    );

    expect(scores.answer_groundedness).toBe(1);
    expect(scores.citation_accuracy).toBe(0);
    expect(diagnostics).toEqual(['no-citations']);
  });

  it('should return minimum scores for malformed output', () => {
    const { scores, diagnostics } = evaluator.evaluate(expected, 'just some text');

    expect(scores).toEqual({
      retrieval_precision: 0,
      retrieval_recall: 0,
      retrieval_f1: 0,
      citation_accuracy: 0,
      answer_groundedness: 0,
      answer_similarity: 0,
    });
    expect(diagnostics).toEqual([
      'malformed-output: actual is not an object with retrieved documents',
    ]);
  });

  it('should leave out answer similarity for malformed output without an expected answer', () => {
    const { scores } = evaluator.evaluate({ relevant: ['d1'] }, 'just some text');

    expect(scores).toEqual({
      retrieval_precision: 0,
      retrieval_recall: 0,
      retrieval_f1: 0,
      citation_accuracy: 0,
      answer_groundedness: 0,
    });
  });

  it('should reject a retrieved field that is not a list', () => {
    const { diagnostics } = evaluator.evaluate(expected, { retrieved: 'd1' });

    expect(diagnostics).toEqual(['malformed-output: actual.retrieved is not an array']);
  });
});
