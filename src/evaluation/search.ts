/**
 * Web-search evaluator
 *
 * Credibility comes from domain heuristics; freshness from dates found in the
 * sources and the answer, measured against the sample's reference date.
 */

import { ValidationError } from '../errors/index.js';
import { BaseEvaluator, isRecord, readString, scalarText } from './base.js';
import { contentTokens, coverage, tokenF1, tokenize } from './text.js';
import type { EvaluationContext, EvaluationResult, EvaluatorOptions } from './types.js';

export const SEARCH_METRICS = [
  'source_credibility',
  'information_freshness',
  'query_relevance',
  'answer_similarity',
  'source_recall',
] as const;

export const DEFAULT_MAX_AGE_DAYS = 365;

const DAY_MS = 24 * 60 * 60 * 1000;

const HIGH_CREDIBILITY_TLDS: ReadonlySet<string> = new Set(['edu', 'gov', 'org']);

const CREDIBLE_DOMAINS: ReadonlySet<string> = new Set([
  'wikipedia.org',
  'britannica.com',
  'nature.com',
  'science.org',
  'pubmed.ncbi.nlm.nih.gov',
  'scholar.google.com',
  'arxiv.org',
  'reuters.com',
  'bbc.com',
  'npr.org',
  'pbs.org',
]);

const LOW_CREDIBILITY_INDICATORS = ['blog', 'forum', 'social', 'wiki', 'user-generated'];

const ACADEMIC_INDICATORS = [
  'university',
  'institute',
  'research',
  'study',
  'journal',
  'publication',
];

const MONTHS: Readonly<Record<string, number>> = {
  jan: 1, january: 1, feb: 2, february: 2, mar: 3, march: 3, apr: 4, april: 4, may: 5,
  jun: 6, june: 6, jul: 7, july: 7, aug: 8, august: 8, sep: 9, sept: 9, september: 9,
  oct: 10, october: 10, nov: 11, november: 11, dec: 12, december: 12,
};

interface SearchSource {
  ref: string;
  date?: string;
}

interface SearchOutput {
  answer: string;
  sources: SearchSource[];
  dates: string[];
}

interface SearchExpectation {
  answer?: string;
  sources: string[];
}

// ============================================
// Source Credibility
// ============================================

/**
 * Lowercased host without "www.", or undefined when `source` is not an http(s) URL
 */
export function domainOf(source: string): string | undefined {
  if (!/^https?:\/\//i.test(source)) {
    return undefined;
  }
  try {
    return new URL(source).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return undefined;
  }
}

/**
 * Credibility of one source in [0, 1], starting from 0.5
 */
export function sourceCredibility(source: string): number {
  let score = 0.5;
  const domain = domainOf(source);

  if (domain !== undefined) {
    const tld = domain.split('.').pop() ?? '';
    if (HIGH_CREDIBILITY_TLDS.has(tld)) {
      score += 0.3;
    }
    if (CREDIBLE_DOMAINS.has(domain)) {
      score += 0.4;
    }
    for (const indicator of LOW_CREDIBILITY_INDICATORS) {
      if (domain.includes(indicator)) {
        score -= 0.2;
      }
    }
    if (source.toLowerCase().startsWith('https://')) {
      score += 0.1;
    }
  } else {
    const lower = source.toLowerCase();
    if (ACADEMIC_INDICATORS.some((indicator) => lower.includes(indicator))) {
      score += 0.2;
    }
    for (const indicator of LOW_CREDIBILITY_INDICATORS) {
      if (lower.includes(indicator)) {
        score -= 0.2;
      }
    }
  }

  return Math.min(1, Math.max(0, score));
}

/**
 * Average of the source scores weighted by themselves
 */
export function overallCredibility(scores: readonly number[]): number {
  const weightSum = scores.reduce((sum, s) => sum + s, 0);
  if (weightSum === 0) {
    return 0;
  }
  return scores.reduce((sum, s) => sum + s * s, 0) / weightSum;
}

// ============================================
// Freshness
// ============================================

function utcDate(year: number, month: number, day: number): Date | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  const valid =
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
  return valid ? date : undefined;
}

/**
 * Dates written as YYYY-MM-DD, MM/DD/YYYY, MM-DD-YYYY or "Month DD, YYYY"
 */
export function extractDates(text: string): Date[] {
  const dates: Date[] = [];
  const push = (date: Date | undefined): void => {
    if (date) {
      dates.push(date);
    }
  };

  for (const m of text.matchAll(/\b(\d{4})-(\d{1,2})-(\d{1,2})\b/g)) {
    push(utcDate(Number(m[1]), Number(m[2]), Number(m[3])));
  }
  for (const m of text.matchAll(/\b(\d{1,2})[/-](\d{1,2})[/-](\d{4})\b/g)) {
    push(utcDate(Number(m[3]), Number(m[1]), Number(m[2])));
  }
  for (const m of text.matchAll(/\b([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})\b/g)) {
    const month = MONTHS[(m[1] ?? '').toLowerCase()];
    if (month !== undefined) {
      push(utcDate(Number(m[3]), month, Number(m[2])));
    }
  }

  return dates;
}

/**
 * Linear decay from 1 (today or future) to 0 at `maxAgeDays`
 */
export function dateFreshness(date: Date, referenceDate: Date, maxAgeDays: number): number {
  const ageDays = Math.floor((referenceDate.getTime() - date.getTime()) / DAY_MS);
  if (ageDays < 0) {
    return 1;
  }
  if (ageDays <= maxAgeDays) {
    return 1 - ageDays / maxAgeDays;
  }
  return 0;
}

function readReferenceDate(context: EvaluationContext): Date | undefined {
  const value = context.referenceDate;
  const date =
    value instanceof Date ? value : typeof value === 'string' ? new Date(value) : undefined;
  return date && !Number.isNaN(date.getTime()) ? date : undefined;
}

// ============================================
// Output Parsing
// ============================================

function toSource(item: unknown): SearchSource {
  const scalar = scalarText(item);
  if (scalar !== undefined) {
    return { ref: scalar };
  }
  if (isRecord(item)) {
    const ref = readString(item, 'url', 'link', 'source', 'title');
    if (ref !== undefined) {
      return { ref, date: readString(item, 'date', 'publishedAt', 'published_at', 'published') };
    }
  }
  throw new ValidationError('actual.sources contains an entry without a url');
}

export function readSearchOutput(actual: unknown): SearchOutput {
  if (typeof actual === 'string') {
    const urls = actual.match(/https?:\/\/[^\s)\]"'<>]+/g) ?? [];
    return { answer: actual, sources: urls.map((ref) => ({ ref })), dates: [] };
  }
  if (!isRecord(actual)) {
    throw new ValidationError('actual is not an answer string or an object');
  }

  const rawSources = actual.sources ?? actual.results ?? [];
  if (!Array.isArray(rawSources)) {
    throw new ValidationError('actual.sources is not an array');
  }
  const rawDates = actual.dates ?? [];
  if (!Array.isArray(rawDates)) {
    throw new ValidationError('actual.dates is not an array');
  }

  return {
    answer: readString(actual, 'answer') ?? '',
    sources: rawSources.map(toSource),
    dates: rawDates.filter((d): d is string => typeof d === 'string'),
  };
}

function readSearchExpectation(expected: unknown): SearchExpectation {
  if (expected === undefined || expected === null) {
    return { sources: [] };
  }
  const scalar = scalarText(expected);
  if (scalar !== undefined) {
    return { answer: scalar, sources: [] };
  }
  if (isRecord(expected)) {
    const sources = Array.isArray(expected.sources)
      ? expected.sources.filter((s): s is string => typeof s === 'string')
      : [];
    return { answer: readString(expected, 'answer'), sources };
  }
  throw new ValidationError('expected is not an answer string or an object');
}

function normalizeSourceKey(source: string): string {
  return domainOf(source) ?? source.trim().toLowerCase().replace(/^www\./, '');
}

// ============================================
// Evaluator
// ============================================

export class SearchEvaluator extends BaseEvaluator {
  readonly family = 'search' as const;
  readonly metricNames: readonly string[] = SEARCH_METRICS;
  private readonly maxAgeDays: number;

  constructor(options: EvaluatorOptions = {}) {
    super();
    this.maxAgeDays = options.maxAgeDays ?? DEFAULT_MAX_AGE_DAYS;
  }

  protected override metricsFor(expected: unknown): readonly string[] {
    const expectation = readSearchExpectation(expected);
    return this.metricNames.filter(
      (name) =>
        (name !== 'answer_similarity' || expectation.answer !== undefined) &&
        (name !== 'source_recall' || expectation.sources.length > 0)
    );
  }

  protected score(
    expected: unknown,
    actual: unknown,
    context: EvaluationContext
  ): EvaluationResult {
    const expectation = readSearchExpectation(expected);
    const output = readSearchOutput(actual);
    const diagnostics: string[] = [];
    const scores: Record<string, number> = {};

    if (output.sources.length === 0) {
      diagnostics.push('no-sources');
    }
    scores.source_credibility = overallCredibility(
      output.sources.map((source) => sourceCredibility(source.ref))
    );

    scores.information_freshness = this.freshness(output, context, diagnostics);

    const query = readString(context, 'query');
    if (query === undefined) {
      diagnostics.push('no-query');
    }
    scores.query_relevance = coverage(contentTokens(query ?? ''), new Set(tokenize(output.answer)));

    if (expectation.answer !== undefined) {
      scores.answer_similarity = tokenF1(expectation.answer, output.answer);
    }

    if (expectation.sources.length > 0) {
      const found = new Set(output.sources.map((source) => normalizeSourceKey(source.ref)));
      const matched = expectation.sources.filter((source) => {
        const key = normalizeSourceKey(source);
        return [...found].some((candidate) => candidate === key || candidate.endsWith(`.${key}`));
      });
      scores.source_recall = matched.length / expectation.sources.length;
    }

    return { scores, diagnostics };
  }

  private freshness(
    output: SearchOutput,
    context: EvaluationContext,
    diagnostics: string[]
  ): number {
    const referenceDate = readReferenceDate(context);
    if (!referenceDate) {
      diagnostics.push('no-reference-date');
      return 0;
    }

    const texts = [
      ...output.sources.flatMap((source) =>
        source.date ? [source.date, source.ref] : [source.ref]
      ),
      ...output.dates,
      output.answer,
    ];
    const dates = texts.flatMap((text) => extractDates(text));
    if (dates.length === 0) {
      diagnostics.push('no-dates');
      return 0;
    }

    return Math.max(...dates.map((date) => dateFreshness(date, referenceDate, this.maxAgeDays)));
  }
}
