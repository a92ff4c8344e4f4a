/**
 * Lexical helpers shared by the evaluators
 *
 * Every function here is pure and deterministic.
 */

export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by',
  'is', 'are', 'was', 'were', 'be', 'been', 'have', 'has', 'had', 'do', 'does', 'did',
  'will', 'would', 'could', 'should', 'it', 'its', 'this', 'that', 'what', 'which', 'who',
  'how', 'from', 'as',
]);

/**
 * Lowercase, collapse whitespace
 */
export function preprocessText(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ').toLowerCase();
}

/**
 * Lowercase alphanumeric tokens with punctuation removed
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .split(' ')
    .filter(Boolean);
}

export function contentTokens(text: string): string[] {
  return tokenize(text).filter((token) => !STOP_WORDS.has(token));
}

export function countTokens(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

export function ngrams(tokens: readonly string[], n: number): Map<string, number> {
  const grams: string[] = [];
  for (let i = 0; i + n <= tokens.length; i++) {
    grams.push(tokens.slice(i, i + n).join('\u0000'));
  }
  return countTokens(grams);
}

/**
 * Size of the multiset intersection
 */
export function overlapCount(a: Map<string, number>, b: Map<string, number>): number {
  let overlap = 0;
  for (const [key, count] of a) {
    overlap += Math.min(count, b.get(key) ?? 0);
  }
  return overlap;
}

function total(counts: Map<string, number>): number {
  let sum = 0;
  for (const count of counts.values()) {
    sum += count;
  }
  return sum;
}

export function safeDivide(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

export function f1(precision: number, recall: number): number {
  return precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall);
}

/**
 * F1 of the multiset overlap between two count maps
 */
export function overlapF1(reference: Map<string, number>, candidate: Map<string, number>): number {
  const overlap = overlapCount(candidate, reference);
  return f1(safeDivide(overlap, total(candidate)), safeDivide(overlap, total(reference)));
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Token-level F1; two empty texts match perfectly
 */
export function tokenF1(expected: string, actual: string): number {
  const expectedTokens = tokenize(expected);
  const actualTokens = tokenize(actual);
  if (expectedTokens.length === 0 && actualTokens.length === 0) {
    return 1;
  }
  return overlapF1(countTokens(expectedTokens), countTokens(actualTokens));
}

/**
 * Cosine similarity of term-frequency vectors
 */
export function cosineSimilarity(a: Map<string, number>, b: Map<string, number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (const [key, count] of a) {
    dot += count * (b.get(key) ?? 0);
    normA += count * count;
  }
  for (const count of b.values()) {
    normB += count * count;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Length of the longest common subsequence
 */
export function lcsLength(a: readonly string[], b: readonly string[]): number {
  let previous: number[] = new Array<number>(b.length + 1).fill(0);
  for (const tokenA of a) {
    const current: number[] = [0];
    b.forEach((tokenB, j) => {
      current.push(
        tokenA === tokenB ? (previous[j] ?? 0) + 1 : Math.max(previous[j + 1] ?? 0, current[j] ?? 0)
      );
    });
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * Share of `needles` that appear in `haystack`; 0 when there are no needles
 */
export function coverage(needles: readonly string[], haystack: ReadonlySet<string>): number {
  if (needles.length === 0) {
    return 0;
  }
  return needles.filter((token) => haystack.has(token)).length / needles.length;
}
