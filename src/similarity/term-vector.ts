/**
 * Vector-space similarity between two corpora.
 *
 * Each corpus becomes a term vector with sublinear term frequency
 * (1 + ln tf). No inverse-document-frequency weighting is applied.
 */

import type { TermVector } from '../types/consistency.js';
import { TextNormalizer } from '../normalization/text-normalizer.js';

/**
 * Raw token frequencies for one corpus.
 */
export function countTerms(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Build a sublinear-TF vector from a token stream.
 */
export function buildTermVector(tokens: readonly string[]): TermVector {
  const vector = new Map<string, number>();
  for (const [term, tf] of countTerms(tokens)) {
    vector.set(term, 1 + Math.log(tf));
  }
  return vector;
}

/**
 * Euclidean norm of a term vector.
 */
export function vectorNorm(vector: TermVector): number {
  let sum = 0;
  for (const weight of vector.values()) {
    sum += weight * weight;
  }
  return Math.sqrt(sum);
}

/**
 * Cosine similarity, rounded to 4 decimals and clamped to [0, 1].
 * Returns 0 when either vector is empty.
 */
export function cosineSimilarity(a: TermVector, b: TermVector): number {
  const normA = vectorNorm(a);
  const normB = vectorNorm(b);
  if (normA === 0 || normB === 0) {
    return 0;
  }

  // Sum shared terms in sorted order so (a, b) and (b, a) add up identically
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  const shared = [...small.keys()].filter((term) => large.has(term)).sort();
  let dot = 0;
  for (const term of shared) {
    dot += (a.get(term) ?? 0) * (b.get(term) ?? 0);
  }

  const raw = dot / (normA * normB);
  return Math.min(1, Math.max(0, Math.round(raw * 10000) / 10000));
}

/**
 * Similarity between two raw texts using the given (or default) normalizer.
 */
export function similarity(
  corpusA: string,
  corpusB: string,
  normalizer: TextNormalizer = new TextNormalizer()
): number {
  return cosineSimilarity(
    buildTermVector(normalizer.normalize(corpusA)),
    buildTermVector(normalizer.normalize(corpusB))
  );
}
