/**
 * Vocabulary gap analysis between code and documentation.
 *
 * Works on normalized token vocabularies (the same ones the similarity
 * model uses), not on CodeEntity objects.
 */

import natural from 'natural';
import type { GapSet } from '../types/consistency.js';

/**
 * Split the union of both vocabularies into shared, code-only and
 * doc-only terms. Each term lands in exactly one set.
 */
export function analyzeGaps(codeTokens: Iterable<string>, docTokens: Iterable<string>): GapSet {
  const code = new Set(codeTokens);
  const doc = new Set(docTokens);

  const common = new Set<string>();
  const missingInDoc = new Set<string>();
  const missingInCode = new Set<string>();

  for (const term of code) {
    if (doc.has(term)) {
      common.add(term);
    } else {
      missingInDoc.add(term);
    }
  }
  for (const term of doc) {
    if (!code.has(term)) {
      missingInCode.add(term);
    }
  }

  return { common, missingInDoc, missingInCode };
}

/**
 * A documentation term with a near-identical code term.
 */
export interface TermHint {
  docTerm: string;
  codeTerm: string;
  distance: number;
}

/**
 * Find close code spellings for doc-only terms ("did you mean").
 *
 * Uses Levenshtein distance. Terms shorter than 4 characters are skipped.
 * Ties keep the alphabetically first code term.
 */
export function suggestCodeTerms(
  zombieTerms: Iterable<string>,
  codeVocabulary: Iterable<string>,
  maxDistance: number = 2
): TermHint[] {
  const candidates = [...codeVocabulary].filter((term) => term.length >= 4).sort();
  const hints: TermHint[] = [];

  for (const docTerm of [...zombieTerms].sort()) {
    if (docTerm.length < 4) continue;

    let best: TermHint | undefined;
    for (const codeTerm of candidates) {
      if (codeTerm === docTerm) continue;
      const distance = natural.LevenshteinDistance(docTerm, codeTerm);
      if (distance <= maxDistance && (!best || distance < best.distance)) {
        best = { docTerm, codeTerm, distance };
      }
    }
    if (best) {
      hints.push(best);
    }
  }

  return hints;
}

/**
 * Serialize a gap set to sorted arrays.
 */
export function sortedGaps(gaps: GapSet): {
  common: string[];
  missingInDoc: string[];
  missingInCode: string[];
} {
  return {
    common: [...gaps.common].sort(),
    missingInDoc: [...gaps.missingInDoc].sort(),
    missingInCode: [...gaps.missingInCode].sort(),
  };
}
