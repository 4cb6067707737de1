/**
 * Operational alignment check.
 *
 * Bag-of-words overlap misses obvious pairings like code `dist` vs doc
 * "distance". A small trigger table bridges them: when a trigger token
 * appears in code, the documentation must contain the trigger or one of
 * its synonyms.
 */

import type { OperationalGap } from '../types/consistency.js';
import { TextNormalizer } from '../normalization/text-normalizer.js';

/**
 * Trigger token -> synonyms that satisfy it. Triggers and synonyms are
 * matched as normalized tokens.
 */
export type OperationalTriggerTable = Readonly<Record<string, readonly string[]>>;

export const DEFAULT_OPERATIONAL_TRIGGERS: OperationalTriggerTable = {
  dist: ['distance', 'distances', 'euclidean', 'manhattan', 'metric', 'proximity'],
  save: ['persist', 'persists', 'persistence', 'store', 'stores', 'storage', 'saves', 'saving'],
  fit: ['train', 'trains', 'training', 'learn', 'learns', 'fitting'],
  predict: ['prediction', 'predictions', 'predicts', 'inference', 'infer', 'forecast'],
  auth: ['authentication', 'authenticate', 'authorization', 'login', 'credentials'],
  cache: ['caching', 'cached', 'memoize', 'memoization'],
  retry: ['retries', 'retrying', 'backoff', 'attempts'],
};

/**
 * Check token streams against the trigger table.
 *
 * @returns one gap per trigger present in code but unmet in docs, in table order
 */
export function findOperationalGaps(
  codeTokens: Iterable<string>,
  docTokens: Iterable<string>,
  triggers: OperationalTriggerTable = DEFAULT_OPERATIONAL_TRIGGERS
): OperationalGap[] {
  const code = new Set(codeTokens);
  const doc = new Set(docTokens);
  const gaps: OperationalGap[] = [];

  for (const [trigger, synonyms] of Object.entries(triggers)) {
    const key = trigger.toLowerCase();
    if (!code.has(key)) continue;

    const words = synonyms.map((word) => word.toLowerCase());
    if (doc.has(key) || words.some((word) => doc.has(word))) continue;

    gaps.push({ trigger: key, missingSynonyms: words });
  }

  return gaps;
}

/**
 * Normalize both texts and check them against the trigger table.
 */
export function checkOperationalAlignment(
  codeText: string,
  docText: string,
  triggers: OperationalTriggerTable = DEFAULT_OPERATIONAL_TRIGGERS,
  normalizer: TextNormalizer = new TextNormalizer()
): OperationalGap[] {
  return findOperationalGaps(normalizer.normalize(codeText), normalizer.normalize(docText), triggers);
}
