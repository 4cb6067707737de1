/**
 * Reference extraction from documentation text.
 *
 * Documentation and code comments are pooled into one lowercased corpus.
 * An entity counts as referenced when its lowercased name occurs in that
 * pool. The default test is a plain substring search, so short names can
 * match inside longer words (`get` in "target"); `word` matching requires
 * identifier boundaries on both sides.
 */

export type ReferenceMatching = 'substring' | 'word';

export interface ReferenceOptions {
  matching?: ReferenceMatching;
}

/**
 * Lowercased documentation corpus.
 */
export class ReferencePool {
  constructor(
    readonly text: string,
    readonly matching: ReferenceMatching = 'substring'
  ) {}

  /**
   * Check whether a name is mentioned anywhere in the pool.
   */
  references(name: string): boolean {
    const needle = name.toLowerCase();
    if (!needle) {
      return false;
    }
    if (this.matching === 'substring') {
      return this.text.includes(needle);
    }
    const escaped = needle.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`(?<![a-z0-9_$])${escaped}(?![a-z0-9_$])`).test(this.text);
  }

  get isEmpty(): boolean {
    return this.text.trim().length === 0;
  }
}

/**
 * Build the reference pool from documentation text plus comments and
 * docstrings pulled from the code.
 */
export function extractReferences(
  docText: string,
  inlineComments: readonly string[] = [],
  options: ReferenceOptions = {}
): ReferencePool {
  const combined = [docText, ...inlineComments].join(' ').toLowerCase();
  return new ReferencePool(combined, options.matching ?? 'substring');
}
