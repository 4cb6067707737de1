/**
 * Text normalization shared by every downstream stage.
 *
 * Turns code or prose into a flat token stream: lowercased, with
 * underscores and structural punctuation turned into separators, and with
 * short tokens, numbers and stopwords removed. `calc_price` and
 * "calc price" tokenize identically.
 */

import { getDefaultStopwords } from './stopwords.js';

/**
 * Structural punctuation replaced by a space before splitting.
 * The first group is the code syntax set; the rest covers markdown and
 * operator characters that would otherwise stick to neighbouring words.
 */
export const DEFAULT_PUNCTUATION = '()[]{}:,.=;"\'' + '`*#!?<>/\\|+-@$%^&~';

const NUMERIC_TOKEN = /^\d+$/;

export interface NormalizerOptions {
  /** Replaces the bundled stopword list */
  stopwords?: Iterable<string>;
  /** Added on top of the base stopword list */
  extraStopwords?: Iterable<string>;
  /** Characters replaced by a space (default: DEFAULT_PUNCTUATION) */
  punctuation?: string;
  /** Split camelCase / PascalCase words before lowercasing */
  splitIdentifiers?: boolean;
}

/**
 * Stateless text normalizer with injected configuration.
 *
 * @example
 * ```typescript
 * const normalizer = new TextNormalizer();
 * normalizer.normalize('def calc_price(items): return total');
 * // ['calc', 'price', 'items', 'total']
 * ```
 */
export class TextNormalizer {
  private readonly stopwords: ReadonlySet<string>;
  private readonly punctuationPattern: RegExp;
  private readonly splitIdentifiers: boolean;

  constructor(options: NormalizerOptions = {}) {
    const base = options.stopwords
      ? [...options.stopwords].map((word) => word.toLowerCase())
      : [...getDefaultStopwords()];
    const extra = [...(options.extraStopwords ?? [])].map((word) => word.toLowerCase());
    this.stopwords = new Set([...base, ...extra]);
    this.punctuationPattern = buildCharacterClass(options.punctuation ?? DEFAULT_PUNCTUATION);
    this.splitIdentifiers = options.splitIdentifiers ?? false;
  }

  /**
   * Normalize text into a token sequence. Never throws; blank input gives [].
   */
  normalize(text: string): string[] {
    if (!text) {
      return [];
    }

    let working = this.splitIdentifiers ? splitCamelCase(text) : text;
    working = working.toLowerCase().replace(/_/g, ' ');
    if (this.punctuationPattern.source !== '(?!)') {
      working = working.replace(this.punctuationPattern, ' ');
    }

    return working
      .split(/\s+/)
      .filter(
        (token) =>
          token.length > 1 && !NUMERIC_TOKEN.test(token) && !this.stopwords.has(token)
      );
  }

  /**
   * Check whether a token would be dropped as a stopword.
   */
  isStopword(token: string): boolean {
    return this.stopwords.has(token.toLowerCase());
  }
}

/**
 * Normalize text with a one-off normalizer.
 */
export function normalize(text: string, options?: NormalizerOptions): string[] {
  return new TextNormalizer(options).normalize(text);
}

/**
 * Insert spaces at lower-to-upper and acronym boundaries:
 * `parseHTTPResponse` -> `parse HTTP Response`.
 */
export function splitCamelCase(text: string): string {
  return text
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2');
}

function buildCharacterClass(chars: string): RegExp {
  if (chars.length === 0) {
    return /(?!)/g;
  }
  const escaped = [...new Set(chars)]
    .map((char) => char.replace(/[\\\]^-]/g, '\\$&'))
    .join('');
  return new RegExp(`[${escaped}]`, 'g');
}
