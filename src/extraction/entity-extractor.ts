/**
 * Entity extraction from code text.
 *
 * Extraction is capability-polymorphic: every language family implements
 * EntityExtractor, and LexicalEntityExtractor is the best-effort fallback
 * used when the language is unknown. The lexical scanner over-includes.
 */

import type { CodeEntity, EntityKind, SourceLanguage } from '../types/consistency.js';

/**
 * Extracts named entities from the text of one source file (or an
 * aggregate of several).
 */
export interface EntityExtractor {
  readonly language: SourceLanguage;
  extract(code: string, origin?: string): CodeEntity[];
}

/**
 * Shared filtering options for every extractor.
 */
export interface ExtractionOptions {
  /** Names shorter than this are dropped (default: 3) */
  minNameLength?: number;
  /** Config-key names never reported, compared case-insensitively */
  ignoredNames?: Iterable<string>;
}

/**
 * A lexical pattern. Capture group 1 holds the entity name; the pattern
 * must carry the `g` flag.
 */
export interface EntityPattern {
  kind: EntityKind;
  pattern: RegExp;
}

export const DEFAULT_MIN_NAME_LENGTH = 3;

/**
 * Keywords the permissive config-key pattern picks up (`else:`, `try:`,
 * `default:`, URL schemes).
 */
export const DEFAULT_IGNORED_NAMES: readonly string[] = [
  'and', 'async', 'await', 'break', 'case', 'catch', 'continue', 'default',
  'elif', 'else', 'except', 'false', 'finally', 'for', 'from', 'http',
  'https', 'import', 'lambda', 'none', 'not', 'null', 'pass', 'return',
  'self', 'switch', 'that', 'the', 'then', 'this', 'true', 'try', 'while',
  'with', 'yield',
];

/**
 * Ordered patterns per entity kind for the generic scanner. Several
 * surface syntaxes are covered: Python `def`, JavaScript `function` and
 * arrow constants, Rust `fn`, Go `func`, plus class-like declarations and
 * "identifier followed by colon" configuration keys.
 */
export const DEFAULT_ENTITY_PATTERNS: readonly EntityPattern[] = [
  { kind: 'function', pattern: /^(?:async[ \t]+)?def[ \t]+([A-Za-z_]\w*)/gm },
  { kind: 'function', pattern: /\bfunction\*?\s+([A-Za-z_$][\w$]*)/g },
  {
    kind: 'function',
    pattern:
      /\b(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*=\s*(?:async\s*)?(?:function\b|\([^)]*\)\s*=>|[A-Za-z_$][\w$]*\s*=>)/g,
  },
  { kind: 'function', pattern: /\bfn\s+([A-Za-z_]\w*)/g },
  { kind: 'function', pattern: /\bfunc\s+(?:\([^)]*\)\s*)?([A-Za-z_]\w*)/g },
  { kind: 'method', pattern: /^[ \t]+(?:async[ \t]+)?def[ \t]+([A-Za-z_]\w*)/gm },
  { kind: 'class', pattern: /\bclass\s+([A-Za-z_$][\w$]*)/g },
  { kind: 'class', pattern: /\binterface\s+([A-Za-z_$][\w$]*)/g },
  { kind: 'class', pattern: /\bstruct\s+([A-Za-z_]\w*)/g },
  { kind: 'config-key', pattern: /(['"]?[\w-]+['"]?)\s*:/g },
];

/**
 * Accumulates entities with de-duplication by (name, kind, origin) and
 * applies the shared length filter and the config-key keyword filter.
 */
export class EntityCollector {
  private readonly entities: CodeEntity[] = [];
  private readonly seen = new Set<string>();
  private readonly minNameLength: number;
  private readonly ignored: ReadonlySet<string>;

  constructor(
    private readonly origin: string | undefined,
    options: ExtractionOptions = {}
  ) {
    this.minNameLength = options.minNameLength ?? DEFAULT_MIN_NAME_LENGTH;
    this.ignored = new Set(
      [...(options.ignoredNames ?? DEFAULT_IGNORED_NAMES)].map((name) => name.toLowerCase())
    );
  }

  /**
   * Add a raw match. Surrounding quotes are trimmed before filtering.
   *
   * @returns true when the entity was kept
   */
  add(rawName: string, kind: EntityKind, line?: number): boolean {
    const name = rawName.trim().replace(/^['"]+|['"]+$/g, '');
    if (name.length < this.minNameLength) {
      return false;
    }
    if (kind === 'config-key' && this.ignored.has(name.toLowerCase())) {
      return false;
    }

    const key = `${kind}\u0000${name}`;
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);

    this.entities.push({ name, kind, origin: this.origin, line });
    return true;
  }

  toArray(): CodeEntity[] {
    return [...this.entities];
  }
}

/**
 * Generic lexical extractor. Unions the matches of every pattern, kind by
 * kind, over the raw text.
 */
export class LexicalEntityExtractor implements EntityExtractor {
  readonly language: SourceLanguage = 'generic';
  private readonly patterns: readonly EntityPattern[];

  constructor(
    private readonly options: ExtractionOptions & { patterns?: readonly EntityPattern[] } = {}
  ) {
    this.patterns = options.patterns ?? DEFAULT_ENTITY_PATTERNS;
  }

  extract(code: string, origin?: string): CodeEntity[] {
    const collector = new EntityCollector(origin, this.options);
    if (!code.trim()) {
      return collector.toArray();
    }

    const lines = new LineIndex(code);
    for (const { kind, pattern } of this.patterns) {
      const global = pattern.global ? pattern : new RegExp(pattern.source, pattern.flags + 'g');
      for (const match of code.matchAll(global)) {
        const name = match[1];
        if (name) {
          collector.add(name, kind, lines.lineAt(match.index ?? 0));
        }
      }
    }

    return collector.toArray();
  }
}

/**
 * Extract entities with the generic lexical extractor.
 */
export function extractEntities(
  code: string,
  origin?: string,
  options?: ExtractionOptions
): CodeEntity[] {
  return new LexicalEntityExtractor(options).extract(code, origin);
}

/**
 * Entity names de-duplicated case-insensitively, first spelling wins.
 * This is the set semantics used for scoring.
 */
export function uniqueEntityNames(entities: readonly CodeEntity[]): string[] {
  const byLower = new Map<string, string>();
  for (const entity of entities) {
    const lower = entity.name.toLowerCase();
    if (!byLower.has(lower)) {
      byLower.set(lower, entity.name);
    }
  }
  return [...byLower.values()];
}

/**
 * Maps character offsets to 1-based line numbers.
 */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') {
        this.starts.push(i + 1);
      }
    }
  }

  lineAt(offset: number): number {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.starts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }
}
