/**
 * Type definitions for code/documentation consistency analysis.
 *
 * These types flow through the whole engine: extractors produce
 * CodeEntity values, the similarity model produces term vectors, the gap
 * analyzer produces GapSet and OperationalGap values, and the report
 * builder folds all of them into one ConsistencyReport.
 */

/**
 * Kind of named construct found in source code.
 */
export type EntityKind = 'function' | 'class' | 'method' | 'config-key';

/** All entity kinds, in reporting order. */
export const ENTITY_KINDS: readonly EntityKind[] = ['function', 'class', 'method', 'config-key'];

/**
 * A named code construct found by an extractor.
 */
export interface CodeEntity {
  /** Name as it appears in the source (case preserved) */
  readonly name: string;
  readonly kind: EntityKind;
  /** File the entity came from, when known */
  readonly origin?: string;
  /** 1-based line of the match, when known */
  readonly line?: number;
}

/**
 * Source language families with a dedicated extractor.
 * `generic` is the lexical fallback for everything else.
 */
export type SourceLanguage = 'python' | 'typescript' | 'generic';

/**
 * Normalized token -> weight for one corpus. Never mutated after construction.
 */
export type TermVector = ReadonlyMap<string, number>;

/**
 * Vocabulary gaps between the code corpus and the documentation corpus.
 *
 * The three sets are pairwise disjoint and their union is exactly the
 * union of both vocabularies.
 */
export interface GapSet {
  /** Terms present in both corpora */
  readonly common: ReadonlySet<string>;
  /** Code terms absent from documentation */
  readonly missingInDoc: ReadonlySet<string>;
  /** Documentation terms absent from code (zombie documentation) */
  readonly missingInCode: ReadonlySet<string>;
}

/**
 * A code operation the documentation never mentions.
 */
export interface OperationalGap {
  /** Trigger token found in code, e.g. "dist" */
  readonly trigger: string;
  /** Words that would have satisfied the check */
  readonly missingSynonyms: readonly string[];
}

/**
 * Documentation heading that names a function or class.
 */
export interface DocSection {
  readonly name: string;
  readonly kind: 'function' | 'class';
  readonly description: string;
  /** True when the heading used an explicit marker (`function:`, `class:`, `def`) */
  readonly explicit: boolean;
  readonly origin?: string;
}

/**
 * Alignment labels, worst to best.
 */
export type AlignmentLabel =
  | 'PoorAlignment'
  | 'PartialAlignment'
  | 'HighAlignment'
  | 'ProductionQuality';

/** Labels ordered worst to best. */
export const ALIGNMENT_LABELS: readonly AlignmentLabel[] = [
  'PoorAlignment',
  'PartialAlignment',
  'HighAlignment',
  'ProductionQuality',
];

/**
 * How the report was produced.
 *
 * - analyzed: full analysis ran
 * - no-input: code or documentation text was blank
 * - no-logic: code text had no recognizable entities
 * - error: analysis threw and was converted into a report
 */
export type ReportStatus = 'analyzed' | 'no-input' | 'no-logic' | 'error';

/**
 * Exclusive lower bounds of the label bands on the 0-1 score.
 * Must be strictly decreasing: production > high > partial.
 */
export interface LabelThresholds {
  production: number;
  high: number;
  partial: number;
}

/**
 * Categorized counts behind `issueCount`.
 */
export interface ReportBreakdown {
  readonly undocumentedEntities: number;
  readonly undocumentedByKind: Readonly<Record<EntityKind, number>>;
  readonly zombieTerms: number;
  readonly operationalGaps: number;
  readonly staleSections: number;
}

export interface ReportStats {
  /** Code terms missing from documentation */
  readonly issueCount: number;
  /** Terms shared by code and documentation */
  readonly syncedCount: number;
  readonly entityCount: number;
  readonly documentedEntityCount: number;
  readonly breakdown: ReportBreakdown;
}

/**
 * Serializable form of a GapSet (sorted arrays).
 */
export interface VocabularyGaps {
  readonly common: readonly string[];
  readonly missingInDoc: readonly string[];
  readonly missingInCode: readonly string[];
}

/**
 * Result of one consistency analysis. Plain data, JSON-compatible, frozen.
 */
export interface ConsistencyReport {
  readonly status: ReportStatus;
  /** Raw cosine similarity (0-1, 4 decimals) */
  readonly score: number;
  /** Score as an integer percentage (0-100) */
  readonly percent: number;
  readonly label: AlignmentLabel;
  readonly icon: string;
  readonly summary: string;
  readonly stats: ReportStats;
  readonly gaps: VocabularyGaps;
  readonly entities: {
    readonly documented: readonly CodeEntity[];
    readonly undocumented: readonly CodeEntity[];
  };
  readonly operationalGaps: readonly OperationalGap[];
  readonly staleSections: readonly DocSection[];
  readonly suggestions: readonly string[];
  /** Counts for [common, missingInDoc, missingInCode] */
  readonly visual: readonly [number, number, number];
}
