/**
 * Builds the immutable ConsistencyReport from analysis results.
 *
 * Owns everything presentational about the score: label bands, icons,
 * the percentage, summary text and the ordered suggestion list. Never
 * mutates its inputs; the returned report is deep-frozen.
 */

import type {
  AlignmentLabel,
  CodeEntity,
  ConsistencyReport,
  DocSection,
  EntityKind,
  GapSet,
  LabelThresholds,
  OperationalGap,
  ReportStatus,
} from '../types/consistency.js';
import { sortedGaps, type TermHint } from '../analysis/gap-analyzer.js';

/**
 * Default label bands. Each value is an exclusive lower bound.
 */
export const DEFAULT_LABEL_THRESHOLDS: LabelThresholds = {
  production: 0.85,
  high: 0.65,
  partial: 0.4,
};

export const LABEL_ICONS: Readonly<Record<AlignmentLabel, string>> = {
  ProductionQuality: '✅',
  HighAlignment: '🟢',
  PartialAlignment: '🟡',
  PoorAlignment: '🔴',
};

export const DEFAULT_MAX_ENTITY_SUGGESTIONS = 5;
export const DEFAULT_MAX_TERM_SUGGESTIONS = 5;

export const NO_CODE_MESSAGE = 'No source code supplied. Provide code text to analyze.';
export const NO_DOC_MESSAGE =
  'No documentation supplied. Every code entity is undocumented; add documentation text to measure alignment.';
export const NO_LOGIC_MESSAGE =
  'No functions, classes or configuration keys were detected. Supply valid source code to analyze.';

const KIND_NAMES: Readonly<Record<EntityKind, string>> = {
  function: 'function',
  class: 'class',
  method: 'method',
  'config-key': 'configuration key',
};

export interface ReportBuilderOptions {
  thresholds?: LabelThresholds;
  maxEntitySuggestions?: number;
  maxTermSuggestions?: number;
}

/**
 * Entity-level findings that accompany the vocabulary gaps.
 */
export interface ReportExtras {
  documented?: readonly CodeEntity[];
  undocumented?: readonly CodeEntity[];
  staleSections?: readonly DocSection[];
  termHints?: readonly TermHint[];
}

/**
 * Map a 0-1 score to its label band.
 */
export function labelForScore(
  score: number,
  thresholds: LabelThresholds = DEFAULT_LABEL_THRESHOLDS
): AlignmentLabel {
  if (score > thresholds.production) return 'ProductionQuality';
  if (score > thresholds.high) return 'HighAlignment';
  if (score > thresholds.partial) return 'PartialAlignment';
  return 'PoorAlignment';
}

export class ReportBuilder {
  private readonly thresholds: LabelThresholds;
  private readonly maxEntitySuggestions: number;
  private readonly maxTermSuggestions: number;

  constructor(options: ReportBuilderOptions = {}) {
    this.thresholds = options.thresholds ?? DEFAULT_LABEL_THRESHOLDS;
    this.maxEntitySuggestions = options.maxEntitySuggestions ?? DEFAULT_MAX_ENTITY_SUGGESTIONS;
    this.maxTermSuggestions = options.maxTermSuggestions ?? DEFAULT_MAX_TERM_SUGGESTIONS;
  }

  /**
   * Build the report for a completed analysis.
   */
  build(
    score: number,
    gaps: GapSet,
    operationalGaps: readonly OperationalGap[],
    extras: ReportExtras = {}
  ): ConsistencyReport {
    const label = labelForScore(score, this.thresholds);
    const documented = extras.documented ?? [];
    const undocumented = extras.undocumented ?? [];
    const entityCount = documented.length + undocumented.length;

    return this.assemble({
      status: 'analyzed',
      score,
      label,
      summary: this.summarize(score, documented.length, entityCount),
      gaps,
      operationalGaps,
      extras,
      suggestions: this.suggest(gaps, operationalGaps, extras),
    });
  }

  /**
   * Build a zero-score report for a degenerate input. The message is both
   * the summary and the single suggestion. Gap and entity findings are
   * still carried when the caller has them.
   */
  buildDegenerate(
    status: Exclude<ReportStatus, 'analyzed'>,
    message: string,
    gaps: GapSet = emptyGapSet(),
    extras: ReportExtras = {}
  ): ConsistencyReport {
    return this.assemble({
      status,
      score: 0,
      label: 'PoorAlignment',
      summary: message,
      gaps,
      operationalGaps: [],
      extras,
      suggestions: [message],
    });
  }

  private assemble(parts: {
    status: ReportStatus;
    score: number;
    label: AlignmentLabel;
    summary: string;
    gaps: GapSet;
    operationalGaps: readonly OperationalGap[];
    extras: ReportExtras;
    suggestions: string[];
  }): ConsistencyReport {
    const documented = (parts.extras.documented ?? []).map((entity) => ({ ...entity }));
    const undocumented = (parts.extras.undocumented ?? []).map((entity) => ({ ...entity }));
    const staleSections = (parts.extras.staleSections ?? []).map((section) => ({ ...section }));
    const operationalGaps = parts.operationalGaps.map((gap) => ({
      trigger: gap.trigger,
      missingSynonyms: [...gap.missingSynonyms],
    }));
    const gaps = sortedGaps(parts.gaps);

    const countKind = (kind: EntityKind): number =>
      undocumented.filter((entity) => entity.kind === kind).length;
    const undocumentedByKind: Record<EntityKind, number> = {
      function: countKind('function'),
      class: countKind('class'),
      method: countKind('method'),
      'config-key': countKind('config-key'),
    };

    const report: ConsistencyReport = {
      status: parts.status,
      score: parts.score,
      percent: Math.round(parts.score * 100),
      label: parts.label,
      icon: LABEL_ICONS[parts.label],
      summary: parts.summary,
      stats: {
        issueCount: gaps.missingInDoc.length,
        syncedCount: gaps.common.length,
        entityCount: documented.length + undocumented.length,
        documentedEntityCount: documented.length,
        breakdown: {
          undocumentedEntities: undocumented.length,
          undocumentedByKind,
          zombieTerms: gaps.missingInCode.length,
          operationalGaps: operationalGaps.length,
          staleSections: staleSections.length,
        },
      },
      gaps,
      entities: { documented, undocumented },
      operationalGaps,
      staleSections,
      suggestions: [...parts.suggestions],
      visual: [gaps.common.length, gaps.missingInDoc.length, gaps.missingInCode.length],
    };

    return freezeDeep(report);
  }

  private summarize(score: number, documentedCount: number, entityCount: number): string {
    const percent = Math.round(score * 100);
    let detail: string;
    if (entityCount === 0) {
      detail = 'No code entities to check.';
    } else if (documentedCount === 0) {
      detail = `Critical gap: none of the ${entityCount} code entities are described in the documentation.`;
    } else if (documentedCount < entityCount) {
      detail = `Documentation debt: ${entityCount - documentedCount} of ${entityCount} code entities lack documentation.`;
    } else {
      detail = `All ${entityCount} code entities are referenced in the documentation.`;
    }
    return `${percent}% vocabulary alignment. ${detail}`;
  }

  /**
   * Suggestions in fixed order: operational gaps, undocumented entities,
   * then vocabulary-level advice.
   */
  private suggest(
    gaps: GapSet,
    operationalGaps: readonly OperationalGap[],
    extras: ReportExtras
  ): string[] {
    const suggestions: string[] = [];

    for (const gap of operationalGaps) {
      suggestions.push(
        `Code performs "${gap.trigger}" but the documentation never mentions it ` +
          `(expected one of: ${gap.missingSynonyms.slice(0, 3).join(', ')}).`
      );
    }

    for (const entity of (extras.undocumented ?? []).slice(0, this.maxEntitySuggestions)) {
      suggestions.push(`Document ${KIND_NAMES[entity.kind]} "${entity.name}"${location(entity)}.`);
    }

    const { common, missingInDoc, missingInCode } = sortedGaps(gaps);
    if (common.length === 0) {
      suggestions.push(
        'CRITICAL: No common vocabulary found. Rename identifiers to match domain terms or describe the code in its own terms.'
      );
    }
    if (missingInDoc.length > 0) {
      suggestions.push(
        `Document these code terms: ${missingInDoc.slice(0, this.maxTermSuggestions).join(', ')}`
      );
    }
    if (missingInCode.length > 0) {
      suggestions.push(
        `Documentation mentions terms absent from code (possibly stale): ${missingInCode
          .slice(0, this.maxTermSuggestions)
          .join(', ')}`
      );
    }
    for (const hint of (extras.termHints ?? []).slice(0, this.maxTermSuggestions)) {
      suggestions.push(
        `Documentation term "${hint.docTerm}" is close to code term "${hint.codeTerm}"; check for a rename.`
      );
    }
    for (const section of (extras.staleSections ?? []).slice(0, this.maxEntitySuggestions)) {
      suggestions.push(
        `Documentation section "${section.name}" describes no ${section.kind} in the code.`
      );
    }

    return suggestions;
  }
}

/**
 * Build a report with a one-off builder.
 */
export function buildReport(
  score: number,
  gaps: GapSet,
  operationalGaps: readonly OperationalGap[],
  extras?: ReportExtras,
  options?: ReportBuilderOptions
): ConsistencyReport {
  return new ReportBuilder(options).build(score, gaps, operationalGaps, extras);
}

export function emptyGapSet(): GapSet {
  return { common: new Set(), missingInDoc: new Set(), missingInCode: new Set() };
}

function location(entity: CodeEntity): string {
  if (!entity.origin) {
    return '';
  }
  return entity.line !== undefined ? ` (${entity.origin}:${entity.line})` : ` (${entity.origin})`;
}

function freezeDeep<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      freezeDeep(child);
    }
  }
  return value;
}
