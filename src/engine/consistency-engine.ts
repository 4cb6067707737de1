/**
 * Consistency scoring engine.
 *
 * Pure and synchronous: two strings (or two lists of source files) in,
 * one frozen ConsistencyReport out. Configuration is injected at
 * construction and only read afterwards, so one engine can serve any
 * number of concurrent callers, and there is no shared default instance.
 *
 * `analyze` never throws. Blank input, code without entities and
 * internal failures all come back as reports with a non-`analyzed` status.
 *
 * @example
 * ```typescript
 * const engine = createEngine({ matching: 'word' });
 * const report = engine.analyze(codeText, readmeText);
 * console.log(`${report.icon} ${report.label}: ${report.percent}%`);
 * ```
 */

import type {
  CodeEntity,
  ConsistencyReport,
  DocSection,
  SourceLanguage,
} from '../types/consistency.js';
import { TextNormalizer, type NormalizerOptions } from '../normalization/text-normalizer.js';
import { uniqueEntityNames, type ExtractionOptions } from '../extraction/entity-extractor.js';
import { createExtractor, extractorForFile } from '../extraction/language.js';
import { extractComments } from '../extraction/comment-extractor.js';
import { extractReferences, type ReferenceMatching } from '../extraction/reference-extractor.js';
import { parseDocSections } from '../extraction/doc-sections.js';
import { buildTermVector, cosineSimilarity } from '../similarity/term-vector.js';
import { analyzeGaps, suggestCodeTerms } from '../analysis/gap-analyzer.js';
import {
  DEFAULT_OPERATIONAL_TRIGGERS,
  findOperationalGaps,
  type OperationalTriggerTable,
} from '../analysis/operational-alignment.js';
import {
  NO_CODE_MESSAGE,
  NO_DOC_MESSAGE,
  NO_LOGIC_MESSAGE,
  ReportBuilder,
  type ReportBuilderOptions,
} from '../report/report-builder.js';

export interface EngineOptions {
  normalizer?: NormalizerOptions;
  extraction?: ExtractionOptions;
  /** Extractor used by `analyze` for raw text (default: generic) */
  language?: SourceLanguage;
  matching?: ReferenceMatching;
  operationalTriggers?: OperationalTriggerTable;
  report?: ReportBuilderOptions;
}

/**
 * One input file: a path (used for language detection and reporting)
 * and its decoded text.
 */
export interface SourceText {
  path: string;
  content: string;
}

const MARKDOWN_FILE = /\.(md|markdown)$/i;

interface AnalysisInput {
  codeText: string;
  docText: string;
  entities: readonly CodeEntity[];
  sections: readonly DocSection[];
}

export class ConsistencyEngine {
  private readonly normalizer: TextNormalizer;
  private readonly builder: ReportBuilder;
  private readonly extraction: ExtractionOptions;
  private readonly language: SourceLanguage;
  private readonly matching: ReferenceMatching;
  private readonly triggers: OperationalTriggerTable;

  constructor(options: EngineOptions = {}) {
    this.normalizer = new TextNormalizer(options.normalizer);
    this.builder = new ReportBuilder(options.report);
    this.extraction = options.extraction ?? {};
    this.language = options.language ?? 'generic';
    this.matching = options.matching ?? 'substring';
    this.triggers = options.operationalTriggers ?? DEFAULT_OPERATIONAL_TRIGGERS;
  }

  /**
   * Analyze raw code text against raw documentation text.
   */
  analyze(codeText: string, docText: string): ConsistencyReport {
    try {
      const entities = createExtractor(this.language, this.extraction).extract(codeText);
      return this.run({ codeText, docText, entities, sections: parseDocSections(docText) });
    } catch (err) {
      return this.failure(err);
    }
  }

  /**
   * Analyze per-file sources. Each code file is scanned with the extractor
   * for its language and entities are tagged with their file; markdown
   * docs contribute section headings for stale-section detection.
   */
  analyzeSources(code: readonly SourceText[], docs: readonly SourceText[]): ConsistencyReport {
    try {
      const entities = code.flatMap((file) =>
        extractorForFile(file.path, this.extraction).extract(file.content, file.path)
      );
      const sections = docs
        .filter((file) => MARKDOWN_FILE.test(file.path))
        .flatMap((file) => parseDocSections(file.content, file.path));

      return this.run({
        codeText: code.map((file) => file.content).join('\n'),
        docText: docs.map((file) => file.content).join('\n'),
        entities,
        sections,
      });
    } catch (err) {
      return this.failure(err);
    }
  }

  private run({ codeText, docText, entities, sections }: AnalysisInput): ConsistencyReport {
    if (!codeText.trim()) {
      return this.builder.buildDegenerate('no-input', NO_CODE_MESSAGE);
    }

    const unique = firstByName(entities);
    if (unique.length === 0) {
      return this.builder.buildDegenerate('no-logic', NO_LOGIC_MESSAGE);
    }

    const pool = extractReferences(docText, extractComments(codeText), {
      matching: this.matching,
    });
    const documented = unique.filter((entity) => pool.references(entity.name));
    const undocumented = unique.filter((entity) => !pool.references(entity.name));

    const codeTokens = this.normalizer.normalize(codeText);
    const docTokens = this.normalizer.normalize(docText);
    const gaps = analyzeGaps(codeTokens, docTokens);

    if (!docText.trim()) {
      return this.builder.buildDegenerate('no-input', NO_DOC_MESSAGE, gaps, {
        documented,
        undocumented,
      });
    }

    const score = cosineSimilarity(buildTermVector(codeTokens), buildTermVector(docTokens));
    const operationalGaps = findOperationalGaps(codeTokens, docTokens, this.triggers);

    const entityNames = new Set(unique.map((entity) => entity.name.toLowerCase()));
    const staleSections = sections.filter(
      (section) => section.explicit && !entityNames.has(section.name.toLowerCase())
    );

    return this.builder.build(score, gaps, operationalGaps, {
      documented,
      undocumented,
      staleSections,
      termHints: suggestCodeTerms(gaps.missingInCode, gaps.missingInDoc),
    });
  }

  private failure(err: unknown): ConsistencyReport {
    const message = err instanceof Error ? err.message : String(err);
    return this.builder.buildDegenerate('error', `Analysis failed: ${message}`);
  }
}

/**
 * Create an engine with injected configuration.
 */
export function createEngine(options?: EngineOptions): ConsistencyEngine {
  return new ConsistencyEngine(options);
}

/**
 * Keep the first entity for each case-insensitive name.
 */
function firstByName(entities: readonly CodeEntity[]): CodeEntity[] {
  const names = new Set(uniqueEntityNames(entities));
  const kept: CodeEntity[] = [];
  for (const entity of entities) {
    if (names.delete(entity.name)) {
      kept.push(entity);
    }
  }
  return kept;
}
