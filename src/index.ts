// Types
export type {
  EntityKind,
  CodeEntity,
  SourceLanguage,
  TermVector,
  GapSet,
  OperationalGap,
  DocSection,
  AlignmentLabel,
  ReportStatus,
  LabelThresholds,
  ReportBreakdown,
  ReportStats,
  VocabularyGaps,
  ConsistencyReport,
} from './types/consistency.js';
export { ENTITY_KINDS, ALIGNMENT_LABELS } from './types/consistency.js';

// Normalization
export {
  TextNormalizer,
  normalize,
  splitCamelCase,
  DEFAULT_PUNCTUATION,
} from './normalization/text-normalizer.js';
export type { NormalizerOptions } from './normalization/text-normalizer.js';
export { loadStopwords, getDefaultStopwords, getDefaultStopwordsPath } from './normalization/stopwords.js';

// Extraction
export {
  LexicalEntityExtractor,
  extractEntities,
  uniqueEntityNames,
  DEFAULT_ENTITY_PATTERNS,
  DEFAULT_IGNORED_NAMES,
  DEFAULT_MIN_NAME_LENGTH,
} from './extraction/entity-extractor.js';
export type { EntityExtractor, ExtractionOptions, EntityPattern } from './extraction/entity-extractor.js';
export { PythonEntityExtractor } from './extraction/extractors/python-extractor.js';
export { TypeScriptEntityExtractor } from './extraction/extractors/typescript-extractor.js';
export { detectLanguage, createExtractor, extractorForFile } from './extraction/language.js';
export { extractComments } from './extraction/comment-extractor.js';
export { ReferencePool, extractReferences } from './extraction/reference-extractor.js';
export type { ReferenceMatching, ReferenceOptions } from './extraction/reference-extractor.js';
export { parseDocSections } from './extraction/doc-sections.js';

// Similarity
export {
  countTerms,
  buildTermVector,
  vectorNorm,
  cosineSimilarity,
  similarity,
} from './similarity/term-vector.js';

// Analysis
export { analyzeGaps, suggestCodeTerms, sortedGaps } from './analysis/gap-analyzer.js';
export type { TermHint } from './analysis/gap-analyzer.js';
export {
  DEFAULT_OPERATIONAL_TRIGGERS,
  findOperationalGaps,
  checkOperationalAlignment,
} from './analysis/operational-alignment.js';
export type { OperationalTriggerTable } from './analysis/operational-alignment.js';

// Report
export {
  ReportBuilder,
  buildReport,
  labelForScore,
  emptyGapSet,
  DEFAULT_LABEL_THRESHOLDS,
  LABEL_ICONS,
} from './report/report-builder.js';
export type { ReportBuilderOptions, ReportExtras } from './report/report-builder.js';
export { ReportFormatter } from './report/report-formatter.js';
export type { FormatOptions } from './report/report-formatter.js';

// Engine
export { ConsistencyEngine, createEngine } from './engine/consistency-engine.js';
export type { EngineOptions, SourceText } from './engine/consistency-engine.js';

// Configuration
export {
  EngineConfigSchema,
  DEFAULT_ENGINE_CONFIG,
  ConfigError,
  DEFAULT_CONFIG_PATH,
  readEngineConfig,
  validateEngineConfig,
  toEngineOptions,
} from './config/index.js';
export type { EngineConfig } from './config/index.js';

// File collection
export { collectSources, flattenFrontmatter } from './cli/source-loader.js';
export type { SourceKind } from './cli/source-loader.js';
