/**
 * Zod schema for the docsync configuration file.
 *
 * Every field has a `.default()` so that `EngineConfigSchema.parse({})`
 * returns a complete config. Users can provide a partial file, or none
 * at all, and get the reference behavior.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { DEFAULT_IGNORED_NAMES, DEFAULT_MIN_NAME_LENGTH } from '../extraction/entity-extractor.js';
import { DEFAULT_OPERATIONAL_TRIGGERS } from '../analysis/operational-alignment.js';
import {
  DEFAULT_LABEL_THRESHOLDS,
  DEFAULT_MAX_ENTITY_SUGGESTIONS,
  DEFAULT_MAX_TERM_SUGGESTIONS,
} from '../report/report-builder.js';

// ============================================================================
// Label Bands
// ============================================================================

/**
 * Exclusive lower bounds of the label bands. Must be strictly decreasing
 * so every score maps to exactly one label.
 */
const LabelsSchema = z
  .object({
    production: z.number().min(0).max(1).default(DEFAULT_LABEL_THRESHOLDS.production),
    high: z.number().min(0).max(1).default(DEFAULT_LABEL_THRESHOLDS.high),
    partial: z.number().min(0).max(1).default(DEFAULT_LABEL_THRESHOLDS.partial),
  })
  .refine((labels) => labels.production > labels.high && labels.high > labels.partial, {
    message: 'Label thresholds must be strictly decreasing: production > high > partial',
  });

// ============================================================================
// Suggestions
// ============================================================================

const SuggestionsSchema = z.object({
  max_entities: z.number().int().min(0).max(100).default(DEFAULT_MAX_ENTITY_SUGGESTIONS),
  max_terms: z.number().int().min(0).max(100).default(DEFAULT_MAX_TERM_SUGGESTIONS),
});

// ============================================================================
// Normalizer and Extraction
// ============================================================================

const NormalizerSchema = z.object({
  extra_stopwords: z.array(z.string()).default([]),
  split_identifiers: z.boolean().default(false),
});

const ExtractionSchema = z.object({
  min_name_length: z.number().int().min(1).max(20).default(DEFAULT_MIN_NAME_LENGTH),
  ignored_names: z.array(z.string()).default(() => [...DEFAULT_IGNORED_NAMES]),
});

// ============================================================================
// CI Gate
// ============================================================================

/**
 * `check` fails when the raw score is below `threshold`.
 */
const CiSchema = z.object({
  threshold: z.number().min(0).max(1).default(0.15),
});

// ============================================================================
// Composite Config
// ============================================================================

export const EngineConfigSchema = z.object({
  language: z.enum(['generic', 'python', 'typescript']).default('generic'),
  matching: z.enum(['substring', 'word']).default('substring'),
  labels: LabelsSchema.default(() => ({ ...DEFAULT_LABEL_THRESHOLDS })),
  suggestions: SuggestionsSchema.default(() => ({
    max_entities: DEFAULT_MAX_ENTITY_SUGGESTIONS,
    max_terms: DEFAULT_MAX_TERM_SUGGESTIONS,
  })),
  normalizer: NormalizerSchema.default(() => ({
    extra_stopwords: [],
    split_identifiers: false,
  })),
  extraction: ExtractionSchema.default(() => ({
    min_name_length: DEFAULT_MIN_NAME_LENGTH,
    ignored_names: [...DEFAULT_IGNORED_NAMES],
  })),
  operational_triggers: z
    .record(z.string(), z.array(z.string()))
    .default(() =>
      Object.fromEntries(
        Object.entries(DEFAULT_OPERATIONAL_TRIGGERS).map(
          ([trigger, synonyms]): [string, string[]] => [trigger, [...synonyms]]
        )
      )
    ),
  ci: CiSchema.default(() => ({ threshold: 0.15 })),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Default config produced by parsing an empty object.
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});
