/**
 * Config file reader with Zod validation.
 *
 * Reads `.docsync.json`, parses it through the schema and returns a fully
 * populated config. A missing file means all defaults; invalid input
 * raises ConfigError naming the first offending field.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import { EngineConfigSchema, DEFAULT_ENGINE_CONFIG, type EngineConfig } from './schema.js';
import type { EngineOptions } from '../engine/consistency-engine.js';

/** Default path for the config file. */
export const DEFAULT_CONFIG_PATH = '.docsync.json';

/**
 * Error thrown when config reading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read and validate the config from disk.
 *
 * - Missing file (ENOENT): all defaults.
 * - Invalid JSON: ConfigError.
 * - Schema violation: ConfigError listing every issue as `path: message`.
 * - Any other read error propagates.
 */
export async function readEngineConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<EngineConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return DEFAULT_ENGINE_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Config validation failed:\n${formatIssues(result.error.issues).join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return result.data;
}

/**
 * Validate raw input against the schema (no I/O).
 */
export function validateEngineConfig(
  raw: unknown,
): { valid: true; config: EngineConfig } | { valid: false; errors: string[] } {
  const result = EngineConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return { valid: false, errors: formatIssues(result.error.issues) };
}

/**
 * Map the file format (snake_case) onto engine options.
 */
export function toEngineOptions(config: EngineConfig): EngineOptions {
  return {
    language: config.language,
    matching: config.matching,
    normalizer: {
      extraStopwords: config.normalizer.extra_stopwords,
      splitIdentifiers: config.normalizer.split_identifiers,
    },
    extraction: {
      minNameLength: config.extraction.min_name_length,
      ignoredNames: config.extraction.ignored_names,
    },
    operationalTriggers: config.operational_triggers,
    report: {
      thresholds: config.labels,
      maxEntitySuggestions: config.suggestions.max_entities,
      maxTermSuggestions: config.suggestions.max_terms,
    },
  };
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}
