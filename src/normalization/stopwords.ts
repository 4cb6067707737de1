import { z } from 'zod';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

// ============================================================================
// Stopword List Schema
// ============================================================================

/**
 * Schema for config/stopwords.json.
 *
 * `english` holds generic function words, `software` holds nouns that
 * appear in almost every codebase and carry no domain meaning.
 */
export const StopwordListSchema = z.object({
  english: z.array(z.string()),
  software: z.array(z.string()),
});

export type StopwordList = z.infer<typeof StopwordListSchema>;

let defaultStopwords: ReadonlySet<string> | undefined;

/**
 * Path of the bundled stopword list, relative to this module.
 */
export function getDefaultStopwordsPath(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  return join(__dirname, '..', '..', 'config', 'stopwords.json');
}

/**
 * Load and validate a stopword list file.
 *
 * @throws Error if the file is missing, is not JSON, or fails validation
 */
export function loadStopwords(path: string): ReadonlySet<string> {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch {
    throw new Error(`Failed to read stopword list: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in stopword list: ${path}`);
  }

  const result = StopwordListSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid stopword list: ${errors}`);
  }

  return new Set(
    [...result.data.english, ...result.data.software].map((word) => word.toLowerCase())
  );
}

/**
 * Bundled stopwords, read once and shared read-only.
 */
export function getDefaultStopwords(): ReadonlySet<string> {
  if (!defaultStopwords) {
    defaultStopwords = loadStopwords(getDefaultStopwordsPath());
  }
  return defaultStopwords;
}
