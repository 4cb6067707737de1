/**
 * Picks an EntityExtractor implementation per language family.
 */

import { extname } from 'path';
import type { SourceLanguage } from '../types/consistency.js';
import {
  LexicalEntityExtractor,
  type EntityExtractor,
  type ExtractionOptions,
} from './entity-extractor.js';
import { PythonEntityExtractor } from './extractors/python-extractor.js';
import { TypeScriptEntityExtractor } from './extractors/typescript-extractor.js';

const EXTENSION_LANGUAGES: Readonly<Record<string, SourceLanguage>> = {
  '.py': 'python',
  '.pyw': 'python',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.js': 'typescript',
  '.jsx': 'typescript',
  '.mjs': 'typescript',
  '.cjs': 'typescript',
};

/**
 * Detect the language family of a file from its extension.
 * Unknown or missing extensions map to `generic`.
 */
export function detectLanguage(filePath: string): SourceLanguage {
  return EXTENSION_LANGUAGES[extname(filePath).toLowerCase()] ?? 'generic';
}

/**
 * Create the extractor for a language family.
 */
export function createExtractor(
  language: SourceLanguage,
  options: ExtractionOptions = {}
): EntityExtractor {
  switch (language) {
    case 'python':
      return new PythonEntityExtractor(options);
    case 'typescript':
      return new TypeScriptEntityExtractor(options);
    case 'generic':
      return new LexicalEntityExtractor(options);
  }
}

/**
 * Create the extractor matching a file's extension.
 */
export function extractorForFile(filePath: string, options: ExtractionOptions = {}): EntityExtractor {
  return createExtractor(detectLanguage(filePath), options);
}
