/**
 * Indentation-aware extractor for Python sources.
 *
 * Tracks the enclosing block of each `def` so methods are told apart
 * from top-level and nested functions, skips triple-quoted strings, and
 * only reports quoted dict keys and module-level UPPER_CASE constants as
 * configuration keys.
 */

import type { CodeEntity, SourceLanguage } from '../../types/consistency.js';
import {
  EntityCollector,
  type EntityExtractor,
  type ExtractionOptions,
} from '../entity-extractor.js';

const DEF_LINE = /^(?:async\s+)?def\s+([A-Za-z_]\w*)/;
const CLASS_LINE = /^class\s+([A-Za-z_]\w*)/;
const MODULE_CONSTANT = /^([A-Z][A-Z0-9_]+)\s*(?::[^=]*)?=(?!=)/;
const QUOTED_KEY = /(['"])([\w-]+)\1\s*:/g;

interface Block {
  indent: number;
  type: 'class' | 'def';
}

export class PythonEntityExtractor implements EntityExtractor {
  readonly language: SourceLanguage = 'python';

  constructor(private readonly options: ExtractionOptions = {}) {}

  extract(code: string, origin?: string): CodeEntity[] {
    const collector = new EntityCollector(origin, this.options);
    const blocks: Block[] = [];
    let openString: string | null = null;

    code.split('\n').forEach((rawLine, index) => {
      const lineNumber = index + 1;

      if (openString) {
        openString = unclosedDelimiter(rawLine, openString);
        return;
      }

      const stripped = rawLine.trimStart();
      if (!stripped || stripped.startsWith('#')) {
        return;
      }

      const indent = rawLine.length - stripped.length;
      while (blocks.length > 0 && blocks[blocks.length - 1].indent >= indent) {
        blocks.pop();
      }

      const classMatch = CLASS_LINE.exec(stripped);
      const defMatch = DEF_LINE.exec(stripped);
      if (classMatch) {
        collector.add(classMatch[1], 'class', lineNumber);
        blocks.push({ indent, type: 'class' });
      } else if (defMatch) {
        const parent = blocks[blocks.length - 1];
        collector.add(defMatch[1], parent?.type === 'class' ? 'method' : 'function', lineNumber);
        blocks.push({ indent, type: 'def' });
      } else if (indent === 0) {
        const constant = MODULE_CONSTANT.exec(stripped);
        if (constant) {
          collector.add(constant[1], 'config-key', lineNumber);
        }
      }

      for (const match of stripped.matchAll(QUOTED_KEY)) {
        collector.add(match[2], 'config-key', lineNumber);
      }

      openString = unclosedDelimiter(stripped);
    });

    return collector.toArray();
  }
}

/**
 * Return the triple-quote delimiter left open at the end of a line, if any.
 * Single-line string literals and `#` comments are skipped, so a triple
 * quote inside either does not open a docstring.
 */
function unclosedDelimiter(line: string, open: string | null = null): string | null {
  let index = 0;
  while (index < line.length) {
    if (open) {
      const close = line.indexOf(open, index);
      if (close === -1) {
        return open;
      }
      index = close + 3;
      open = null;
      continue;
    }

    const char = line[index];
    if (char === '#') {
      return null;
    }
    if (char === '"' || char === "'") {
      const triple = line.slice(index, index + 3);
      if (triple === '"""' || triple === "'''") {
        open = triple;
        index += 3;
        continue;
      }
      index = endOfLiteral(line, index);
      continue;
    }
    index++;
  }
  return open;
}

/**
 * Index just past the single-line literal starting at `start`, or the end
 * of the line when the literal is unterminated.
 */
function endOfLiteral(line: string, start: number): number {
  const quote = line[start];
  let index = start + 1;
  while (index < line.length) {
    if (line[index] === '\\') {
      index += 2;
    } else if (line[index] === quote) {
      return index + 1;
    } else {
      index++;
    }
  }
  return line.length;
}
