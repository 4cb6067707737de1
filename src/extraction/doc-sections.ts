/**
 * Markdown section parser.
 *
 * Reads level-2 headings as documented items:
 *
 * - `## function: name` / `## class: Name` (explicit markers)
 * - `## def name(args)` (explicit, function)
 * - `## Name` (capitalized heading, class) / `## name` (function)
 *
 * Text under a heading up to the next `#` line becomes its description.
 * Sections without body text are dropped.
 */

import type { DocSection } from '../types/consistency.js';

const MARKED_HEADING = /^(function|class)\s*:\s*(.+)$/i;
const DEF_HEADING = /^def\s+([A-Za-z_]\w*)/;

interface OpenSection {
  name: string;
  kind: DocSection['kind'];
  explicit: boolean;
  buffer: string[];
}

export function parseDocSections(markdown: string, origin?: string): DocSection[] {
  const sections: DocSection[] = [];
  let current: OpenSection | null = null;

  const flush = (): void => {
    if (!current) return;
    const description = current.buffer.join('\n').trim();
    if (description) {
      sections.push({
        name: current.name,
        kind: current.kind,
        description,
        explicit: current.explicit,
        origin,
      });
    }
  };

  for (const line of markdown.split('\n')) {
    if (line.startsWith('## ')) {
      flush();
      current = parseHeading(line.slice(3).trim());
    } else if (current && !line.startsWith('#')) {
      current.buffer.push(line);
    }
  }
  flush();

  return sections;
}

function parseHeading(heading: string): OpenSection | null {
  if (!heading) {
    return null;
  }

  const marked = MARKED_HEADING.exec(heading);
  if (marked) {
    const kind = marked[1].toLowerCase() === 'class' ? 'class' : 'function';
    return { name: stripCode(marked[2]), kind, explicit: true, buffer: [] };
  }

  const def = DEF_HEADING.exec(heading);
  if (def) {
    return { name: def[1], kind: 'function', explicit: true, buffer: [] };
  }

  const name = stripCode(heading);
  const kind = /^[A-Z]/.test(name) ? 'class' : 'function';
  return { name, kind, explicit: false, buffer: [] };
}

function stripCode(text: string): string {
  return text.replace(/`/g, '').split('(')[0].trim();
}
