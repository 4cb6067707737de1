/**
 * Collects code and documentation files for the CLI.
 *
 * Walks a file or directory, keeps files whose extension matches the
 * requested kind and returns their text in path order. Markdown files
 * are read through gray-matter so string frontmatter values count as
 * documentation text alongside the body.
 *
 * @module cli/source-loader
 */

import { readdir, readFile, stat } from 'fs/promises';
import { extname, join } from 'path';
import matter from 'gray-matter';
import type { SourceText } from '../engine/consistency-engine.js';

export type SourceKind = 'code' | 'docs';

/** Directories never descended into. */
export const EXCLUDED_DIRS: ReadonlySet<string> = new Set([
  '.git',
  'node_modules',
  '.venv',
  'venv',
  '__pycache__',
  'site-packages',
  'dist',
]);

export const CODE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.py', '.js', '.jsx', '.ts', '.tsx', '.mjs', '.cjs',
  '.java', '.go', '.rs', '.rb', '.cs', '.cpp', '.c', '.h',
]);

export const DOC_EXTENSIONS: ReadonlySet<string> = new Set(['.md', '.markdown', '.txt', '.rst']);

const MARKDOWN_EXTENSIONS: ReadonlySet<string> = new Set(['.md', '.markdown']);

/**
 * Collect every matching file under `target`.
 *
 * A path naming a single file is returned as-is, whatever its extension.
 * Missing paths reject with the underlying fs error.
 */
export async function collectSources(target: string, kind: SourceKind): Promise<SourceText[]> {
  const info = await stat(target);
  const paths = info.isDirectory() ? await walk(target, kind) : [target];

  const sources: SourceText[] = [];
  for (const path of paths) {
    const raw = await readFile(path, 'utf-8');
    const content = kind === 'docs' && isMarkdown(path) ? flattenFrontmatter(raw) : raw;
    sources.push({ path, content });
  }
  return sources;
}

/**
 * Replace a YAML frontmatter block with its string values, one per line,
 * followed by the body.
 */
export function flattenFrontmatter(markdown: string): string {
  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(markdown);
  } catch {
    // Malformed frontmatter: keep the raw text
    return markdown;
  }

  const values = Object.values(parsed.data).flatMap(frontmatterText);
  return values.length > 0 ? `${values.join('\n')}\n${parsed.content}` : parsed.content;
}

function frontmatterText(value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

async function walk(dir: string, kind: SourceKind): Promise<string[]> {
  const extensions = kind === 'code' ? CODE_EXTENSIONS : DOC_EXTENSIONS;
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!EXCLUDED_DIRS.has(entry.name)) {
        files.push(...(await walk(fullPath, kind)));
      }
    } else if (entry.isFile() && extensions.has(extname(entry.name).toLowerCase())) {
      files.push(fullPath);
    }
  }
  return files;
}

function isMarkdown(path: string): boolean {
  return MARKDOWN_EXTENSIONS.has(extname(path).toLowerCase());
}
