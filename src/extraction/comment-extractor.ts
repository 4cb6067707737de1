/**
 * Pulls comments and docstrings out of code text.
 *
 * Comment text counts as documentation for gap purposes: an entity
 * explained in its own docstring is documented.
 */

// Alternatives are tried left to right at each offset, so a `/*` inside a
// single-line string literal is consumed as part of the string.
const BLOCK_OR_STRING =
  /("""|''')([\s\S]*?)\1|\/\*([\s\S]*?)\*\/|(["'`])(?:\\.|(?!\4)[^\\\n])*\4/g;
const LINE_COMMENT = /(?:#|(?<!:)\/\/)(.*)$/gm;

/**
 * Extract comment and docstring bodies, grouped by kind: block comments,
 * then triple-quoted strings, then line comments.
 *
 * Blocks are blanked out before line comments are scanned so a `#` inside
 * a docstring is not read twice. String literals are left in place but
 * never open a block comment.
 */
export function extractComments(code: string): string[] {
  if (!code) {
    return [];
  }

  const comments: string[] = [];
  const keep = (body: string): void => {
    const text = body
      .split('\n')
      .map((line) => line.replace(/^\s*\*+/, '').trim())
      .filter(Boolean)
      .join(' ');
    if (text) {
      comments.push(text);
    }
  };

  const docstrings: string[] = [];
  const remaining = code.replace(
    BLOCK_OR_STRING,
    (match: string, triple?: string, docstring?: string, block?: string) => {
      if (block !== undefined) {
        keep(block);
        return ' ';
      }
      if (triple !== undefined) {
        docstrings.push(docstring ?? '');
        return ' ';
      }
      return match;
    }
  );
  docstrings.forEach(keep);
  for (const match of remaining.matchAll(LINE_COMMENT)) {
    keep(match[1] ?? '');
  }

  return comments;
}
