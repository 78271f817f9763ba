/**
 * Markdown preprocessors for md2wiki
 *
 * These run BEFORE markdown-it parses the document.
 * markdown-it follows CommonMark, where a nested list item must be indented
 * past its parent's content; hand-written documents often nest with two
 * spaces per level instead. The normalizer rewrites such lists to four spaces
 * per level and leaves everything else alone.
 */

/** Lines inspected before and after the current line when guessing the indentation system */
export const INDENT_WINDOW = 5;

/** Lines scanned backwards when deciding whether a line continues a list item */
export const CONTINUATION_SCAN_LIMIT = 4;

const BULLET_MARKERS = ['* ', '- ', '+ '] as const;
const FENCE_MARKERS = ['```', '~~~'] as const;
const ADMONITION_MARKER = '!!!';

function leadingWhitespace(line: string): number {
  return line.length - line.trimStart().length;
}

function isBlank(line: string): boolean {
  return line.trim() === '';
}

function startsWithBullet(stripped: string): boolean {
  return BULLET_MARKERS.some((marker) => stripped.startsWith(marker));
}

/**
 * Ordered list item such as `1. first` or `10. tenth`
 * (a digit followed by ". " somewhere in the first ten characters)
 */
function startsWithOrdinal(stripped: string): boolean {
  return /^\d/.test(stripped) && stripped.slice(0, 10).includes('. ');
}

/**
 * Check whether the lines around `index` appear to use two spaces per list level
 *
 * Looks at bullet lines in the window `[index - 5, index + 5)`. A single
 * indentation that is even but not a multiple of four (2, 6, 10, ...) counts
 * as decisive evidence, even when the other bullets are four-space aligned.
 *
 * @example
 * looksLike2SpaceSystem(['- a', '  - b', '  - c'], 2) // => true
 * looksLike2SpaceSystem(['- a', '    - b'], 1) // => false
 */
export function looksLike2SpaceSystem(lines: readonly string[], index: number): boolean {
  const start = Math.max(0, index - INDENT_WINDOW);
  const end = Math.min(lines.length, index + INDENT_WINDOW);

  const indents: number[] = [];
  for (let i = start; i < end; i++) {
    const line = lines[i];
    if (isBlank(line) || !startsWithBullet(line.trimStart())) continue;

    const spaces = leadingWhitespace(line);
    if (spaces > 0) {
      indents.push(spaces);
    }
  }

  if (indents.length === 0) return false;

  return indents.some((spaces) => spaces % 2 === 0 && spaces % 4 !== 0);
}

/**
 * Check whether the line at `index` continues a list item
 *
 * Scans up to four lines backwards: a bullet line means yes, an unindented
 * non-blank line (a paragraph boundary) means no.
 */
export function isListContinuation(lines: readonly string[], index: number): boolean {
  if (index === 0) return false;

  const stop = Math.max(-1, index - 1 - CONTINUATION_SCAN_LIMIT);
  for (let i = index - 1; i > stop; i--) {
    const line = lines[i];
    if (isBlank(line)) continue;

    if (startsWithBullet(line.trimStart())) return true;
    if (leadingWhitespace(line) === 0) return false;
  }

  return false;
}

/**
 * Rewrite two-space list indentation to four-space indentation
 *
 * - 2 spaces → 4 spaces
 * - 4 spaces → 8 spaces
 * - 6 spaces → 12 spaces
 *
 * Fenced code blocks, admonition bodies, headings, quotes and indentation
 * outside a two-space list pass through byte-for-byte. The result has the
 * same number of lines as the input.
 */
export function normalizeListIndentation(content: string): string {
  const lines = content.split('\n');
  const result: string[] = [];
  let inCodeBlock = false;
  let inAdmonition = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (isBlank(line)) {
      result.push(line);
      continue;
    }

    const stripped = line.trimStart();

    if (FENCE_MARKERS.some((marker) => stripped.startsWith(marker))) {
      inCodeBlock = !inCodeBlock;
      result.push(line);
      continue;
    }

    if (inCodeBlock) {
      result.push(line);
      continue;
    }

    if (stripped.startsWith(ADMONITION_MARKER)) {
      inAdmonition = true;
      result.push(line);
      continue;
    }

    const spaces = leadingWhitespace(line);

    // First unindented line closes the admonition body
    if (inAdmonition && spaces === 0) {
      inAdmonition = false;
    }

    if (
      spaces === 0 ||
      stripped.startsWith('`') ||
      stripped.startsWith('#') ||
      stripped.startsWith('>') ||
      inAdmonition
    ) {
      result.push(line);
      continue;
    }

    if (
      spaces % 2 === 0 &&
      looksLike2SpaceSystem(lines, i) &&
      (startsWithBullet(stripped) ||
        startsWithOrdinal(stripped) ||
        isListContinuation(lines, i))
    ) {
      result.push(' '.repeat((spaces / 2) * 4) + stripped);
    } else {
      result.push(line);
    }
  }

  return result.join('\n');
}
