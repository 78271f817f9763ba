/**
 * Markdown-it plugins for md2wiki
 *
 * These are registered by createEngine() and run on the normalized text
 * (unlike the preprocessor functions, which run before parsing).
 */

import type MarkdownIt from 'markdown-it';
import type StateBlock from 'markdown-it/lib/rules_block/state_block';
import type StateInline from 'markdown-it/lib/rules_inline/state_inline';
import emoji from 'markdown-it-emoji';
import { encodeCodepoints, type WikiRenderer } from './renderer';

/**
 * Fence info string split into language and attribute list
 */
export interface FenceInfo {
  language: string;
  id: string;
  classes: string[];
  attrs: Record<string, string>;
}

/**
 * Parse a fence info string with an optional attribute list
 *
 * Syntax: language[ {#id .class key=value key="quoted value"}]
 *
 * Anything that cannot be attributed is ignored; missing values are empty.
 *
 * @example
 * parseFenceInfo('math {#eq1 .wide data-size=2}')
 * // => { language: 'math', id: 'eq1', classes: ['wide'], attrs: { 'data-size': '2' } }
 */
export function parseFenceInfo(info: string): FenceInfo {
  const trimmed = info.trim();
  const result: FenceInfo = { language: '', id: '', classes: [], attrs: {} };

  const languageMatch = trimmed.match(/^[^\s{]+/);
  if (languageMatch) {
    result.language = languageMatch[0];
  }

  const braceStart = trimmed.indexOf('{');
  if (braceStart === -1) return result;

  const braceEnd = trimmed.indexOf('}', braceStart);
  const body = trimmed.slice(braceStart + 1, braceEnd === -1 ? undefined : braceEnd);

  const attributeRegex = /#([\w-]+)|\.([\w-]+)|([\w-]+)=(?:"([^"]*)"|'([^']*)'|([^\s"']*))/g;
  for (const match of body.matchAll(attributeRegex)) {
    const [, id, className, key, doubleQuoted, singleQuoted, bare] = match;
    if (id !== undefined) {
      result.id = id;
    } else if (className !== undefined) {
      result.classes.push(className);
    } else if (key !== undefined) {
      result.attrs[key] = doubleQuoted ?? singleQuoted ?? bare ?? '';
    }
  }

  return result;
}

/**
 * Custom fence definition: fences with this language are handed to the renderer
 */
export interface CustomFence {
  name: string;
  cssClass: string;
}

/**
 * Custom fences plugin for markdown-it
 *
 * Fences whose language matches one of `fences` are rendered by
 * `renderer.fence()`; all other fences keep markdown-it's default output.
 *
 * Syntax: ```math {#id .class key=value}
 */
export function customFencesPlugin(
  md: MarkdownIt,
  options: { fences: readonly CustomFence[]; renderer: WikiRenderer },
): void {
  const defaultFence = md.renderer.rules.fence;

  md.renderer.rules.fence = function (tokens, idx, opts, env, self): string {
    const token = tokens[idx];
    const info = parseFenceInfo(token.info);
    const fence = options.fences.find((f) => f.name === info.language);

    if (!fence) {
      return defaultFence
        ? defaultFence(tokens, idx, opts, env, self)
        : self.renderToken(tokens, idx, opts);
    }

    const html = options.renderer.fence({
      source: token.content.replace(/\n$/, ''),
      language: info.language,
      cssClass: fence.cssClass,
      id: info.id,
      classes: info.classes,
      attrs: info.attrs,
    });
    return `${html}\n`;
  };
}

/**
 * Admonition header parsed from a `!!!` line
 */
export interface AdmonitionHeader {
  /** Space-separated, lower-cased type and extra classes, e.g. `note` or `danger highlight` */
  kind: string;
  /** Title paragraph text; null when the author asked for no title with `""` */
  title: string | null;
}

/**
 * Parse an admonition header line
 *
 * @example
 * parseAdmonitionHeader('!!! note') // => { kind: 'note', title: 'Note' }
 * parseAdmonitionHeader('!!! tip "Read me"') // => { kind: 'tip', title: 'Read me' }
 * parseAdmonitionHeader('!!! warning ""') // => { kind: 'warning', title: null }
 */
export function parseAdmonitionHeader(line: string): AdmonitionHeader | null {
  const match = line.match(/^!!! ?([\w-]+(?: +[\w-]+)*)(?: +"(.*?)")? *$/);
  if (!match) return null;

  const kind = match[1].toLowerCase();
  const rawTitle = match[2];

  if (rawTitle === undefined) {
    const first = kind.split(' ')[0];
    return { kind, title: first.charAt(0).toUpperCase() + first.slice(1) };
  }

  return { kind, title: rawTitle === '' ? null : rawTitle };
}

/**
 * Admonition plugin for markdown-it
 *
 * Syntax: !!! type ["Title"]
 *             body indented by four spaces
 *
 * Output: <div class="admonition type"><p class="admonition-title">Title</p>...</div>
 */
export function admonitionPlugin(md: MarkdownIt): void {
  function admonition(
    state: StateBlock,
    startLine: number,
    endLine: number,
    silent: boolean,
  ): boolean {
    if (state.sCount[startLine] - state.blkIndent >= 4) {
      return false;
    }

    const start = state.bMarks[startLine] + state.tShift[startLine];
    const max = state.eMarks[startLine];
    const header = parseAdmonitionHeader(state.src.slice(start, max));
    if (!header) {
      return false;
    }

    if (silent) {
      return true;
    }

    const bodyIndent = state.blkIndent + 4;
    let lastBodyLine = startLine;
    for (let nextLine = startLine + 1; nextLine < endLine; nextLine++) {
      if (state.isEmpty(nextLine)) {
        continue;
      }
      if (state.sCount[nextLine] < bodyIndent) {
        break;
      }
      lastBodyLine = nextLine;
    }
    const bodyEnd = lastBodyLine + 1;

    const token_o = state.push('admonition_open', 'div', 1);
    token_o.markup = '!!!';
    token_o.block = true;
    token_o.info = header.kind;
    token_o.map = [startLine, bodyEnd];
    token_o.attrSet('class', `admonition ${header.kind}`);

    if (header.title !== null) {
      const title_o = state.push('admonition_title_open', 'p', 1);
      title_o.block = true;
      title_o.attrSet('class', 'admonition-title');

      const inline = state.push('inline', '', 0);
      inline.content = header.title;
      inline.map = [startLine, startLine + 1];
      inline.children = [];

      const title_c = state.push('admonition_title_close', 'p', -1);
      title_c.block = true;
    }

    const old_line_max = state.lineMax;
    const old_indent = state.blkIndent;
    state.lineMax = bodyEnd;
    state.blkIndent = bodyIndent;

    state.md.block.tokenize(state, startLine + 1, bodyEnd);

    state.blkIndent = old_indent;
    state.lineMax = old_line_max;

    const token_c = state.push('admonition_close', 'div', -1);
    token_c.markup = '!!!';
    token_c.block = true;

    state.line = bodyEnd;
    return true;
  }

  md.block.ruler.before('fence', 'admonition', admonition, {
    alt: ['paragraph', 'reference', 'blockquote', 'list'],
  });
}

/**
 * Options for an inline span delimited by a marker on both sides
 */
export interface SpanOptions {
  /** Token type prefix, e.g. `mark` produces `mark_open`/`mark_close` */
  name: string;
  /** Delimiter, e.g. `==` or `^` */
  marker: string;
  /** HTML tag */
  tag: string;
  /** Whether the content may contain unescaped whitespace */
  allowSpaces: boolean;
}

/**
 * Inline span plugin for markdown-it
 *
 * Covers ==mark==, ^^insert^^, ^superscript^ and ~subscript~. A single-char
 * marker never matches where it is doubled, so ~~strikethrough~~ keeps
 * working and ^^insert^^ is not read as an empty superscript.
 */
export function spanPlugin(md: MarkdownIt, options: SpanOptions): void {
  const { name, marker, tag, allowSpaces } = options;
  const single = marker.length === 1;

  function isMarkerAt(src: string, pos: number): boolean {
    if (!src.startsWith(marker, pos)) return false;
    return !single || (src[pos + 1] !== marker && src[pos - 1] !== marker);
  }

  function tokenize(state: StateInline, silent: boolean): boolean {
    const start = state.pos;
    const max = state.posMax;

    if (silent) {
      return false;
    }

    if (!state.src.startsWith(marker, start)) {
      return false;
    }
    if (single && state.src[start + 1] === marker) {
      return false;
    }

    const contentStart = start + marker.length;
    if (contentStart >= max || /\s/.test(state.src[contentStart])) {
      return false;
    }

    let pos = contentStart;
    let found = false;
    while (pos < max) {
      if (state.src[pos] === '\\') {
        pos += 2;
        continue;
      }
      if (isMarkerAt(state.src, pos)) {
        found = true;
        break;
      }
      pos++;
    }

    if (!found || pos + marker.length > max || pos === contentStart) {
      return false;
    }

    const content = state.src.slice(contentStart, pos);
    if (/\s$/.test(content)) {
      return false;
    }
    if (!allowSpaces && /(^|[^\\])(\\\\)*\s/.test(content)) {
      return false;
    }

    state.posMax = pos;
    state.pos = contentStart;

    const token_o = state.push(`${name}_open`, tag, 1);
    token_o.markup = marker;

    state.md.inline.tokenize(state);

    const token_c = state.push(`${name}_close`, tag, -1);
    token_c.markup = marker;

    state.pos = pos + marker.length;
    state.posMax = max;
    return true;
  }

  if (single) {
    md.inline.ruler.after('emphasis', name, tokenize);
  } else {
    md.inline.ruler.before('emphasis', name, tokenize);
  }
}

/**
 * Math plugin for markdown-it (generic output, no preview, empty wrappers)
 *
 * - Inline: $x^2$ → <span class="arithmatex">x^2</span>
 * - Block:  $$ ... $$ → <div class="arithmatex">...</div>
 *
 * An inline opening `$` must not be followed by whitespace, and the closing
 * one must not be preceded by whitespace or followed by a digit, so prices
 * such as "$5 and $6" stay text.
 */
export function mathPlugin(md: MarkdownIt, options: { cssClass: string }): void {
  const { cssClass } = options;

  function mathInline(state: StateInline, silent: boolean): boolean {
    const start = state.pos;
    const max = state.posMax;
    const src = state.src;

    if (src[start] !== '$' || src[start + 1] === '$') {
      return false;
    }
    if (start + 1 >= max || /\s/.test(src[start + 1])) {
      return false;
    }

    let pos = start + 1;
    while (pos < max) {
      if (src[pos] === '\\') {
        pos += 2;
        continue;
      }
      if (src[pos] === '$') break;
      pos++;
    }

    if (pos >= max || /\s/.test(src[pos - 1]) || /\d/.test(src[pos + 1] ?? '')) {
      return false;
    }

    if (!silent) {
      const token = state.push('math_inline', 'span', 0);
      token.markup = '$';
      token.content = src.slice(start + 1, pos);
    }

    state.pos = pos + 1;
    return true;
  }

  function mathBlock(
    state: StateBlock,
    startLine: number,
    endLine: number,
    silent: boolean,
  ): boolean {
    if (state.sCount[startLine] - state.blkIndent >= 4) {
      return false;
    }

    const start = state.bMarks[startLine] + state.tShift[startLine];
    const max = state.eMarks[startLine];
    const firstLine = state.src.slice(start, max).trim();

    if (!firstLine.startsWith('$$')) {
      return false;
    }

    if (silent) {
      return true;
    }

    const lines: string[] = [];
    let nextLine = startLine;
    let closed = false;
    const opening = firstLine.slice(2);

    if (opening.endsWith('$$') && opening.length >= 2) {
      lines.push(opening.slice(0, -2));
      closed = true;
    } else {
      if (opening.trim()) lines.push(opening);

      while (!closed) {
        nextLine++;
        // Block math never spans a blank line
        if (nextLine >= endLine || state.isEmpty(nextLine)) break;

        const lineStart = state.bMarks[nextLine] + state.tShift[nextLine];
        const lineMax = state.eMarks[nextLine];
        if (lineStart < lineMax && state.sCount[nextLine] < state.blkIndent) break;

        const text = state.src.slice(lineStart, lineMax);
        if (text.trimEnd().endsWith('$$')) {
          const before = text.trimEnd().slice(0, -2);
          if (before.trim()) lines.push(before);
          closed = true;
        } else {
          lines.push(state.getLines(nextLine, nextLine + 1, state.blkIndent, false).replace(/\n$/, ''));
        }
      }
    }

    if (!closed) {
      return false;
    }

    const token = state.push('math_block', 'div', 0);
    token.block = true;
    token.markup = '$$';
    token.content = lines.join('\n').trim();
    token.map = [startLine, nextLine + 1];

    state.line = nextLine + 1;
    return true;
  }

  md.inline.ruler.after('escape', 'math_inline', mathInline);
  md.block.ruler.before('fence', 'math_block', mathBlock, {
    alt: ['paragraph', 'reference', 'blockquote', 'list'],
  });

  md.renderer.rules['math_inline'] = function (tokens, idx): string {
    return `<span class="${cssClass}">${md.utils.escapeHtml(tokens[idx].content)}</span>`;
  };
  md.renderer.rules['math_block'] = function (tokens, idx): string {
    return `<div class="${cssClass}">${md.utils.escapeHtml(tokens[idx].content)}</div>\n`;
  };
}

/**
 * Emoji plugin for markdown-it
 *
 * Shortcodes are matched by markdown-it-emoji; rendering goes through
 * `renderer.emoji()` so the wiki gets tagged placeholders instead of bare
 * glyphs.
 */
export function wikiEmojiPlugin(md: MarkdownIt, options: { renderer: WikiRenderer }): void {
  // Only :shortcode: forms; ASCII shortcuts such as :) and <3 stay text
  md.use(emoji, { shortcuts: {} });

  md.renderer.rules['emoji'] = function (tokens, idx): string {
    const token = tokens[idx];
    const glyph = token.content;
    // Definitions that map to plain text carry no code point
    const hasCodepoint = /[^\x00-\x7f]/.test(glyph);

    return options.renderer.emoji({
      shortname: token.markup,
      codepoint: hasCodepoint ? encodeCodepoints(glyph) : undefined,
      fallback: hasCodepoint ? `:${token.markup}:` : glyph,
    });
  };
}
