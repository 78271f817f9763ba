/**
 * Rendering hooks invoked by the markdown-it engine
 *
 * The engine's plugins hand every matched emoji and every custom fence to a
 * WikiRenderer. The wiki post-processor relies on the exact markup produced
 * here (`x-emoji` placeholders, `arithmatex` and `csf` divs).
 */

import { escapeHtml } from './html';

/**
 * Emoji matched by the emoji plugin
 */
export interface EmojiMatch {
  /** Canonical name, with or without surrounding colons */
  shortname: string;
  /** Name the author actually typed, when it differs from the canonical one */
  alias?: string;
  /** Hyphen-delimited hex code points, e.g. `1f468-200d-1f4bb` */
  codepoint?: string;
  /** Text used when no code point is known */
  fallback: string;
}

/**
 * Fenced block matched by a custom fence
 */
export interface FenceMatch {
  source: string;
  language: string;
  cssClass: string;
  id?: string;
  classes?: string[];
  attrs?: Record<string, string>;
}

/**
 * Renderer capability registered with the engine
 *
 * One method per construct kind. Implementations return HTML.
 */
export interface WikiRenderer {
  emoji(match: EmojiMatch): string;
  fence(match: FenceMatch): string;
}

/**
 * Inline element produced for an emoji
 */
export interface EmojiElement {
  tagName: 'x-emoji';
  attributes: Record<string, string>;
  text: string;
}

/**
 * Decode a hyphen-delimited series of hex code points into characters
 *
 * @example
 * decodeCodepoints('1f44d-1f3fd') // => '👍🏽'
 */
export function decodeCodepoints(codepoint: string): string {
  return codepoint
    .split('-')
    .map((hex) => String.fromCodePoint(parseInt(hex, 16)))
    .join('');
}

/**
 * Encode characters as a hyphen-delimited series of hex code points
 *
 * @example
 * encodeCodepoints('😄') // => '1f604'
 */
export function encodeCodepoints(text: string): string {
  return Array.from(text)
    .map((char) => (char.codePointAt(0) ?? 0).toString(16))
    .join('-');
}

/**
 * Build the placeholder element for an emoji
 *
 * `data-shortname` carries the alias if there is one, otherwise the
 * shortname, without colons. When a code point sequence is known it is kept
 * in `data-unicode` and decoded into the element text; otherwise the element
 * text is the fallback.
 */
export function resolveEmoji(
  shortname: string,
  alias: string | undefined,
  codepoint: string | undefined,
  fallback: string,
): EmojiElement {
  const name = stripColons(alias || shortname);
  const element: EmojiElement = {
    tagName: 'x-emoji',
    attributes: { 'data-shortname': name },
    text: fallback,
  };

  if (codepoint !== undefined) {
    element.attributes['data-unicode'] = codepoint;
    element.text = decodeCodepoints(codepoint);
  }

  return element;
}

function stripColons(name: string): string {
  return name.replace(/^:+|:+$/g, '');
}

/**
 * Serialize an emoji element as inline HTML
 */
export function renderElement(element: EmojiElement): string {
  const attrs = Object.entries(element.attributes)
    .map(([key, value]) => ` ${key}="${escapeHtml(value)}"`)
    .join('');
  return `<${element.tagName}${attrs}>${escapeHtml(element.text)}</${element.tagName}>`;
}

/**
 * Format a custom fence as a `<div>` that carries the raw source
 *
 * `cssClass` always comes first in the class list. The source is emitted
 * verbatim: math and wiki storage-format fences are trusted content.
 *
 * @example
 * formatFence('x^2', 'arithmatex')
 * // => '<div class="arithmatex">x^2</div>'
 */
export function formatFence(
  source: string,
  cssClass: string,
  classes: readonly string[] = [],
  id = '',
  attrs: Record<string, string> = {},
): string {
  const htmlId = id ? ` id="${id}"` : '';
  const htmlClass = ` class="${[cssClass, ...classes].join(' ')}"`;
  const htmlAttrs = Object.entries(attrs)
    .map(([key, value]) => ` ${key}="${value}"`)
    .join('');

  return `<div${htmlId}${htmlClass}${htmlAttrs}>${source}</div>`;
}

/**
 * WikiRenderer producing the markup expected by the wiki post-processor
 */
export class DefaultWikiRenderer implements WikiRenderer {
  emoji(match: EmojiMatch): string {
    return renderElement(
      resolveEmoji(match.shortname, match.alias, match.codepoint, match.fallback),
    );
  }

  fence(match: FenceMatch): string {
    return formatFence(match.source, match.cssClass, match.classes, match.id, match.attrs);
  }
}
