/**
 * markdown-it engine configuration
 *
 * The extension set is fixed: every document published to the wiki is
 * rendered with the same syntax. Only the renderer hooks can be swapped.
 */

import MarkdownIt from 'markdown-it';
import footnote from 'markdown-it-footnote';
import { EngineConfigError } from './errors';
import {
  admonitionPlugin,
  customFencesPlugin,
  mathPlugin,
  spanPlugin,
  wikiEmojiPlugin,
  type CustomFence,
} from './markdownItPlugins';
import { DefaultWikiRenderer, type WikiRenderer } from './renderer';

/** CSS class of math fragments, picked up by the page assembler */
export const MATH_CLASS = 'arithmatex';

/**
 * Fences rendered by the WikiRenderer instead of as code blocks
 *
 * - `math`: display math, same output as a $$ block
 * - `csf`: wiki storage-format markup passed through verbatim
 */
export const CUSTOM_FENCES: readonly CustomFence[] = [
  { name: 'math', cssClass: MATH_CLASS },
  { name: 'csf', cssClass: 'csf' },
];

/**
 * Create a configured markdown-it instance
 *
 * Syntax on top of CommonMark: tables, ~~strikethrough~~, footnotes,
 * admonitions, math, ^^insert^^, ^superscript^, ~subscript~, ==mark==,
 * emoji shortcodes, custom fences, raw HTML and bare links.
 * No syntax highlighting is applied to code fences.
 *
 * @throws EngineConfigError if a plugin cannot be registered
 */
export function createEngine(renderer: WikiRenderer = new DefaultWikiRenderer()): MarkdownIt {
  try {
    return new MarkdownIt({
      html: true,
      xhtmlOut: true,
      linkify: true,
      typographer: false,
    })
      .enable(['table', 'strikethrough'])
      .use(footnote)
      .use(admonitionPlugin)
      .use(mathPlugin, { cssClass: MATH_CLASS })
      .use(spanPlugin, { name: 'ins', marker: '^^', tag: 'ins', allowSpaces: true })
      .use(spanPlugin, { name: 'mark', marker: '==', tag: 'mark', allowSpaces: true })
      .use(spanPlugin, { name: 'sup', marker: '^', tag: 'sup', allowSpaces: false })
      .use(spanPlugin, { name: 'sub', marker: '~', tag: 'sub', allowSpaces: false })
      .use(wikiEmojiPlugin, { renderer })
      .use(customFencesPlugin, { fences: CUSTOM_FENCES, renderer });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new EngineConfigError(`Failed to configure markdown engine: ${message}`, { cause: err });
  }
}
