/**
 * Embedding utilities for replacing math fragments with rendered images
 *
 * This is the page-assembly step that runs on converted HTML: every
 * `arithmatex` span or div becomes an <img> carrying a base64 data URL.
 */

import { getType } from 'mime';
import { MathRendererUnavailableError } from './errors';
import { escapeHtml, unescapeHtml } from './html';
import type { MathRenderOptions, MathRenderer } from './math/types';

/**
 * Match math fragments produced by the converter, including `math` fences
 * with an attribute list: <div id="eq" class="arithmatex wide" data-k="v">…</div>
 */
export const MATH_FRAGMENT_REGEX =
  /<(div|span)(?: id="[^"]*")? class="arithmatex(?: [^"]*)?"[^>]*>([\s\S]*?)<\/\1>/g;

/**
 * Embedding context containing dependencies
 */
export interface EmbeddingContext {
  renderer: MathRenderer;
  options: MathRenderOptions;
  /** Called with a warning when math is left as passthrough markup */
  onWarning?: (message: string) => void;
}

/**
 * Convert image bytes into a data URL for the given format
 */
export function toDataUrl(data: Buffer, format: MathRenderOptions['format']): string {
  const type = getType(format) ?? 'application/octet-stream';
  return `data:${type};base64,${data.toString('base64')}`;
}

/**
 * Replace all math fragments in HTML with embedded images
 *
 * Each distinct expression is rendered once; renders run in parallel.
 * If the renderer backend is not installed, the HTML is returned unchanged
 * (math stays as passthrough markup) and a warning is reported. Any other
 * rendering error propagates.
 *
 * @param html - Converted HTML fragment
 * @param context - Renderer, render options and warning callback
 * @returns HTML with math fragments embedded as images
 */
export async function embedMath(html: string, context: EmbeddingContext): Promise<string> {
  const { renderer, options, onWarning = console.warn } = context;

  const matches = [...html.matchAll(MATH_FRAGMENT_REGEX)];
  const expressions = [...new Set(matches.map((m) => unescapeHtml(m[2]).trim()))];

  if (expressions.length === 0) return html;

  let rendered: Array<readonly [string, string]>;
  try {
    rendered = await Promise.all(
      expressions.map(async (expression) => {
        const image = await renderer.render(expression, options);
        return [expression, toDataUrl(image, options.format)] as const;
      }),
    );
  } catch (error) {
    if (error instanceof MathRendererUnavailableError) {
      onWarning(`Math left unrendered: ${error.message}`);
      return html;
    }
    throw error;
  }

  const dataUrls = new Map(rendered);

  return html.replace(MATH_FRAGMENT_REGEX, (fragment: string, _tag: string, source: string) => {
    const expression = unescapeHtml(source).trim();
    const dataUrl = dataUrls.get(expression);
    if (!dataUrl) return fragment;
    return `<img class="arithmatex" src="${dataUrl}" alt="${escapeHtml(expression)}" />`;
  });
}
