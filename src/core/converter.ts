/**
 * Markdown to wiki HTML conversion pipeline
 *
 * normalize list indentation → markdown-it (with the wiki plugins) → HTML fragment
 */

import type MarkdownIt from 'markdown-it';
import { createEngine } from './engine';
import { ConverterBusyError } from './errors';
import { normalizeListIndentation } from './preprocessor';
import type { WikiRenderer } from './renderer';

/**
 * Owns one markdown-it engine and converts documents with it
 *
 * Each conversion is a reset transaction: it acquires the engine, starts
 * from a fresh render environment (footnote numbering, link references),
 * renders, and releases. Entering a conversion while another one holds the
 * engine throws ConverterBusyError; concurrent callers need one converter
 * each.
 */
export class MarkdownConverter {
  private readonly engine: MarkdownIt;
  private busy = false;

  constructor(renderer?: WikiRenderer) {
    this.engine = createEngine(renderer);
  }

  /**
   * Convert a Markdown document into an HTML fragment
   *
   * Engine errors propagate unchanged.
   */
  convert(content: string): string {
    return this.withEngine((engine, env) =>
      engine.render(normalizeListIndentation(content), env),
    );
  }

  private withEngine<T>(fn: (engine: MarkdownIt, env: Record<string, unknown>) => T): T {
    if (this.busy) {
      throw new ConverterBusyError();
    }

    this.busy = true;
    try {
      return fn(this.engine, {});
    } finally {
      this.busy = false;
    }
  }
}

let sharedConverter: MarkdownConverter | undefined;

/**
 * Convert a Markdown document into an HTML fragment using a shared converter
 */
export function markdownToHtml(content: string): string {
  if (!sharedConverter) {
    sharedConverter = new MarkdownConverter();
  }
  return sharedConverter.convert(content);
}
