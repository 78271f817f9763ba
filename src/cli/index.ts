#!/usr/bin/env node
/**
 * md2wiki CLI
 *
 * Converts Markdown into HTML fragments for wiki pages:
 * - two-space nested lists normalized before parsing
 * - admonitions, footnotes, tables, math, emoji placeholders
 * - `math` and `csf` fences passed through for the wiki
 * - optional embedding of math as rendered images
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import { loadConfig, mergeConfig, type DeepPartial, type Md2WikiConfig } from '../core/config';
import { MarkdownConverter } from '../core/converter';
import { embedMath } from '../core/embedding';
import { MathJaxRenderer } from '../core/math/mathjax';
import type { MathImageFormat } from '../core/math/types';

// Package version (will be set during build)
const VERSION = '1.0.0';

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

function parseFormat(value: string): MathImageFormat {
  if (value !== 'png' && value !== 'svg') {
    throw new InvalidArgumentError('Expected png or svg.');
  }
  return value;
}

function fail(message: string, err: unknown): never {
  console.error(message);
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}

interface ConvertOptions {
  output?: string;
  config?: string;
  embedMath?: boolean;
  mathFormat?: MathImageFormat;
  dpi?: number;
  fontSize?: number;
  verbose?: boolean;
}

interface MathOptions {
  output: string;
  format?: MathImageFormat;
  dpi?: number;
  fontSize?: number;
}

/**
 * Load config (file -> defaults) and apply CLI overrides
 */
function resolveConfig(options: ConvertOptions): Md2WikiConfig {
  const overrides: DeepPartial<Md2WikiConfig> = {
    math: {
      embed: options.embedMath,
      format: options.mathFormat,
      dpi: options.dpi,
      fontSize: options.fontSize,
    },
  };
  return mergeConfig(loadConfig(options.config), overrides);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('md2wiki')
    .description('Convert Markdown into HTML fragments for wiki pages')
    .version(VERSION);

  program
    .command('convert')
    .description('Convert a Markdown file to an HTML fragment')
    .argument('<input>', 'Input markdown file')
    .option('-o, --output <file>', 'Output file (default: input with new extension)')
    .option('-c, --config <file>', 'Config file (default: md2wiki.config.json)')
    .option('--embed-math', 'Replace math with embedded images')
    .option('--math-format <type>', 'Math image format: png, svg', parseFormat)
    .option('--dpi <n>', 'Math image resolution', parsePositiveInt)
    .option('--font-size <n>', 'Math font size in points', parsePositiveInt)
    .option('--verbose', 'Verbose output')
    .action(async (input: string, options: ConvertOptions) => {
      const verbose = options.verbose === true;

      let config: Md2WikiConfig;
      try {
        config = resolveConfig(options);
      } catch (err) {
        fail('Invalid configuration:', err);
      }

      if (verbose) {
        console.log('Config:', JSON.stringify(config, null, 2));
      }

      const inputPath = resolve(input);

      let markdown: string;
      try {
        markdown = await readFile(inputPath, 'utf-8');
      } catch (err) {
        fail(`Error reading input file: ${input}`, err);
      }

      if (verbose) {
        console.log(`Processing: ${inputPath}`);
      }

      let html: string;
      try {
        html = new MarkdownConverter().convert(markdown);
      } catch (err) {
        fail('Error during conversion:', err);
      }

      if (config.math.embed) {
        try {
          html = await embedMath(html, {
            renderer: new MathJaxRenderer(),
            options: config.math,
          });
        } catch (err) {
          fail('Error rendering math:', err);
        }
      }

      const outputPath =
        options.output ||
        join(dirname(inputPath), `${basename(input, extname(input))}.${config.outputExtension}`);

      try {
        await writeFile(outputPath, html);
      } catch (err) {
        fail(`Error writing output file: ${outputPath}`, err);
      }
      console.log(`Converted: ${outputPath}`);
    });

  program
    .command('math')
    .description('Render a TeX expression to an image file')
    .argument('<expression>', 'TeX expression, e.g. "\\frac{a}{b}"')
    .requiredOption('-o, --output <file>', 'Output image file')
    .option('--format <type>', 'Image format: png, svg (default: from output extension)', parseFormat)
    .option('--dpi <n>', 'Image resolution', parsePositiveInt)
    .option('--font-size <n>', 'Font size in points', parsePositiveInt)
    .action(async (expression: string, options: MathOptions) => {
      const extension = extname(options.output).slice(1).toLowerCase();
      const config = loadConfig();
      const format =
        options.format ?? (extension === 'svg' || extension === 'png' ? extension : config.math.format);

      try {
        const image = await new MathJaxRenderer().render(expression, {
          format,
          dpi: options.dpi ?? config.math.dpi,
          fontSize: options.fontSize ?? config.math.fontSize,
        });
        await writeFile(options.output, image);
      } catch (err) {
        fail('Error rendering math:', err);
      }
      console.log(`Rendered: ${options.output}`);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => fail('Unexpected error:', err));
}
