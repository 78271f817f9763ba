/**
 * Math renderer using mathjax-full (TeX → SVG) and sharp (SVG → PNG)
 *
 * Both packages are loaded on first use, so documents without math never
 * pay for them and a missing backend surfaces as
 * MathRendererUnavailableError rather than a crash at startup.
 */

import { MathRendererUnavailableError } from '../errors';
import {
  DEFAULT_MATH_OPTIONS,
  validateMathOptions,
  type MathRenderOptions,
  type MathRenderer,
} from './types';

/**
 * Loaded rendering backend
 */
export interface MathBackend {
  /** Render display TeX to a standalone SVG document (sizes in ex) */
  texToSvg(expression: string): string;
  /** Rasterize an SVG document to PNG at the given resolution */
  svgToPng(svg: string, dpi: number): Promise<Buffer>;
}

export type MathBackendLoader = () => Promise<MathBackend>;

async function loadSharp(): Promise<(svg: string, dpi: number) => Promise<Buffer>> {
  try {
    const { default: sharp } = await import('sharp');
    return (svg, dpi) => sharp(Buffer.from(svg), { density: dpi }).png().toBuffer();
  } catch (error) {
    throw new MathRendererUnavailableError('sharp', { cause: error });
  }
}

/**
 * Load mathjax-full with all TeX packages and the SVG output jax
 */
export async function loadMathJaxBackend(): Promise<MathBackend> {
  const modules = await Promise.all([
    import('mathjax-full/js/mathjax.js'),
    import('mathjax-full/js/input/tex.js'),
    import('mathjax-full/js/output/svg.js'),
    import('mathjax-full/js/adaptors/liteAdaptor.js'),
    import('mathjax-full/js/handlers/html.js'),
    import('mathjax-full/js/input/tex/AllPackages.js'),
  ]).catch((error: unknown) => {
    throw new MathRendererUnavailableError('mathjax-full', { cause: error });
  });

  const [{ mathjax }, { TeX }, { SVG }, { liteAdaptor }, { RegisterHTMLHandler }, { AllPackages }] =
    modules;

  const adaptor = liteAdaptor();
  RegisterHTMLHandler(adaptor);
  const document = mathjax.document('', {
    InputJax: new TeX({ packages: AllPackages }),
    OutputJax: new SVG({ fontCache: 'none' }),
  });

  let rasterize: ((svg: string, dpi: number) => Promise<Buffer>) | undefined;

  return {
    texToSvg(expression: string): string {
      const node = document.convert(expression, { display: true });
      return adaptor.innerHTML(node);
    },

    async svgToPng(svg: string, dpi: number): Promise<Buffer> {
      if (!rasterize) {
        rasterize = await loadSharp();
      }
      return rasterize(svg, dpi);
    },
  };
}

/**
 * Convert the ex-based width and height of the root <svg> element to points
 *
 * MathJax sizes its output relative to the surrounding font (1ex = half the
 * font size); a standalone image needs absolute units.
 */
export function sizeSvg(svg: string, fontSize: number): string {
  return svg.replace(/^<svg\b[^>]*>/, (tag) =>
    tag.replace(/\b(width|height)="([\d.]+)ex"/g, (_, attr: string, value: string) => {
      const points = (parseFloat(value) * fontSize) / 2;
      return `${attr}="${Number(points.toFixed(3))}pt"`;
    }),
  );
}

/**
 * MathRenderer backed by MathJax and sharp
 */
export class MathJaxRenderer implements MathRenderer {
  private backend: Promise<MathBackend> | undefined;
  private readonly loadBackend: MathBackendLoader;

  constructor(loadBackend: MathBackendLoader = loadMathJaxBackend) {
    this.loadBackend = loadBackend;
  }

  async initialize(): Promise<void> {
    await this.getBackend();
  }

  async render(
    expression: string,
    options: MathRenderOptions = DEFAULT_MATH_OPTIONS,
  ): Promise<Buffer> {
    validateMathOptions(options);
    const backend = await this.getBackend();

    const svg = sizeSvg(backend.texToSvg(expression), options.fontSize);
    if (options.format === 'svg') {
      return Buffer.from(svg, 'utf-8');
    }
    return backend.svgToPng(svg, options.dpi);
  }

  private getBackend(): Promise<MathBackend> {
    if (!this.backend) {
      // A failed load is retried on the next call, e.g. after installing the backend
      this.backend = this.loadBackend().catch((error: unknown) => {
        this.backend = undefined;
        throw error;
      });
    }
    return this.backend;
  }
}

let sharedRenderer: MathJaxRenderer | undefined;

/**
 * Render a TeX expression to PNG or SVG bytes using a shared renderer
 *
 * @example
 * const png = await renderMath('\\frac{a}{b}', { format: 'png', dpi: 100, fontSize: 12 });
 */
export function renderMath(
  expression: string,
  options: Partial<MathRenderOptions> = {},
): Promise<Buffer> {
  if (!sharedRenderer) {
    sharedRenderer = new MathJaxRenderer();
  }
  return sharedRenderer.render(expression, { ...DEFAULT_MATH_OPTIONS, ...options });
}
