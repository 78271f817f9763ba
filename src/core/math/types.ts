/**
 * Math renderer interface
 *
 * Implementations turn a TeX expression into image bytes. Rendering backends
 * are optional: a renderer whose backend is missing rejects with
 * MathRendererUnavailableError.
 */

export type MathImageFormat = 'png' | 'svg';

export interface MathRenderOptions {
  format: MathImageFormat;
  /** Output resolution, used for raster formats */
  dpi: number;
  /** Font size in points */
  fontSize: number;
}

export const DEFAULT_MATH_OPTIONS: MathRenderOptions = {
  format: 'png',
  dpi: 100,
  fontSize: 12,
};

export interface MathRenderer {
  /**
   * Render an expression as display math on a transparent background
   */
  render(expression: string, options: MathRenderOptions): Promise<Buffer>;

  /**
   * Load the backend ahead of the first render (if needed)
   */
  initialize?(): Promise<void>;
}

/**
 * Check render options, throwing RangeError on invalid values
 */
export function validateMathOptions(options: MathRenderOptions): void {
  if (options.format !== 'png' && options.format !== 'svg') {
    throw new RangeError(`Unsupported math image format: ${String(options.format)}`);
  }
  if (!Number.isInteger(options.dpi) || options.dpi < 1) {
    throw new RangeError(`dpi must be a positive integer, got ${options.dpi}`);
  }
  if (!Number.isInteger(options.fontSize) || options.fontSize < 1) {
    throw new RangeError(`fontSize must be a positive integer, got ${options.fontSize}`);
  }
}
