/**
 * Error types shared between the library and the CLI
 */

/**
 * Invalid configuration file contents
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The markdown-it engine could not be set up
 */
export class EngineConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineConfigError';
  }
}

/**
 * A conversion was started while another one holds the same engine
 */
export class ConverterBusyError extends Error {
  constructor() {
    super('Converter is already in use; create one MarkdownConverter per concurrent caller');
    this.name = 'ConverterBusyError';
  }
}

/**
 * The optional math rendering backend is not installed
 */
export class MathRendererUnavailableError extends Error {
  readonly hint: string;

  constructor(missing: string, options?: { cause?: unknown }) {
    const hint = 'npm install mathjax-full sharp';
    super(`${missing} not installed; run: \`${hint}\``, options);
    this.name = 'MathRendererUnavailableError';
    this.hint = hint;
  }
}
