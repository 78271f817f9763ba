/**
 * Core module exports
 *
 * This is the library surface used by the CLI and by page-assembly code.
 */

// Configuration
export {
  type Md2WikiConfig,
  type DeepPartial,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATHS,
  loadConfig,
  mergeConfig,
  validateConfig,
} from './config';

// Errors
export {
  ConfigError,
  ConverterBusyError,
  EngineConfigError,
  MathRendererUnavailableError,
} from './errors';

// Preprocessor
export {
  CONTINUATION_SCAN_LIMIT,
  INDENT_WINDOW,
  isListContinuation,
  looksLike2SpaceSystem,
  normalizeListIndentation,
} from './preprocessor';

// Rendering hooks
export {
  DefaultWikiRenderer,
  decodeCodepoints,
  encodeCodepoints,
  formatFence,
  renderElement,
  resolveEmoji,
  type EmojiElement,
  type EmojiMatch,
  type FenceMatch,
  type WikiRenderer,
} from './renderer';

// Markdown-it plugins
export {
  admonitionPlugin,
  customFencesPlugin,
  mathPlugin,
  parseAdmonitionHeader,
  parseFenceInfo,
  spanPlugin,
  wikiEmojiPlugin,
  type AdmonitionHeader,
  type CustomFence,
  type FenceInfo,
  type SpanOptions,
} from './markdownItPlugins';

// Engine and conversion pipeline
export { createEngine, CUSTOM_FENCES, MATH_CLASS } from './engine';
export { MarkdownConverter, markdownToHtml } from './converter';

// Math rendering
export {
  DEFAULT_MATH_OPTIONS,
  validateMathOptions,
  type MathImageFormat,
  type MathRenderOptions,
  type MathRenderer,
} from './math/types';
export {
  MathJaxRenderer,
  loadMathJaxBackend,
  renderMath,
  sizeSvg,
  type MathBackend,
  type MathBackendLoader,
} from './math/mathjax';

// Embedding
export { embedMath, toDataUrl, MATH_FRAGMENT_REGEX, type EmbeddingContext } from './embedding';
