/**
 * rich-clip - copy Markdown and code as rich HTML, and images, to the
 * system clipboard
 */

// High-level export API
export { exportToHtml, copyAsHtml, detectMode, detectLanguage } from './exporter';

// Types
export type { DocumentMode, ExportOptions, ExportResult, ExportMetadata } from './types';

// Clipboard HTML Format codec
export {
  HTML_FORMAT_VERSION,
  START_FRAGMENT_MARKER,
  END_FRAGMENT_MARKER,
  wrapFragment,
  encodeHtmlFormat,
  encodeHtmlFragment,
  decodeHtmlFormat,
} from './clipboard/html-format';
export type {
  MarkerHeader,
  HtmlFormatRange,
  EncodeFragmentOptions,
  DecodedHtmlFormat,
} from './clipboard/html-format';
export {
  RichClipError,
  ParseError,
  NotFoundError,
  InvalidRangeError,
  ProcessError,
  UnsupportedPlatformError,
  ConfigError,
} from './clipboard/errors';

// Platform writers
export {
  createClipboardWriter,
  clipboardPlatform,
  ShellCommandRunner,
  fillTemplate,
  LinuxClipboardWriter,
  MacClipboardWriter,
  WindowsClipboardWriter,
} from './platform/index';
export type {
  ClipboardPlatform,
  ClipboardWriter,
  CommandRunner,
  WriteOptions,
  WriterDeps,
} from './platform/index';

// Image location
export {
  locateImage,
  IMAGE_STRATEGIES,
  MarkdownDocumentContext,
  LatexMathRenderer,
} from './image/index';
export type { DocumentContext, ImageReference, ImageStrategy, MathRenderer } from './image/index';

// Configuration and logging
export { loadConfig, parseConfig, DEFAULT_COMMANDS } from './config';
export type { RichClipConfig, CommandTemplates } from './config';
export { createLogger } from './logger';

// Core module re-exports
export {
  parseMarkdown,
  renderToHtml,
  markdownToHtml,
  RichTextRenderer,
  sanitizeHtml,
  selectRegion,
  parseLineRegion,
} from './core/index';
export type { LineRegion, ParsedToken, ParseMetadata, StyleTemplateName } from './core/index';
