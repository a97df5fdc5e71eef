/**
 * Core module barrel exports.
 *
 * @module core
 */

export { parseMarkdown } from './parser';
export { renderToHtml, markdownToHtml, renderCodeBlock, escapeHtml, RichTextRenderer } from './renderer';
export { sanitizeHtml } from './sanitizer';
export { preprocessMarkdown } from './preprocessor';
export { postprocessHtml } from './postprocessor';
export type { PostprocessOptions } from './postprocessor';
export { highlightCode, inlineTokenStyles, isKnownLanguage, languageForFile } from './highlighter';
export type { HighlightResult } from './highlighter';
export { selectRegion, parseLineRegion } from './region';
export type { LineRegion } from './region';
export {
  getStyleTemplate,
  getElementStyle,
  isStyleTemplateName,
  styleAttr,
  STYLE_TEMPLATES,
  STYLE_TEMPLATE_NAMES,
} from './styles';
export type { StyleTemplate, StyleTemplateName } from './styles';
export type { ParsedToken, ParserOptions, ParseResult, ParseMetadata } from './types';
