import * as path from 'node:path';

import { RichClipError } from './clipboard/errors';
import { highlightCode, inlineTokenStyles, languageForFile } from './core/highlighter';
import { parseMarkdown } from './core/parser';
import { postprocessHtml } from './core/postprocessor';
import { preprocessMarkdown } from './core/preprocessor';
import { selectRegion } from './core/region';
import { renderToHtml } from './core/renderer';
import { sanitizeHtml } from './core/sanitizer';
import { getStyleTemplate, styleAttr } from './core/styles';
import type { StyleTemplate } from './core/styles';
import type { ClipboardWriter, WriteOptions } from './platform/types';
import type { DocumentMode, ExportOptions, ExportResult } from './types';

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown', '.mdown', '.mkd', '.mkdn']);

/** `markdown` for Markdown file names, `code` for everything else. */
export function detectMode(filePath: string): DocumentMode {
  return MARKDOWN_EXTENSIONS.has(path.extname(filePath).toLowerCase()) ? 'markdown' : 'code';
}

/** highlight.js language for a file name, or `undefined`. */
export function detectLanguage(filePath: string): string | undefined {
  return languageForFile(filePath) ?? undefined;
}

/**
 * Strip tags and decode the common entities to get a plain-text rendering.
 */
function stripHtmlTags(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]*>/g, '')
    .replace(/&#x([0-9a-fA-F]+);/g, (_m, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_m, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Approximate word count. Each CJK character counts as one word; other
 * text is split on whitespace.
 */
function countWords(text: string): number {
  if (!text.trim()) return 0;

  const cjk = /[\u3000-\u9fff\uf900-\ufaff\u{20000}-\u{2fa1f}]/gu;
  const cjkCount = text.match(cjk)?.length ?? 0;
  const latin = text.replace(cjk, ' ').split(/\s+/).filter((word) => word.length > 0);
  return latin.length + cjkCount;
}

/** First level-1 or level-2 ATX heading. */
function extractTitle(markdown: string): string | undefined {
  const match = /^#{1,2}\s+(.+)$/m.exec(markdown);
  return match ? match[1].trim() : undefined;
}

function countLines(text: string): number {
  return text.length === 0 ? 0 : text.split(/\r?\n/).length;
}

function exportMarkdown(
  source: string,
  template: StyleTemplate,
  options: ExportOptions,
): ExportResult {
  const parsed = parseMarkdown(preprocessMarkdown(source));
  const rendered = renderToHtml(parsed.tokens, template.name);
  const html = postprocessHtml(sanitizeHtml(rendered), { baseDir: options.baseDir });
  const plainText = stripHtmlTags(html);

  return {
    html,
    plainText,
    metadata: {
      mode: 'markdown',
      title: options.title ?? extractTitle(source) ?? 'Untitled',
      language: null,
      lineCount: countLines(source),
      wordCount: countWords(plainText),
      ...parsed.metadata,
    },
  };
}

function exportCode(source: string, template: StyleTemplate, options: ExportOptions): ExportResult {
  const highlighted = highlightCode(source, options.language);
  const body = inlineTokenStyles(highlighted.html, template.codeTheme);
  const html = `<pre${styleAttr(template, 'pre')}><code>${body}</code></pre>\n`;

  return {
    html,
    plainText: source,
    metadata: {
      mode: 'code',
      title: options.title ?? 'Untitled',
      language: highlighted.language,
      lineCount: countLines(source),
      wordCount: countWords(source),
      hasCodeBlocks: true,
      languages: highlighted.language ? [highlighted.language] : [],
      hasTables: false,
      hasImages: false,
      hasMath: false,
    },
  };
}

/**
 * Export a document (or a line region of it) to clipboard-ready HTML.
 *
 * Markdown runs through preprocess, parse, render, sanitize and postprocess.
 * Code is highlighted with highlight.js. Both use inline styles from the
 * chosen template.
 *
 * @throws {InvalidRangeError} When `region` is outside the source.
 *
 * @example
 * ```ts
 * const result = exportToHtml({ source: '# Notes\n\nSome *text*' });
 * result.html;      // '<h1>Notes</h1>\n<p>Some <em>text</em></p>\n'
 * result.plainText; // 'Notes\nSome text'
 * ```
 */
export function exportToHtml(options: ExportOptions): ExportResult {
  const template = getStyleTemplate(options.style ?? 'minimal');
  const source = selectRegion(options.source, options.region);

  return (options.mode ?? 'markdown') === 'code'
    ? exportCode(source, template, options)
    : exportMarkdown(source, template, options);
}

/**
 * Export and place the HTML on the clipboard through `writer`.
 *
 * @throws {RichClipError} When the selected region renders to nothing.
 */
export async function copyAsHtml(
  options: ExportOptions,
  writer: ClipboardWriter,
  writeOptions?: WriteOptions,
): Promise<ExportResult> {
  const result = exportToHtml(options);
  if (!result.html.trim()) {
    throw new RichClipError('Nothing to copy: the selected region is empty');
  }
  await writer.writeHtml(result.html, writeOptions);
  return result;
}
