import type { LineRegion } from './core/region';

/** How a source is turned into HTML. */
export type DocumentMode = 'markdown' | 'code';

export interface ExportOptions {
  /** Full source text of the document. */
  source: string;
  /** @default 'markdown' */
  mode?: DocumentMode;
  /** highlight.js language for `code` mode; auto-detected when absent or unknown. */
  language?: string;
  /** Lines to export; the whole source when absent. */
  region?: LineRegion;
  /** Style template name. @default 'minimal' */
  style?: string;
  /** Directory that relative image paths resolve against (Markdown). */
  baseDir?: string;
  /** Explicit title; otherwise the first heading, then `Untitled`. */
  title?: string;
}

export interface ExportMetadata {
  mode: DocumentMode;
  title: string;
  /** Language used for `code` mode, `null` for Markdown or when undetected. */
  language: string | null;
  lineCount: number;
  wordCount: number;
  hasCodeBlocks: boolean;
  /** Fence languages found in a Markdown export. */
  languages: string[];
  hasTables: boolean;
  hasImages: boolean;
  hasMath: boolean;
}

/**
 * Result of an export: the HTML fragment for the clipboard, a plain-text
 * rendering, and document metadata.
 */
export interface ExportResult {
  html: string;
  plainText: string;
  metadata: ExportMetadata;
}
