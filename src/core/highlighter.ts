/**
 * Syntax highlighting for code exports and fenced code blocks.
 *
 * highlight.js emits `<span class="hljs-...">` markup; since pasted HTML
 * keeps no stylesheet, the classes are replaced by inline styles from the
 * active template's code theme.
 *
 * @module core/highlighter
 */

import * as path from 'node:path';
import hljs from 'highlight.js';

export interface HighlightResult {
  /** Highlighted HTML with `hljs-*` classes. */
  html: string;
  /** Language used, or `null` when auto-detection found nothing. */
  language: string | null;
}

const SPAN_CLASS_RE = /<span class="([^"]*)">/g;

/** Whether highlight.js has a grammar (or alias) named `language`. */
export function isKnownLanguage(language: string): boolean {
  return hljs.getLanguage(language) !== undefined;
}

/**
 * Highlight `code` with highlight.js.
 *
 * A registered `language` is used as given; a missing or unknown one falls
 * back to auto-detection.
 */
export function highlightCode(code: string, language?: string): HighlightResult {
  if (language && isKnownLanguage(language)) {
    const result = hljs.highlight(code, { language, ignoreIllegals: true });
    return { html: result.value, language };
  }

  const auto = hljs.highlightAuto(code);
  return { html: auto.value, language: auto.language ?? null };
}

/**
 * Replace `hljs-*` classes with inline styles from `theme`.
 *
 * Nested scopes such as `hljs-title function_` use the first `hljs-` class
 * that the theme knows; spans the theme does not style lose their class.
 *
 * @example
 * ```ts
 * inlineTokenStyles('<span class="hljs-keyword">const</span>', { keyword: 'color: red;' });
 * // => '<span style="color: red;">const</span>'
 * ```
 */
export function inlineTokenStyles(html: string, theme: Record<string, string>): string {
  return html.replace(SPAN_CLASS_RE, (_match, classes: string) => {
    const scope = classes
      .split(/\s+/)
      .filter((name) => name.startsWith('hljs-'))
      .map((name) => name.slice('hljs-'.length))
      .find((name) => theme[name] !== undefined);
    return scope ? `<span style="${theme[scope]}">` : '<span>';
  });
}

/**
 * highlight.js language for a file name, from its extension
 * (`src/app.ts` -> `ts`). Returns `null` for unregistered extensions.
 */
export function languageForFile(filePath: string): string | null {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  if (ext && isKnownLanguage(ext)) return ext;

  const base = path.basename(filePath).toLowerCase();
  if (base === 'makefile') return 'makefile';
  if (base === 'dockerfile') return 'dockerfile';
  return null;
}
