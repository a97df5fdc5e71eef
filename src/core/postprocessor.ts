/**
 * HTML postprocessor.
 *
 * @module core/postprocessor
 */

import * as path from 'node:path';
import { pathToFileURL } from 'node:url';

export interface PostprocessOptions {
  /** Directory that relative image paths are resolved against. */
  baseDir?: string;
}

const IMG_SRC_RE = /(<img\b[^>]*?\bsrc\s*=\s*)(["'])([^"']*)\2/gi;

/** Anything with a URI scheme, or a protocol-relative URL. */
const EXTERNAL_SRC_RE = /^(?:[a-z][a-z0-9+.-]*:|\/\/)/i;
const WINDOWS_DRIVE_RE = /^[a-z]:[\\/]/i;

function isLocalSource(src: string): boolean {
  if (!src || src.startsWith('#')) return false;
  return WINDOWS_DRIVE_RE.test(src) || !EXTERNAL_SRC_RE.test(src);
}

function decodeSource(src: string): string {
  const unescaped = src.replace(/&amp;/g, '&');
  try {
    return decodeURIComponent(unescaped);
  } catch {
    // Literal `%` in the file name.
    return unescaped;
  }
}

/**
 * Point local `<img>` sources at `file://` URLs.
 *
 * A pasted fragment has no base URL, so `images/plot.png` would resolve
 * against nothing in the target application.
 */
function absolutizeImageSources(html: string, baseDir: string): string {
  return html.replace(IMG_SRC_RE, (match, prefix: string, quote: string, src: string) => {
    if (!isLocalSource(src)) return match;
    const url = pathToFileURL(path.resolve(baseDir, decodeSource(src))).href;
    return `${prefix}${quote}${url}${quote}`;
  });
}

/**
 * Apply all postprocessing steps.
 *
 * Without a `baseDir` the HTML is returned unchanged.
 */
export function postprocessHtml(html: string, options: PostprocessOptions = {}): string {
  let result = html;
  if (options.baseDir) {
    result = absolutizeImageSources(result, options.baseDir);
  }
  return result;
}
