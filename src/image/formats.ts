/**
 * Image file recognition and MIME subtype inference.
 */

import * as path from 'node:path';

/** File names that are treated as images by the locator and the writers. */
export const IMAGE_FILE_RE = /\.(png|jpe?g|gif|bmp|svg|webp|tiff?|ico|xpm|pbm|pgm|ppm)$/i;

/** Extensions whose MIME subtype differs from the extension itself. */
const MIME_SUBTYPES: Record<string, string> = {
  jpg: 'jpeg',
  svg: 'svg+xml',
  tif: 'tiff',
  ico: 'x-icon',
  xpm: 'x-xpixmap',
  pbm: 'x-portable-bitmap',
  pgm: 'x-portable-graymap',
  ppm: 'x-portable-pixmap',
};

export function isImageFile(file: string): boolean {
  return IMAGE_FILE_RE.test(file);
}

/**
 * MIME subtype for an image path, e.g. `photo.JPG` -> `jpeg`.
 * Returns `null` when the extension is not a known image type.
 */
export function imageFormat(file: string): string | null {
  if (!isImageFile(file)) return null;
  const ext = path.extname(file).slice(1).toLowerCase();
  return MIME_SUBTYPES[ext] ?? ext;
}
