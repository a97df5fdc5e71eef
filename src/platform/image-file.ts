import * as fs from 'node:fs';
import * as path from 'node:path';

import { RichClipError } from '../clipboard/errors';
import { imageFormat } from '../image/formats';

export interface ImageFile {
  absolutePath: string;
  /** MIME subtype, e.g. `png` or `svg+xml`. */
  format: string;
}

/**
 * Resolve and check an image path before handing it to a clipboard command,
 * whose own failure may go unobserved.
 */
export function checkImageFile(imagePath: string): ImageFile {
  const absolutePath = path.resolve(imagePath);
  const format = imageFormat(absolutePath);
  if (!format) {
    throw new RichClipError(`Not a recognised image file: ${imagePath}`);
  }
  if (!fs.existsSync(absolutePath)) {
    throw new RichClipError(`Image file not found: ${absolutePath}`);
  }
  return { absolutePath, format };
}
