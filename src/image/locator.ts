/**
 * Image-at-point lookup.
 *
 * Strategies are tried in a fixed order and the first one that yields a
 * path wins:
 *
 * 1. `math-preview`: the cursor is on a formula; render it and read the
 *    image back from the overlay.
 * 2. `file-link`: a file link to an image.
 * 3. `attachment-link`: an attachment link that resolves to an image.
 * 4. `overlay`: an image already displayed over the cursor.
 *
 * No match is not an error: {@link locateImage} returns `null`.
 *
 * @module image/locator
 */

import * as path from 'node:path';

import { DEFAULT_MATH_SCALE } from '../config';
import { imageFormat, isImageFile } from './formats';
import type {
  DocumentContext,
  ImageReference,
  ImageStrategyName,
  Point,
} from './types';

export interface LocateOptions {
  /** Scale for math previews. */
  scale?: number;
}

export interface ImageStrategy {
  name: ImageStrategyName;
  matches(context: DocumentContext, point: Point): boolean;
  resolve(context: DocumentContext, point: Point, options: Required<LocateOptions>): Promise<string | null>;
}

const mathPreview: ImageStrategy = {
  name: 'math-preview',
  matches: (context, point) => context.elementAt(point)?.kind === 'math',
  async resolve(context, point, { scale }) {
    const element = context.elementAt(point);
    if (!element) return null;
    await context.previewMath(element, scale);
    return context.overlayDisplayAt(point)?.file ?? null;
  },
};

const fileLink: ImageStrategy = {
  name: 'file-link',
  matches(context, point) {
    const link = context.linkAt(point);
    return link !== null && link.scheme === 'file' && isImageFile(link.path);
  },
  async resolve(context, point) {
    return context.linkAt(point)?.path ?? null;
  },
};

const attachmentLink: ImageStrategy = {
  name: 'attachment-link',
  matches: (context, point) => context.linkAt(point)?.scheme === 'attachment',
  async resolve(context, point) {
    const link = context.linkAt(point);
    if (!link) return null;
    const resolved = context.resolveAttachment(link.path);
    if (!resolved || !isImageFile(resolved)) return null;
    return path.relative(context.directory, resolved);
  },
};

const overlay: ImageStrategy = {
  name: 'overlay',
  matches(context, point) {
    const display = context.overlayDisplayAt(point);
    return display !== null && isImageFile(display.file);
  },
  async resolve(context, point) {
    return context.overlayDisplayAt(point)?.file ?? null;
  },
};

/** Strategies in priority order. */
export const IMAGE_STRATEGIES: readonly ImageStrategy[] = [
  mathPreview,
  fileLink,
  attachmentLink,
  overlay,
];

/**
 * Find the image associated with `point`.
 *
 * @returns The first strategy's result, or `null` when none applies.
 */
export async function locateImage(
  context: DocumentContext,
  point: Point,
  options: LocateOptions = {},
  strategies: readonly ImageStrategy[] = IMAGE_STRATEGIES,
): Promise<ImageReference | null> {
  const resolved: Required<LocateOptions> = { scale: options.scale ?? DEFAULT_MATH_SCALE };

  for (const strategy of strategies) {
    if (!strategy.matches(context, point)) continue;

    const found = await strategy.resolve(context, point, resolved);
    if (!found) continue;

    const absolutePath = path.resolve(context.directory, found);
    return {
      path: found,
      absolutePath,
      format: imageFormat(absolutePath) ?? path.extname(absolutePath).slice(1).toLowerCase(),
      strategy: strategy.name,
    };
  }

  return null;
}
