/**
 * Host-editor abstraction used by the image locator.
 *
 * @module image/types
 */

/** A 0-based character offset into the document. */
export type Point = number;

export type ElementKind = 'math' | 'link' | 'image' | 'html' | 'text';

/** The syntactic element under the cursor. `end` is exclusive. */
export interface ContextElement {
  kind: ElementKind;
  start: Point;
  end: Point;
  /** Source text of the element, delimiters included. */
  value: string;
}

export interface LinkTarget {
  /** `file`, `attachment`, or any other URI scheme (`https`, `mailto`, ...). */
  scheme: string;
  /** Link path with the scheme prefix removed. */
  path: string;
}

/** Something displayed over a span of the document, such as an inline image. */
export interface OverlayDisplay {
  /** Absolute path of the displayed file. */
  file: string;
}

/**
 * What the locator needs from the host: four queries at a point and one
 * action that renders a formula preview as an overlay.
 */
export interface DocumentContext {
  /** Directory of the document; link paths are relative to it. */
  readonly directory: string;

  elementAt(point: Point): ContextElement | null;
  linkAt(point: Point): LinkTarget | null;
  /** Absolute path of a named attachment, or `null` if it does not exist. */
  resolveAttachment(name: string): string | null;
  overlayDisplayAt(point: Point): OverlayDisplay | null;

  /** Render a math element to an image and display it as an overlay. */
  previewMath(element: ContextElement, scale: number): Promise<void>;
}

export type ImageStrategyName = 'math-preview' | 'file-link' | 'attachment-link' | 'overlay';

export interface ImageReference {
  /** Path as found: relative to the document for links, absolute for overlays. */
  path: string;
  absolutePath: string;
  /** MIME subtype inferred from the extension. */
  format: string;
  strategy: ImageStrategyName;
}
