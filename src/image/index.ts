export { locateImage, IMAGE_STRATEGIES } from './locator';
export type { ImageStrategy, LocateOptions } from './locator';
export { MarkdownDocumentContext, parseLinkTarget } from './markdown-context';
export type { MarkdownContextOptions } from './markdown-context';
export { LatexMathRenderer, scaleToDpi } from './math-renderer';
export type { MathRenderer, LatexMathRendererOptions } from './math-renderer';
export { IMAGE_FILE_RE, imageFormat, isImageFile } from './formats';
export type {
  ContextElement,
  DocumentContext,
  ElementKind,
  ImageReference,
  ImageStrategyName,
  LinkTarget,
  OverlayDisplay,
  Point,
} from './types';
