/**
 * {@link DocumentContext} over a Markdown document.
 *
 * Elements are found by scanning the source once on construction:
 *
 * - `$$...$$` and `$...$` are math (not inside code spans or fences)
 * - `[text](target)` and `![alt](target)` are links and images
 * - `<img src="...">` tags are overlays, as are rendered math previews
 *
 * @module image/markdown-context
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { InvalidRangeError, RichClipError } from '../clipboard/errors';
import type { MathRenderer } from './math-renderer';
import type {
  ContextElement,
  DocumentContext,
  ElementKind,
  LinkTarget,
  OverlayDisplay,
  Point,
} from './types';

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

const CODE_RE = /```[\s\S]*?```|`[^`\n]+`/g;

/** Display math, then inline math that is not a price such as `$5`. */
const MATH_RE = /\$\$[\s\S]+?\$\$|(?<![\\$\d])\$[^\s$](?:[^$\n]*?[^\s$])?\$(?!\d)/g;

const LINK_RE = /(!?)\[([^\]\n]*)\]\(\s*<?([^)\s>]+)>?(?:\s+(?:"[^"]*"|'[^']*'))?\s*\)/g;

const IMG_TAG_RE = /<img\b[^>]*?\bsrc\s*=\s*(?:"([^"]*)"|'([^']*)')[^>]*>/gi;

const SCHEME_RE = /^([a-zA-Z][a-zA-Z0-9+.-]*):(.*)$/s;
const WINDOWS_DRIVE_RE = /^[a-zA-Z]:[\\/]/;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Span {
  start: number;
  end: number;
}

interface ElementSpan extends Span {
  kind: ElementKind;
  value: string;
  /** Link target for `link` and `image` spans. */
  target?: string;
}

interface OverlaySpan extends Span {
  file: string;
}

function contains(span: Span, point: Point): boolean {
  return span.start <= point && point < span.end;
}

function overlaps(span: Span, others: readonly Span[]): boolean {
  return others.some((other) => span.start < other.end && other.start < span.end);
}

function* matchAll(re: RegExp, source: string): Generator<RegExpExecArray> {
  re.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = re.exec(source)) !== null) {
    yield match;
  }
}

function decodePath(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Not percent-encoded after all (a literal `%` in a file name).
    return value;
  }
}

function fileUrlToPath(url: string): string {
  try {
    return fileURLToPath(url);
  } catch {
    // Non-local host or malformed URL: keep the path part as written.
    return decodePath(url.replace(/^file:\/\//i, ''));
  }
}

/**
 * Split a Markdown link target into scheme and path. Bare paths (and
 * Windows drive paths) are `file` links.
 *
 * @example
 * ```ts
 * parseLinkTarget('attachment:plot.png'); // { scheme: 'attachment', path: 'plot.png' }
 * parseLinkTarget('img/a%20b.png');       // { scheme: 'file', path: 'img/a b.png' }
 * ```
 */
export function parseLinkTarget(target: string): LinkTarget {
  if (/^file:\/\//i.test(target)) {
    return { scheme: 'file', path: fileUrlToPath(target) };
  }

  const scheme = SCHEME_RE.exec(target);
  if (scheme && !WINDOWS_DRIVE_RE.test(target)) {
    return { scheme: scheme[1].toLowerCase(), path: decodePath(scheme[2]) };
  }

  return { scheme: 'file', path: decodePath(target) };
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export interface MarkdownContextOptions {
  /** Attachment directory, relative to the document. */
  attachmentDir?: string;
  /** Needed only when a formula preview is requested. */
  mathRenderer?: MathRenderer;
}

export class MarkdownDocumentContext implements DocumentContext {
  readonly directory: string;
  private readonly attachmentDir: string;
  private readonly mathRenderer?: MathRenderer;
  private readonly lineStarts: number[];
  private readonly elements: ElementSpan[] = [];
  private readonly inlineImages: OverlaySpan[] = [];
  private readonly previews: OverlaySpan[] = [];

  constructor(
    private readonly source: string,
    filePath: string,
    options: MarkdownContextOptions = {},
  ) {
    this.directory = path.dirname(path.resolve(filePath));
    this.attachmentDir = options.attachmentDir ?? 'attachments';
    this.mathRenderer = options.mathRenderer;

    this.lineStarts = [0];
    for (let i = 0; i < source.length; i++) {
      if (source[i] === '\n') this.lineStarts.push(i + 1);
    }

    this.scan();
  }

  /** Read a Markdown file and build its context. */
  static fromFile(filePath: string, options: MarkdownContextOptions = {}): MarkdownDocumentContext {
    return new MarkdownDocumentContext(fs.readFileSync(filePath, 'utf8'), filePath, options);
  }

  private scan(): void {
    const code: Span[] = [];
    for (const m of matchAll(CODE_RE, this.source)) {
      code.push({ start: m.index, end: m.index + m[0].length });
    }

    for (const m of matchAll(MATH_RE, this.source)) {
      const span = { start: m.index, end: m.index + m[0].length };
      if (!overlaps(span, code)) {
        this.elements.push({ ...span, kind: 'math', value: m[0] });
      }
    }

    for (const m of matchAll(LINK_RE, this.source)) {
      const span = { start: m.index, end: m.index + m[0].length };
      if (!overlaps(span, code)) {
        this.elements.push({
          ...span,
          kind: m[1] === '!' ? 'image' : 'link',
          value: m[0],
          target: m[3],
        });
      }
    }

    for (const m of matchAll(IMG_TAG_RE, this.source)) {
      const span = { start: m.index, end: m.index + m[0].length };
      if (overlaps(span, code)) continue;
      this.elements.push({ ...span, kind: 'html', value: m[0] });

      const link = parseLinkTarget(m[1] ?? m[2] ?? '');
      if (link.scheme === 'file') {
        this.inlineImages.push({ ...span, file: path.resolve(this.directory, link.path) });
      }
    }
  }

  /**
   * Convert a 1-based line and column to a {@link Point}.
   *
   * @throws {InvalidRangeError} When the position is outside the document.
   */
  offsetAt(line: number, column: number): Point {
    if (!Number.isInteger(line) || line < 1 || line > this.lineStarts.length) {
      throw new InvalidRangeError(`Line ${line} is outside the document (1..${this.lineStarts.length})`);
    }
    const start = this.lineStarts[line - 1];
    const next = this.lineStarts[line] ?? this.source.length + 1;
    const width = next - start;
    if (!Number.isInteger(column) || column < 1 || column > width) {
      throw new InvalidRangeError(`Column ${column} is outside line ${line} (1..${width})`);
    }
    return start + column - 1;
  }

  elementAt(point: Point): ContextElement | null {
    const span = this.elements.find((element) => contains(element, point));
    if (!span) return null;
    return { kind: span.kind, start: span.start, end: span.end, value: span.value };
  }

  linkAt(point: Point): LinkTarget | null {
    for (const element of this.elements) {
      if (element.target !== undefined && contains(element, point)) {
        return parseLinkTarget(element.target);
      }
    }
    return null;
  }

  resolveAttachment(name: string): string | null {
    const file = path.resolve(this.directory, this.attachmentDir, name);
    return fs.existsSync(file) ? file : null;
  }

  overlayDisplayAt(point: Point): OverlayDisplay | null {
    // Most recent preview first.
    for (let i = this.previews.length - 1; i >= 0; i--) {
      if (contains(this.previews[i], point)) return { file: this.previews[i].file };
    }
    const inline = this.inlineImages.find((span) => contains(span, point));
    return inline ? { file: inline.file } : null;
  }

  async previewMath(element: ContextElement, scale: number): Promise<void> {
    if (!this.mathRenderer) {
      throw new RichClipError('No math renderer is configured for formula previews');
    }
    const file = await this.mathRenderer.render(element.value, scale);
    this.previews.push({ start: element.start, end: element.end, file });
  }
}
