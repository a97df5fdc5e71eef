/**
 * Encoder and decoder for the Windows clipboard "HTML Format" container.
 *
 * The container is a plain-text header of byte offsets followed by a full
 * HTML document:
 *
 * ```text
 * Version:0.9
 * StartHTML:000000183
 * EndHTML:000000333
 * StartFragment:000000292
 * EndFragment:000000301
 * StartSelection:000000292
 * EndSelection:000000301
 * SourceURL:https://example.com/
 * <!DOCTYPE ...>
 * <HTML><HEAD></HEAD><BODY><!--StartFragment--><b>hi</b><!--EndFragment--></BODY></HTML>
 * ```
 *
 * Every line ends in CRLF. Offsets count UTF-8 bytes from the first byte of
 * the header, so the header has to know its own length before it can be
 * written. Offsets are zero-padded to a fixed width, which makes that length
 * independent of the offset values.
 *
 * @module clipboard/html-format
 */

import { InvalidRangeError, NotFoundError, ParseError } from './errors';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Version string written by the encoder. */
export const HTML_FORMAT_VERSION = '0.9';

/** Width of every zero-padded offset field. */
const OFFSET_WIDTH = 9;

/** Largest offset expressible in {@link OFFSET_WIDTH} digits. */
const MAX_OFFSET = 10 ** OFFSET_WIDTH - 1;

export const START_FRAGMENT_MARKER = '<!--StartFragment-->';
export const END_FRAGMENT_MARKER = '<!--EndFragment-->';

const DEFAULT_DOCTYPE =
  '<!DOCTYPE HTML PUBLIC "-//W3C//DTD HTML 4.0 Transitional//EN">';

/** Header with explicit StartSelection/EndSelection fields. */
const EXTENDED_HEADER_RE =
  /^Version:(\S+)\r?\nStartHTML:(\d+)\r?\nEndHTML:(\d+)\r?\nStartFragment:(\d+)\r?\nEndFragment:(\d+)\r?\nStartSelection:(\d+)\r?\nEndSelection:(\d+)\r?\nSourceURL:([^\r\n]*)(?:\r?\n|$)/;

/** Header without selection fields; the selection equals the fragment. */
const BASIC_HEADER_RE =
  /^Version:(\S+)\r?\nStartHTML:(\d+)\r?\nEndHTML:(\d+)\r?\nStartFragment:(\d+)\r?\nEndFragment:(\d+)\r?\nSourceURL:([^\r\n]*)(?:\r?\n|$)/;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Parsed (or to-be-written) marker header. All offsets are absolute bytes. */
export interface MarkerHeader {
  version: string;
  startHtml: number;
  endHtml: number;
  startFragment: number;
  endFragment: number;
  startSelection: number;
  endSelection: number;
  sourceUrl: string;
}

/**
 * Byte offsets of the fragment and selection within the HTML document
 * (not the container). The selection defaults to the fragment.
 */
export interface HtmlFormatRange {
  fragmentStart: number;
  fragmentEnd: number;
  selectionStart?: number;
  selectionEnd?: number;
}

export interface EncodeFragmentOptions {
  /** Full document that contains the fragment. Defaults to a minimal skeleton. */
  template?: string;
  /** Originally selected text. Defaults to the fragment. */
  selection?: string;
  /** Provenance URL written to `SourceURL`. */
  source?: string;
}

export interface DecodedHtmlFormat {
  version: string;
  html: string;
  fragment: string;
  selection: string;
  source: string;
  header: MarkerHeader;
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function pad(offset: number): string {
  return String(offset).padStart(OFFSET_WIDTH, '0');
}

function renderHeader(header: MarkerHeader): string {
  return (
    `Version:${header.version}\r\n` +
    `StartHTML:${pad(header.startHtml)}\r\n` +
    `EndHTML:${pad(header.endHtml)}\r\n` +
    `StartFragment:${pad(header.startFragment)}\r\n` +
    `EndFragment:${pad(header.endFragment)}\r\n` +
    `StartSelection:${pad(header.startSelection)}\r\n` +
    `EndSelection:${pad(header.endSelection)}\r\n` +
    `SourceURL:${header.sourceUrl}\r\n`
  );
}

function checkSpan(label: string, start: number, end: number, length: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new InvalidRangeError(`${label} offsets must be integers (got ${start}..${end})`);
  }
  if (start < 0 || start > end || end > length) {
    throw new InvalidRangeError(
      `${label} offsets ${start}..${end} are outside the document (0..${length})`,
    );
  }
}

/**
 * Wrap a fragment in the default HTML skeleton used when no template
 * document is supplied.
 */
export function wrapFragment(fragment: string): string {
  return (
    `${DEFAULT_DOCTYPE}\r\n` +
    `<HTML><HEAD></HEAD><BODY>${START_FRAGMENT_MARKER}${fragment}${END_FRAGMENT_MARKER}</BODY></HTML>`
  );
}

/**
 * Encode a document into an "HTML Format" container.
 *
 * `range` holds UTF-8 byte offsets into `document`. The header is rendered
 * twice: once with every offset at zero to measure its byte length, then
 * again with every offset shifted by that length.
 *
 * @throws {InvalidRangeError} When an offset is out of bounds or the ordering
 *   `start <= end` is violated.
 */
export function encodeHtmlFormat(
  document: string,
  range: HtmlFormatRange,
  source = '',
): string {
  const documentLength = Buffer.byteLength(document, 'utf8');
  const selectionStart = range.selectionStart ?? range.fragmentStart;
  const selectionEnd = range.selectionEnd ?? range.fragmentEnd;

  checkSpan('Fragment', range.fragmentStart, range.fragmentEnd, documentLength);
  checkSpan('Selection', selectionStart, selectionEnd, documentLength);

  // A line break in SourceURL would end the header early.
  const sourceUrl = source.replace(/[\r\n]+/g, '');

  const probe = renderHeader({
    version: HTML_FORMAT_VERSION,
    startHtml: 0,
    endHtml: 0,
    startFragment: 0,
    endFragment: 0,
    startSelection: 0,
    endSelection: 0,
    sourceUrl,
  });
  const headerLength = Buffer.byteLength(probe, 'utf8');

  if (documentLength + headerLength > MAX_OFFSET) {
    throw new InvalidRangeError(
      `Document of ${documentLength} bytes does not fit ${OFFSET_WIDTH}-digit offsets`,
    );
  }

  const header = renderHeader({
    version: HTML_FORMAT_VERSION,
    startHtml: headerLength,
    endHtml: documentLength + headerLength,
    startFragment: range.fragmentStart + headerLength,
    endFragment: range.fragmentEnd + headerLength,
    startSelection: selectionStart + headerLength,
    endSelection: selectionEnd + headerLength,
    sourceUrl,
  });

  return header + document;
}

function byteOffset(text: string, charIndex: number): number {
  return Buffer.byteLength(text.slice(0, charIndex), 'utf8');
}

/**
 * Encode an HTML fragment, locating it (and the selection) inside a
 * template document by literal search.
 *
 * The fragment search starts after `<!--StartFragment-->` when the document
 * has one, and falls back to the whole document. An explicit selection is
 * searched from the fragment start first.
 *
 * @throws {NotFoundError} When the fragment or selection does not occur in
 *   the document.
 *
 * @example
 * ```ts
 * const container = encodeHtmlFragment('<p>hi</p>', { source: 'http://x' });
 * decodeHtmlFormat(container).fragment; // '<p>hi</p>'
 * ```
 */
export function encodeHtmlFragment(
  fragment: string,
  options: EncodeFragmentOptions = {},
): string {
  const document = options.template ?? wrapFragment(fragment);

  const marker = document.indexOf(START_FRAGMENT_MARKER);
  let fragmentIndex =
    marker === -1 ? -1 : document.indexOf(fragment, marker + START_FRAGMENT_MARKER.length);
  if (fragmentIndex === -1) {
    fragmentIndex = document.indexOf(fragment);
  }
  if (fragmentIndex === -1) {
    throw new NotFoundError('fragment', 'Fragment does not occur in the HTML document');
  }
  const fragmentEndIndex = fragmentIndex + fragment.length;

  let selectionIndex = fragmentIndex;
  let selectionEndIndex = fragmentEndIndex;
  if (options.selection !== undefined) {
    selectionIndex = document.indexOf(options.selection, fragmentIndex);
    if (selectionIndex === -1) {
      selectionIndex = document.indexOf(options.selection);
    }
    if (selectionIndex === -1) {
      throw new NotFoundError('selection', 'Selection does not occur in the HTML document');
    }
    selectionEndIndex = selectionIndex + options.selection.length;
  }

  return encodeHtmlFormat(
    document,
    {
      fragmentStart: byteOffset(document, fragmentIndex),
      fragmentEnd: byteOffset(document, fragmentEndIndex),
      selectionStart: byteOffset(document, selectionIndex),
      selectionEnd: byteOffset(document, selectionEndIndex),
    },
    options.source,
  );
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function parseHeader(text: string): MarkerHeader | null {
  const extended = EXTENDED_HEADER_RE.exec(text);
  if (extended) {
    return {
      version: extended[1],
      startHtml: Number(extended[2]),
      endHtml: Number(extended[3]),
      startFragment: Number(extended[4]),
      endFragment: Number(extended[5]),
      startSelection: Number(extended[6]),
      endSelection: Number(extended[7]),
      sourceUrl: extended[8],
    };
  }

  const basic = BASIC_HEADER_RE.exec(text);
  if (basic) {
    const startFragment = Number(basic[4]);
    const endFragment = Number(basic[5]);
    return {
      version: basic[1],
      startHtml: Number(basic[2]),
      endHtml: Number(basic[3]),
      startFragment,
      endFragment,
      startSelection: startFragment,
      endSelection: endFragment,
      sourceUrl: basic[6],
    };
  }

  return null;
}

function checkHeader(header: MarkerHeader, length: number): void {
  const { startHtml, endHtml, startFragment, endFragment, startSelection, endSelection } = header;
  if (endHtml > length) {
    throw new ParseError(`EndHTML ${endHtml} lies beyond the container (${length} bytes)`);
  }
  if (!(startHtml <= startFragment && startFragment <= endFragment && endFragment <= endHtml)) {
    throw new ParseError(
      `Fragment offsets ${startFragment}..${endFragment} are outside HTML ${startHtml}..${endHtml}`,
    );
  }
  if (!(startHtml <= startSelection && startSelection <= endSelection && endSelection <= endHtml)) {
    throw new ParseError(
      `Selection offsets ${startSelection}..${endSelection} are outside HTML ${startHtml}..${endHtml}`,
    );
  }
}

/**
 * Decode an "HTML Format" container.
 *
 * The extended header grammar (with selection fields) is tried before the
 * basic one. Document, fragment and selection are sliced from the raw
 * container bytes at the header's absolute offsets.
 *
 * @throws {ParseError} When neither grammar matches or the offsets do not
 *   describe a valid span of the container.
 */
export function decodeHtmlFormat(container: string | Buffer): DecodedHtmlFormat {
  const bytes = typeof container === 'string' ? Buffer.from(container, 'utf8') : container;
  const text = typeof container === 'string' ? container : container.toString('utf8');

  const header = parseHeader(text);
  if (!header) {
    throw new ParseError('Clipboard data does not start with an HTML Format header');
  }
  checkHeader(header, bytes.length);

  const slice = (start: number, end: number): string =>
    bytes.subarray(start, end).toString('utf8');

  return {
    version: header.version,
    html: slice(header.startHtml, header.endHtml),
    fragment: slice(header.startFragment, header.endFragment),
    selection: slice(header.startSelection, header.endSelection),
    source: header.sourceUrl,
    header,
  };
}
