/**
 * Line-region selection.
 *
 * @module core/region
 */

import { InvalidRangeError } from '../clipboard/errors';

/** 1-based, inclusive line range. */
export interface LineRegion {
  startLine: number;
  endLine: number;
}

/**
 * Return the lines `startLine..endLine` of `source`, joined with `\n`.
 * Without a region the whole source is returned.
 *
 * @throws {InvalidRangeError} When the region is reversed or lies outside
 *   the source.
 */
export function selectRegion(source: string, region?: LineRegion): string {
  if (!region) return source;

  const lines = source.split(/\r?\n/);
  const { startLine, endLine } = region;
  if (!Number.isInteger(startLine) || !Number.isInteger(endLine) || startLine < 1 || startLine > endLine) {
    throw new InvalidRangeError(`Invalid line region ${startLine}:${endLine}`);
  }
  if (endLine > lines.length) {
    throw new InvalidRangeError(
      `Line region ${startLine}:${endLine} is outside the document (${lines.length} lines)`,
    );
  }

  return lines.slice(startLine - 1, endLine).join('\n');
}

/**
 * Parse `A:B` (or a single line `A`) into a region.
 *
 * @throws {InvalidRangeError} For anything else.
 */
export function parseLineRegion(text: string): LineRegion {
  const match = /^(\d+)(?::(\d+))?$/.exec(text.trim());
  if (!match) {
    throw new InvalidRangeError(`Expected a line region like 3:10, got "${text}"`);
  }
  const startLine = Number(match[1]);
  const endLine = match[2] === undefined ? startLine : Number(match[2]);
  return { startLine, endLine };
}
