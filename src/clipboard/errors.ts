/**
 * Error types raised by the clipboard codec, the platform writers and the
 * configuration loader.
 *
 * Every error extends {@link RichClipError} so callers (the CLI in
 * particular) can tell an expected operational failure from a bug.
 */

/** Base class for all errors raised by rich-clip. */
export class RichClipError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RichClipError';
  }
}

/** Clipboard container text matches neither header grammar. */
export class ParseError extends RichClipError {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/** A fragment or selection is not a literal substring of its document. */
export class NotFoundError extends RichClipError {
  constructor(
    public readonly needle: 'fragment' | 'selection',
    message: string,
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Offsets (or a line region) violate their ordering or bounds. */
export class InvalidRangeError extends RichClipError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

/** An external clipboard command could not be launched or exited non-zero. */
export class ProcessError extends RichClipError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    message: string,
  ) {
    super(message);
    this.name = 'ProcessError';
  }
}

/** The requested operation has no implementation on this OS. */
export class UnsupportedPlatformError extends RichClipError {
  constructor(
    public readonly platform: string,
    message: string,
  ) {
    super(message);
    this.name = 'UnsupportedPlatformError';
  }
}

/** The configuration file or an override failed validation. */
export class ConfigError extends RichClipError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
