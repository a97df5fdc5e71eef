/**
 * Types for the Markdown parsing stage.
 */
import type { Token } from 'marked';

/** A token from the marked lexer, re-exported so callers need not import marked. */
export type ParsedToken = Token;

export interface ParserOptions {
  /**
   * GitHub Flavored Markdown (tables, strikethrough, task lists).
   * @default true
   */
  gfm?: boolean;

  /**
   * Treat single newlines as `<br>`.
   * @default false
   */
  breaks?: boolean;
}

export interface ParseMetadata {
  hasCodeBlocks: boolean;
  /** Distinct fence languages, in order of first use. */
  languages: string[];
  hasTables: boolean;
  hasImages: boolean;
  /** Whether display math (as produced by the preprocessor) is present. */
  hasMath: boolean;
}

export interface ParseResult {
  tokens: Token[];
  metadata: ParseMetadata;
}
