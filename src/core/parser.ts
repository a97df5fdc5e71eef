/**
 * Markdown parser.
 *
 * Lexes Markdown with `marked` and collects document metadata in a single
 * walk over the token tree.
 *
 * @module core/parser
 */
import { marked } from 'marked';
import type { Token, Tokens } from 'marked';
import type { ParserOptions, ParseResult, ParseMetadata } from './types';

/** Child token lists of a token, whatever its shape. */
function childTokens(token: Token): Token[][] {
  const children: Token[][] = [];

  if ('tokens' in token && Array.isArray(token.tokens)) {
    children.push(token.tokens);
  }
  if (token.type === 'list') {
    children.push((token as Tokens.List).items as Token[]);
  }
  if (token.type === 'table') {
    const table = token as Tokens.Table;
    for (const cell of [...table.header, ...table.rows.flat()]) {
      children.push(cell.tokens);
    }
  }

  return children;
}

function walkTokens(tokens: Token[], visitor: (token: Token) => void): void {
  for (const token of tokens) {
    visitor(token);
    for (const children of childTokens(token)) {
      walkTokens(children, visitor);
    }
  }
}

function emptyMetadata(): ParseMetadata {
  return { hasCodeBlocks: false, languages: [], hasTables: false, hasImages: false, hasMath: false };
}

function extractMetadata(tokens: Token[]): ParseMetadata {
  const metadata = emptyMetadata();
  const languages = new Set<string>();

  walkTokens(tokens, (token) => {
    switch (token.type) {
      case 'code': {
        const lang = (token as Tokens.Code).lang?.trim().split(/\s+/)[0];
        if (lang === 'math') {
          metadata.hasMath = true;
        } else {
          metadata.hasCodeBlocks = true;
          if (lang) languages.add(lang);
        }
        break;
      }
      case 'table':
        metadata.hasTables = true;
        break;
      case 'image':
        metadata.hasImages = true;
        break;
      case 'html':
        if (/<img\b/i.test(token.raw)) metadata.hasImages = true;
        break;
      default:
        break;
    }
  });

  metadata.languages = Array.from(languages);
  return metadata;
}

/**
 * Parse Markdown into tokens plus metadata.
 *
 * GFM is on by default. Whitespace-only input yields no tokens.
 *
 * @example
 * ```ts
 * parseMarkdown('# Hello\n\nWorld').tokens[0].type; // 'heading'
 * ```
 */
export function parseMarkdown(markdown: string, options?: ParserOptions): ParseResult {
  if (markdown.trim().length === 0) {
    return { tokens: [], metadata: emptyMetadata() };
  }

  const tokens: Token[] = marked.lexer(markdown, {
    gfm: options?.gfm ?? true,
    breaks: options?.breaks ?? false,
  });

  return { tokens, metadata: extractMetadata(tokens) };
}
