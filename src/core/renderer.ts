/**
 * Rich-text HTML renderer for marked.
 *
 * Produces HTML that survives a trip through the clipboard into word
 * processors, mail and chat clients:
 *
 * - Inline styles from a {@link StyleTemplate}, never classes
 * - Fenced code highlighted with highlight.js and inlined token colors
 * - Table borders on every cell (pasted tables otherwise lose them)
 * - No `<p>` inside `<li>` (most targets render it as an extra blank line)
 */

import {
  Marked,
  type Renderer,
  type RendererObject,
  type Token,
  type Tokens,
  type TokensList,
} from 'marked';

import { highlightCode, inlineTokenStyles, isKnownLanguage } from './highlighter';
import { getStyleTemplate, styleAttr, STYLE_TEMPLATES } from './styles';
import type { StyleTemplate } from './styles';

const ENTITY_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ENTITY_MAP[ch] ?? ch);
}

/** Like {@link escapeHtml}, but leaves existing entities such as `&lt;` intact. */
function escapeOnce(text: string): string {
  return text.replace(/&(?!#?\w+;)|[<>"']/g, (ch) => ENTITY_MAP[ch] ?? ch);
}

const UNSAFE_HREF_RE = /^\s*(?:javascript|vbscript|data)\s*:/i;

/**
 * Render a code block body for `template`: highlighted when the fence names
 * a language highlight.js knows, escaped verbatim otherwise.
 */
export function renderCodeBlock(code: string, template: StyleTemplate, lang?: string): string {
  const body = lang && isKnownLanguage(lang)
    ? inlineTokenStyles(highlightCode(code, lang).html, template.codeTheme)
    : escapeHtml(code);
  return `<pre${styleAttr(template, 'pre')}><code>${body}</code></pre>\n`;
}

/**
 * Build marked renderer overrides bound to a style template.
 *
 * Methods run with `this` bound to marked's internal `Renderer`, so
 * `this.parser` is available for nested content.
 */
function createRendererOverrides(template: StyleTemplate): RendererObject {
  const attr = (element: string): string => styleAttr(template, element);

  return {
    heading(this: Renderer, { tokens, depth }: Tokens.Heading): string {
      return `<h${depth}${attr(`h${depth}`)}>${this.parser.parseInline(tokens)}</h${depth}>\n`;
    },

    code({ text, lang }: Tokens.Code): string {
      // Only the first word of the info string names the language.
      const language = lang?.trim().split(/\s+/)[0] || undefined;
      return renderCodeBlock(text, template, language);
    },

    blockquote(this: Renderer, { tokens }: Tokens.Blockquote): string {
      return `<blockquote${attr('blockquote')}>${this.parser.parse(tokens)}</blockquote>\n`;
    },

    hr(): string {
      return `<hr${attr('hr')} />\n`;
    },

    list(this: Renderer, token: Tokens.List): string {
      const tag = token.ordered ? 'ol' : 'ul';
      const startAttr =
        token.ordered && typeof token.start === 'number' && token.start !== 1
          ? ` start="${String(token.start)}"`
          : '';
      const body = token.items.map((item) => this.listitem(item)).join('');
      return `<${tag}${startAttr}${attr(tag)}>\n${body}</${tag}>\n`;
    },

    listitem(this: Renderer, item: Tokens.ListItem): string {
      let content = '';
      for (const tok of item.tokens) {
        if (tok.type === 'paragraph' || tok.type === 'text') {
          const inline = (tok as Tokens.Paragraph | Tokens.Text).tokens;
          content += inline ? this.parser.parseInline(inline) : escapeHtml(tok.raw);
        } else {
          content += this.parser.parse([tok]);
        }
      }
      if (item.task) {
        content = (item.checked ? '&#9745; ' : '&#9744; ') + content;
      }
      return `<li${attr('li')}>${content}</li>\n`;
    },

    paragraph(this: Renderer, { tokens }: Tokens.Paragraph): string {
      return `<p${attr('p')}>${this.parser.parseInline(tokens)}</p>\n`;
    },

    table(this: Renderer, token: Tokens.Table): string {
      const cell = (c: Tokens.TableCell): string => {
        const tag = c.header ? 'th' : 'td';
        const align = c.align ? ` align="${c.align}"` : '';
        return `<${tag}${attr(tag)}${align}>${this.parser.parseInline(c.tokens)}</${tag}>`;
      };

      const head = `<thead>\n<tr>${token.header.map(cell).join('')}</tr>\n</thead>\n`;
      const rows = token.rows.map((row) => `<tr>${row.map(cell).join('')}</tr>\n`).join('');
      const body = rows ? `<tbody>\n${rows}</tbody>\n` : '';
      return `<table${attr('table')}>\n${head}${body}</table>\n`;
    },

    strong(this: Renderer, { tokens }: Tokens.Strong): string {
      return `<strong>${this.parser.parseInline(tokens)}</strong>`;
    },

    em(this: Renderer, { tokens }: Tokens.Em): string {
      return `<em>${this.parser.parseInline(tokens)}</em>`;
    },

    codespan({ text }: Tokens.Codespan): string {
      // Depending on the marked release the lexer may already have escaped it.
      return `<code${attr('inline-code')}>${escapeOnce(text)}</code>`;
    },

    del(this: Renderer, { tokens }: Tokens.Del): string {
      return `<del>${this.parser.parseInline(tokens)}</del>`;
    },

    link(this: Renderer, { href, title, tokens }: Tokens.Link): string {
      const text = this.parser.parseInline(tokens);
      const titleAttr = title ? ` title="${escapeHtml(title)}"` : '';
      const safeHref = UNSAFE_HREF_RE.test(href) ? '' : escapeHtml(href);
      return `<a href="${safeHref}"${titleAttr}${attr('a')}>${text}</a>`;
    },

    image({ href, title, text }: Tokens.Image): string {
      const altAttr = text ? ` alt="${escapeHtml(text)}"` : '';
      const titleAttr = title ? ` title="${escapeHtml(title)}"` : '';
      return `<img src="${escapeHtml(href)}"${altAttr}${titleAttr} />`;
    },

    br(): string {
      return '<br />';
    },

    space(): string {
      return '';
    },

    html({ text }: Tokens.HTML | Tokens.Tag): string {
      // Raw HTML passes through; sanitizeHtml() runs on the final output.
      return text;
    },
  };
}

/**
 * Markdown renderer for one style template.
 *
 * @example
 * ```ts
 * const renderer = new RichTextRenderer('enhanced');
 * renderer.render('# Hello **world**');
 * ```
 */
export class RichTextRenderer {
  readonly template: StyleTemplate;
  private readonly marked: Marked;

  constructor(template: StyleTemplate | string = STYLE_TEMPLATES.minimal) {
    this.template = typeof template === 'string' ? getStyleTemplate(template) : template;
    this.marked = new Marked({ gfm: true, renderer: createRendererOverrides(this.template) });
  }

  /** Convert raw Markdown to HTML. */
  render(markdown: string): string {
    return this.marked.parse(markdown, { async: false }) as string;
  }

  /** Render a pre-lexed token list. */
  renderTokens(tokens: Token[] | TokensList): string {
    return this.marked.parser(tokens) as string;
  }
}

const renderers = new Map<string, RichTextRenderer>();

function rendererFor(templateName: string): RichTextRenderer {
  let renderer = renderers.get(templateName);
  if (!renderer) {
    renderer = new RichTextRenderer(templateName);
    renderers.set(templateName, renderer);
  }
  return renderer;
}

/**
 * Render a pre-lexed token list with a named style template.
 *
 * @example
 * ```ts
 * import { Lexer } from 'marked';
 *
 * renderToHtml(Lexer.lex('# Hello **world**'));
 * // => '<h1>Hello <strong>world</strong></h1>\n'
 * ```
 */
export function renderToHtml(tokens: Token[] | TokensList, templateName = 'minimal'): string {
  return rendererFor(templateName).renderTokens(tokens);
}

/** Convert raw Markdown to HTML in one call. */
export function markdownToHtml(markdown: string, templateName = 'minimal'): string {
  return rendererFor(templateName).render(markdown);
}
