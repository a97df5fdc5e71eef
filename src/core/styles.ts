/**
 * Style templates for exported HTML.
 *
 * Pasted HTML loses any stylesheet, and most word processors and mail
 * clients drop `class` attributes, so every style is written inline. A
 * template maps element selectors to inline style strings and highlight.js
 * scopes to token colors.
 *
 * @module core/styles
 */

export const STYLE_TEMPLATE_NAMES = ['minimal', 'enhanced', 'document'] as const;

export type StyleTemplateName = (typeof STYLE_TEMPLATE_NAMES)[number];

export interface StyleTemplate {
  name: StyleTemplateName;
  label: string;
  description: string;
  /** Element selector (`h1`, `pre`, `inline-code`, ...) to inline style. */
  styles: Record<string, string>;
  /** highlight.js scope (`keyword`, `string`, ...) to inline style. */
  codeTheme: Record<string, string>;
}

const MONO = "font-family: Consolas, Menlo, 'Courier New', monospace;";

/** Light token colors, close to the GitHub light palette. */
const LIGHT_THEME: Record<string, string> = {
  keyword: 'color: #d73a49;',
  built_in: 'color: #e36209;',
  type: 'color: #d73a49;',
  literal: 'color: #005cc5;',
  number: 'color: #005cc5;',
  string: 'color: #032f62;',
  regexp: 'color: #032f62;',
  comment: 'color: #6a737d; font-style: italic;',
  doctag: 'color: #d73a49;',
  meta: 'color: #6a737d;',
  title: 'color: #6f42c1;',
  attr: 'color: #005cc5;',
  attribute: 'color: #005cc5;',
  variable: 'color: #e36209;',
  params: 'color: #24292e;',
  'template-variable': 'color: #e36209;',
  tag: 'color: #22863a;',
  name: 'color: #22863a;',
  'selector-tag': 'color: #22863a;',
  'selector-class': 'color: #6f42c1;',
  'selector-id': 'color: #6f42c1;',
  symbol: 'color: #005cc5;',
  section: 'color: #005cc5; font-weight: bold;',
  bullet: 'color: #735c0f;',
  emphasis: 'font-style: italic;',
  strong: 'font-weight: bold;',
  addition: 'color: #22863a; background-color: #f0fff4;',
  deletion: 'color: #b31d28; background-color: #ffeef0;',
};

/** Dark token colors for a dark code background. */
const DARK_THEME: Record<string, string> = {
  keyword: 'color: #569cd6;',
  built_in: 'color: #4ec9b0;',
  type: 'color: #4ec9b0;',
  literal: 'color: #569cd6;',
  number: 'color: #b5cea8;',
  string: 'color: #ce9178;',
  regexp: 'color: #d16969;',
  comment: 'color: #6a9955; font-style: italic;',
  doctag: 'color: #608b4e;',
  meta: 'color: #9b9b9b;',
  title: 'color: #dcdcaa;',
  attr: 'color: #9cdcfe;',
  attribute: 'color: #9cdcfe;',
  variable: 'color: #9cdcfe;',
  params: 'color: #9cdcfe;',
  'template-variable': 'color: #9cdcfe;',
  tag: 'color: #569cd6;',
  name: 'color: #569cd6;',
  'selector-tag': 'color: #d7ba7d;',
  'selector-class': 'color: #d7ba7d;',
  'selector-id': 'color: #d7ba7d;',
  symbol: 'color: #b5cea8;',
  section: 'color: #569cd6; font-weight: bold;',
  bullet: 'color: #d7ba7d;',
  emphasis: 'font-style: italic;',
  strong: 'font-weight: bold;',
  addition: 'color: #b5cea8;',
  deletion: 'color: #ce9178;',
};

const minimal: StyleTemplate = {
  name: 'minimal',
  label: 'Minimal',
  description: 'Leaves typography to the target application.',
  styles: {
    table: 'border-collapse: collapse;',
    'th,td': 'border: 1px solid #d0d7de; padding: 6px 12px;',
    blockquote: 'border-left: 4px solid #d0d7de; padding-left: 16px; color: #57606a;',
    pre: `background: #f6f8fa; color: #24292e; padding: 12px; ${MONO}`,
    'inline-code': `background: #f6f8fa; padding: 1px 4px; ${MONO}`,
  },
  codeTheme: LIGHT_THEME,
};

const enhanced: StyleTemplate = {
  name: 'enhanced',
  label: 'Enhanced',
  description: 'Dark code blocks and accented headings.',
  styles: {
    h1: 'font-size: 1.6em; font-weight: 700; border-bottom: 2px solid #0969da; padding-bottom: 4px;',
    h2: 'font-size: 1.4em; font-weight: 600; border-bottom: 1px solid #d0d7de; padding-bottom: 4px;',
    h3: 'font-size: 1.2em; font-weight: 600;',
    table: 'border-collapse: collapse; width: 100%;',
    'th,td': 'border: 1px solid #d0d7de; padding: 8px 12px;',
    th: 'background-color: #f6f8fa; font-weight: 600;',
    blockquote: 'border-left: 4px solid #0969da; padding: 8px 16px; color: #57606a; background: #f6f8fa;',
    pre: `background: #1e1e1e; color: #d4d4d4; padding: 16px; ${MONO}`,
    'inline-code': `background: #eff1f3; padding: 1px 4px; color: #0550ae; ${MONO}`,
    a: 'color: #0969da;',
  },
  codeTheme: DARK_THEME,
};

const document_: StyleTemplate = {
  name: 'document',
  label: 'Document',
  description: 'Serif body text and generous spacing for formal documents.',
  styles: {
    h1: 'font-size: 1.8em; font-weight: 700; margin: 16px 0 8px;',
    h2: 'font-size: 1.5em; font-weight: 600; margin: 14px 0 6px;',
    h3: 'font-size: 1.25em; font-weight: 600; margin: 12px 0 4px;',
    p: "margin: 8px 0; line-height: 1.7; font-family: Georgia, 'Times New Roman', serif;",
    li: "line-height: 1.7; font-family: Georgia, 'Times New Roman', serif;",
    table: 'border-collapse: collapse; width: 100%; margin: 12px 0;',
    'th,td': 'border: 1px solid #999; padding: 8px 10px;',
    th: 'background-color: #f2f2f2; font-weight: 600;',
    blockquote: 'border-left: 3px solid #999; padding-left: 20px; color: #555; font-style: italic;',
    pre: `background: #fafafa; color: #24292e; border: 1px solid #ddd; padding: 12px; ${MONO}`,
    'inline-code': `background: #f2f2f2; padding: 1px 4px; ${MONO}`,
    a: 'color: #1a4fb3; text-decoration: underline;',
  },
  codeTheme: LIGHT_THEME,
};

export const STYLE_TEMPLATES: Record<StyleTemplateName, StyleTemplate> = {
  minimal,
  enhanced,
  document: document_,
};

export function isStyleTemplateName(name: string): name is StyleTemplateName {
  return (STYLE_TEMPLATE_NAMES as readonly string[]).includes(name);
}

/** Get a style template by name, falling back to `minimal`. */
export function getStyleTemplate(name: string): StyleTemplate {
  return isStyleTemplateName(name) ? STYLE_TEMPLATES[name] : STYLE_TEMPLATES.minimal;
}

/**
 * Inline style for an element, including the shared `th,td` entry.
 * Returns an empty string when the template leaves the element unstyled.
 */
export function getElementStyle(template: StyleTemplate, element: string): string {
  const shared = element === 'th' || element === 'td' ? template.styles['th,td'] ?? '' : '';
  const own = template.styles[element] ?? '';
  return [shared, own].filter(Boolean).join(' ');
}

/** ` style="..."` attribute for an element, or an empty string. */
export function styleAttr(template: StyleTemplate, element: string): string {
  const style = getElementStyle(template, element);
  return style ? ` style="${style}"` : '';
}
