/**
 * HTML sanitizer for exported fragments.
 *
 * Raw HTML in a Markdown source ends up on the clipboard verbatim, and some
 * paste targets (mail clients, web chat) render it. This strips the
 * constructs that could run script or pull remote content, and leaves the
 * rest of the markup as it is.
 */

/** Elements removed together with their content. */
const BLOCKED_TAGS = [
  'script',
  'iframe',
  'frame',
  'frameset',
  'embed',
  'object',
  'applet',
  'style',
  'link',
  'form',
  'base',
  'meta',
  'svg',
  'math',
  'template',
] as const;

type Rule = (html: string) => string;

/** Paired and orphaned forms of each blocked tag. */
const BLOCKED_TAG_RULES: Rule[] = BLOCKED_TAGS.flatMap((tag) => {
  const paired = new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}\\s*>`, 'gi');
  const single = new RegExp(`<\\/?${tag}\\b[^>]*>`, 'gi');
  return [(html: string) => html.replace(paired, ''), (html: string) => html.replace(single, '')];
});

const OPEN_TAG_RE = /<[a-z][^>]*>/gi;

/** `onclick="..."`, `onerror='...'`, `onload=x` */
const EVENT_HANDLER_RE = /\s+on[a-z]+\s*=\s*(?:"[^"]*"|'[^']*'|[^\s>]+)/gi;

/** URL-bearing attributes, quoted either way. */
const URL_ATTR_RE = /\b(href|src|action|formaction|xlink:href)\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;

const UNSAFE_SCHEME_RE = /^(?:javascript|vbscript|data):/i;

function decodeEntities(value: string): string {
  return value
    .replace(/&#x([0-9a-f]+);?/gi, (_m, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/&#(\d+);?/g, (_m, dec: string) => String.fromCharCode(parseInt(dec, 10)))
    .replace(/&colon;/gi, ':')
    .replace(/&tab;/gi, '')
    .replace(/&newline;/gi, '');
}

/** Scheme check that sees through entity encoding and embedded whitespace. */
function isUnsafeUrl(value: string): boolean {
  const normalized = decodeEntities(value).replace(/[\x00-\x20]+/g, '');
  return UNSAFE_SCHEME_RE.test(normalized);
}

const RULES: Rule[] = [
  (html) => html.replace(/\x00/g, ''),
  ...BLOCKED_TAG_RULES,
  (html) => html.replace(OPEN_TAG_RE, (tag) => tag.replace(EVENT_HANDLER_RE, '')),
  (html) =>
    html.replace(URL_ATTR_RE, (match, attr: string, dq: string | undefined, sq: string | undefined) => {
      const value = dq ?? sq ?? '';
      return isUnsafeUrl(value) ? `${attr}=""` : match;
    }),
];

/**
 * Remove script-capable HTML.
 *
 * 1. Blocked elements (`<script>`, `<iframe>`, `<style>`, ...) and their content
 * 2. `on*` event-handler attributes
 * 3. `javascript:`, `vbscript:` and `data:` URLs, including entity-encoded ones
 *
 * @example
 * ```ts
 * sanitizeHtml('<p onclick="alert(1)">hi</p>');
 * // => '<p>hi</p>'
 * ```
 */
export function sanitizeHtml(html: string): string {
  if (!html.includes('<')) return html;
  return RULES.reduce((result, rule) => rule(result), html);
}
