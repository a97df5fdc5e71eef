/**
 * Markdown preprocessor.
 *
 * Rewrites constructs that paste targets cannot display before the
 * Markdown reaches the parser. Code spans and fences are never touched.
 *
 * @module core/preprocessor
 */

const PLACEHOLDER_RE = /\x00CODE(\d+)\x00/g;

/** Collapse runs of three or more newlines into one blank line. */
function normalizeBlankLines(markdown: string): string {
  return markdown.replace(/\n{3,}/g, '\n\n');
}

/**
 * Turn TeX math into code, which every target can show.
 *
 * - `$$...$$` becomes a fenced block tagged `math`
 * - `$...$` becomes inline code, unless it looks like a price (`$5`)
 *
 * Use the image command to copy a rendered formula instead.
 */
function convertMathToCode(markdown: string): string {
  const result = markdown.replace(
    /\$\$([\s\S]*?)\$\$/g,
    (_match, expr: string) => `\`\`\`math\n${expr.trim()}\n\`\`\``,
  );
  return result.replace(
    /(?<![\\$\d])\$([^\s$](?:[^$\n]*?[^\s$])?)\$(?!\d)/g,
    (_match, expr: string) => `\`${expr}\``,
  );
}

/** `- [x]` and `- [ ]` become ballot-box glyphs. */
function convertCheckboxes(markdown: string): string {
  return markdown
    .replace(/^(\s*[-*+]\s)\[[xX]\]/gm, '$1☑')
    .replace(/^(\s*[-*+]\s)\[ \]/gm, '$1☐');
}

/**
 * Inline footnotes: `text[^1]` with `[^1]: note` becomes `text (*note*)`.
 * Undefined references are left alone.
 */
function inlineFootnotes(markdown: string): string {
  const notes = new Map<string, string>();
  const body = markdown.replace(/^\[\^([\w-]+)\]:[ \t]*(.+)$\n?/gm, (_match, id: string, text: string) => {
    notes.set(id, text.trim());
    return '';
  });
  if (notes.size === 0) return markdown;

  return body.replace(/\[\^([\w-]+)\]/g, (match, id: string) => {
    const note = notes.get(id);
    return note === undefined ? match : ` (*${note}*)`;
  });
}

/**
 * Apply every transformation, in order: blank lines, math, checkboxes,
 * footnotes. Math must go before parsing because `$` is plain text to
 * marked.
 */
export function preprocessMarkdown(markdown: string): string {
  const protectedCode: string[] = [];
  const protect = (match: string): string => {
    protectedCode.push(match);
    return `\x00CODE${protectedCode.length - 1}\x00`;
  };

  let result = markdown.replace(/```[\s\S]*?```/g, protect).replace(/`[^`\n]+`/g, protect);

  result = normalizeBlankLines(result);
  result = convertMathToCode(result);
  result = convertCheckboxes(result);
  result = inlineFootnotes(result);

  return result.replace(PLACEHOLDER_RE, (_match, idx: string) => protectedCode[Number(idx)]);
}
