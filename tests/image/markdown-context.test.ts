import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { InvalidRangeError, RichClipError } from '../../src/clipboard/errors';
import { locateImage } from '../../src/image/locator';
import { MarkdownDocumentContext, parseLinkTarget } from '../../src/image/markdown-context';
import type { MathRenderer } from '../../src/image/math-renderer';

const SOURCE = [
  '# Notes',
  'See ![plot](img/plot.png) and [chart](attachment:chart.png).',
  'Formula $E=mc^2$ here, price $5 only.',
  '<img src="shown.gif" width="100">',
  'Code `$not math$` and [site](https://example.com/a.png).',
  '',
].join('\n');

let tmpDir: string;
let docPath: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rich-clip-md-'));
  docPath = path.join(tmpDir, 'notes.md');
  fs.writeFileSync(docPath, SOURCE);
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function at(needle: string): number {
  const index = SOURCE.indexOf(needle);
  if (index === -1) throw new Error(`"${needle}" is not in the fixture`);
  return index;
}

class FakeMathRenderer implements MathRenderer {
  readonly calls: Array<{ formula: string; scale: number }> = [];

  async render(formula: string, scale: number): Promise<string> {
    this.calls.push({ formula, scale });
    return '/cache/preview.png';
  }
}

// ---------------------------------------------------------------------------
// parseLinkTarget
// ---------------------------------------------------------------------------

describe('parseLinkTarget', () => {
  it.each([
    ['attachment:plot.png', { scheme: 'attachment', path: 'plot.png' }],
    ['img/a%20b.png', { scheme: 'file', path: 'img/a b.png' }],
    ['file:/abs/a.png', { scheme: 'file', path: '/abs/a.png' }],
    ['HTTPS://example.com/a.png', { scheme: 'https', path: '//example.com/a.png' }],
    ['C:\\pics\\a.png', { scheme: 'file', path: 'C:\\pics\\a.png' }],
    ['100%.png', { scheme: 'file', path: '100%.png' }],
  ])('parses %s', (target, expected) => {
    expect(parseLinkTarget(target)).toEqual(expected);
  });

  it('converts file URLs to paths', () => {
    expect(parseLinkTarget('file:///tmp/my%20shot.png')).toEqual({
      scheme: 'file',
      path: '/tmp/my shot.png',
    });
  });
});

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

describe('MarkdownDocumentContext', () => {
  it('uses the directory of the file', () => {
    expect(new MarkdownDocumentContext(SOURCE, docPath).directory).toBe(tmpDir);
  });

  it('finds image links', () => {
    const context = new MarkdownDocumentContext(SOURCE, docPath);
    const element = context.elementAt(at('plot]'));

    expect(element).toEqual({
      kind: 'image',
      start: at('![plot]'),
      end: at('![plot]') + '![plot](img/plot.png)'.length,
      value: '![plot](img/plot.png)',
    });
    expect(context.linkAt(at('plot]'))).toEqual({ scheme: 'file', path: 'img/plot.png' });
  });

  it('finds attachment links', () => {
    const context = new MarkdownDocumentContext(SOURCE, docPath);
    expect(context.elementAt(at('chart]'))?.kind).toBe('link');
    expect(context.linkAt(at('chart]'))).toEqual({ scheme: 'attachment', path: 'chart.png' });
  });

  it('finds inline math but not prices', () => {
    const context = new MarkdownDocumentContext(SOURCE, docPath);
    expect(context.elementAt(at('E=mc'))?.value).toBe('$E=mc^2$');
    expect(context.elementAt(at('$5'))).toBeNull();
  });

  it('finds display math across lines', () => {
    const source = 'Before\n$$\na + b\n$$\nAfter';
    const context = new MarkdownDocumentContext(source, docPath);
    expect(context.elementAt(source.indexOf('a + b'))).toEqual({
      kind: 'math',
      start: 7,
      end: 18,
      value: '$$\na + b\n$$',
    });
  });

  it('ignores math inside code spans', () => {
    const context = new MarkdownDocumentContext(SOURCE, docPath);
    expect(context.elementAt(at('not math'))).toBeNull();
  });

  it('treats inline <img> tags as overlays', () => {
    const context = new MarkdownDocumentContext(SOURCE, docPath);
    expect(context.elementAt(at('shown.gif'))?.kind).toBe('html');
    expect(context.overlayDisplayAt(at('shown.gif'))).toEqual({
      file: path.join(tmpDir, 'shown.gif'),
    });
    expect(context.overlayDisplayAt(at('# Notes'))).toBeNull();
  });

  it('resolves attachments under the attachment directory', () => {
    fs.mkdirSync(path.join(tmpDir, 'media'));
    fs.writeFileSync(path.join(tmpDir, 'media', 'chart.png'), 'png');
    const context = new MarkdownDocumentContext(SOURCE, docPath, { attachmentDir: 'media' });

    expect(context.resolveAttachment('chart.png')).toBe(path.join(tmpDir, 'media', 'chart.png'));
    expect(context.resolveAttachment('other.png')).toBeNull();
  });

  it('builds a context from a file', () => {
    const context = MarkdownDocumentContext.fromFile(docPath);
    expect(context.linkAt(at('plot]'))?.path).toBe('img/plot.png');
  });
});

describe('MarkdownDocumentContext.offsetAt', () => {
  const context = new MarkdownDocumentContext('ab\ncd', '/docs/x.md');

  it('converts 1-based line and column', () => {
    expect(context.offsetAt(1, 1)).toBe(0);
    expect(context.offsetAt(2, 2)).toBe(4);
  });

  it('allows the column just past the last character', () => {
    expect(context.offsetAt(1, 3)).toBe(2);
    expect(context.offsetAt(2, 3)).toBe(5);
  });

  it.each([
    [0, 1],
    [3, 1],
    [1, 0],
    [1, 4],
    [1.5, 1],
  ])('rejects line %d column %d', (line, column) => {
    expect(() => context.offsetAt(line, column)).toThrow(InvalidRangeError);
  });
});

// ---------------------------------------------------------------------------
// Math previews and the full cascade
// ---------------------------------------------------------------------------

describe('MarkdownDocumentContext.previewMath', () => {
  it('fails without a math renderer', async () => {
    const context = new MarkdownDocumentContext(SOURCE, docPath);
    const element = context.elementAt(at('E=mc'));
    expect(element).not.toBeNull();
    if (!element) return;

    await expect(context.previewMath(element, 3)).rejects.toThrow(RichClipError);
  });

  it('registers the rendered preview as an overlay', async () => {
    const renderer = new FakeMathRenderer();
    const context = new MarkdownDocumentContext(SOURCE, docPath, { mathRenderer: renderer });
    const element = context.elementAt(at('E=mc'));
    if (!element) throw new Error('no math element');

    await context.previewMath(element, 2);

    expect(renderer.calls).toEqual([{ formula: '$E=mc^2$', scale: 2 }]);
    expect(context.overlayDisplayAt(at('E=mc'))).toEqual({ file: '/cache/preview.png' });
  });
});

describe('locateImage over a Markdown document', () => {
  it('copies a linked image', async () => {
    const context = new MarkdownDocumentContext(SOURCE, docPath);
    await expect(locateImage(context, at('plot]'))).resolves.toEqual({
      path: 'img/plot.png',
      absolutePath: path.join(tmpDir, 'img', 'plot.png'),
      format: 'png',
      strategy: 'file-link',
    });
  });

  it('copies an attachment that exists', async () => {
    fs.mkdirSync(path.join(tmpDir, 'attachments'));
    fs.writeFileSync(path.join(tmpDir, 'attachments', 'chart.png'), 'png');
    const context = new MarkdownDocumentContext(SOURCE, docPath);

    const image = await locateImage(context, at('chart]'));
    expect(image?.strategy).toBe('attachment-link');
    expect(image?.path).toBe(path.join('attachments', 'chart.png'));
  });

  it('renders a formula under the cursor', async () => {
    const renderer = new FakeMathRenderer();
    const context = new MarkdownDocumentContext(SOURCE, docPath, { mathRenderer: renderer });

    const image = await locateImage(context, at('mc^2'), { scale: 4 });
    expect(image?.strategy).toBe('math-preview');
    expect(image?.absolutePath).toBe('/cache/preview.png');
    expect(renderer.calls[0].scale).toBe(4);
  });

  it('copies an inline <img> overlay', async () => {
    const context = new MarkdownDocumentContext(SOURCE, docPath);
    const image = await locateImage(context, at('width'));
    expect(image?.strategy).toBe('overlay');
    expect(image?.path).toBe(path.join(tmpDir, 'shown.gif'));
  });

  it('finds nothing on a web link or plain text', async () => {
    const context = new MarkdownDocumentContext(SOURCE, docPath);
    await expect(locateImage(context, at('site'))).resolves.toBeNull();
    await expect(locateImage(context, at('Notes'))).resolves.toBeNull();
  });
});
