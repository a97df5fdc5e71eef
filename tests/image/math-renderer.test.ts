import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { RichClipError } from '../../src/clipboard/errors';
import { LatexMathRenderer, scaleToDpi } from '../../src/image/math-renderer';
import { RecordingRunner } from '../helpers';

const COMMAND = 'render "%f" "%o" %d';
const COMMAND_RE = /^render "(.+)" "(.+)" (\d+)$/;

let cacheDir: string;

beforeEach(() => {
  cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rich-clip-math-'));
});

afterEach(() => {
  fs.rmSync(cacheDir, { recursive: true, force: true });
});

/** Runner that behaves like latex + dvipng: it leaves formula.png in the output dir. */
function renderingRunner(): RecordingRunner {
  return new RecordingRunner((command) => {
    const outDir = COMMAND_RE.exec(command)?.[2];
    if (outDir) fs.writeFileSync(path.join(outDir, 'formula.png'), 'png');
  });
}

describe('scaleToDpi', () => {
  it.each([
    [1, 100],
    [3, 300],
    [1.25, 125],
    [0.5, 50],
  ])('maps scale %d to %d dpi', (scale, dpi) => {
    expect(scaleToDpi(scale)).toBe(dpi);
  });
});

describe('LatexMathRenderer', () => {
  it('writes a standalone document and runs the command', async () => {
    const runner = renderingRunner();
    const renderer = new LatexMathRenderer({ command: COMMAND, runner, cacheDir });

    const png = await renderer.render('$x^2$', 3);

    expect(runner.runs).toHaveLength(1);
    const match = COMMAND_RE.exec(runner.runs[0].command);
    expect(match?.[3]).toBe('300');
    expect(match?.[2]).toBe(path.dirname(png));
    expect(match?.[1]).toBe(path.join(path.dirname(png), 'formula.tex'));
    expect(path.basename(png)).toBe('formula.png');
    expect(path.dirname(path.dirname(png))).toBe(cacheDir);

    const tex = fs.readFileSync(path.join(path.dirname(png), 'formula.tex'), 'utf8');
    expect(tex).toBe(
      [
        '\\documentclass{article}',
        '\\usepackage{amsmath}',
        '\\usepackage{amssymb}',
        '\\pagestyle{empty}',
        '\\begin{document}',
        '$x^2$',
        '\\end{document}',
        '',
      ].join('\n'),
    );
  });

  it('reuses a cached preview', async () => {
    const runner = renderingRunner();
    const renderer = new LatexMathRenderer({ command: COMMAND, runner, cacheDir });

    const first = await renderer.render('$a+b$', 2);
    const second = await renderer.render('$a+b$', 2);

    expect(second).toBe(first);
    expect(runner.runs).toHaveLength(1);
  });

  it('renders each scale separately', async () => {
    const runner = renderingRunner();
    const renderer = new LatexMathRenderer({ command: COMMAND, runner, cacheDir });

    const small = await renderer.render('$a+b$', 1);
    const large = await renderer.render('$a+b$', 4);

    expect(small).not.toBe(large);
    expect(runner.runs.map((r) => COMMAND_RE.exec(r.command)?.[3])).toEqual(['100', '400']);
  });

  it('fails when the command produces no image', async () => {
    const renderer = new LatexMathRenderer({
      command: COMMAND,
      runner: new RecordingRunner(),
      cacheDir,
    });

    await expect(renderer.render('$x$', 3)).rejects.toThrow(RichClipError);
  });
});
