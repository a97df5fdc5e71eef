/**
 * Formula preview rendering via LaTeX and dvipng.
 *
 * @module image/math-renderer
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { RichClipError } from '../clipboard/errors';
import { silentLogger, type Logger } from '../logger';
import { fillTemplate, type CommandRunner } from '../platform/command';

export interface MathRenderer {
  /** Render a formula (delimiters included) and return the image path. */
  render(formula: string, scale: number): Promise<string>;
}

/** Output DPI for a preview scale; scale 1 is 100 dpi. */
export function scaleToDpi(scale: number): number {
  return Math.round(scale * 100);
}

function latexDocument(formula: string): string {
  return [
    '\\documentclass{article}',
    '\\usepackage{amsmath}',
    '\\usepackage{amssymb}',
    '\\pagestyle{empty}',
    '\\begin{document}',
    formula,
    '\\end{document}',
    '',
  ].join('\n');
}

export interface LatexMathRendererOptions {
  /** Command template with `%f` (tex file), `%o` (output dir) and `%d` (dpi). */
  command: string;
  runner: CommandRunner;
  cacheDir?: string;
  logger?: Logger;
}

/**
 * Renders formulas with a configurable latex/dvipng command.
 *
 * Each formula and scale gets its own cache directory; the command must
 * leave `formula.png` there. A cached PNG is returned without re-rendering.
 */
export class LatexMathRenderer implements MathRenderer {
  private readonly cacheDir: string;
  private readonly logger: Logger;

  constructor(private readonly options: LatexMathRendererOptions) {
    this.cacheDir = options.cacheDir ?? path.join(os.tmpdir(), 'rich-clip-math');
    this.logger = options.logger ?? silentLogger;
  }

  async render(formula: string, scale: number): Promise<string> {
    const key = createHash('sha1').update(`${scale}\0${formula}`).digest('hex').slice(0, 16);
    const dir = path.join(this.cacheDir, key);
    const png = path.join(dir, 'formula.png');

    if (fs.existsSync(png)) {
      this.logger.debug({ png }, 'math preview cache hit');
      return png;
    }

    fs.mkdirSync(dir, { recursive: true });
    const tex = path.join(dir, 'formula.tex');
    fs.writeFileSync(tex, latexDocument(formula), 'utf8');

    const command = fillTemplate(this.options.command, {
      f: tex,
      o: dir,
      d: String(scaleToDpi(scale)),
    });
    this.logger.debug({ command }, 'rendering math preview');
    await this.options.runner.run(command);

    if (!fs.existsSync(png)) {
      throw new RichClipError(`Math preview command did not produce ${png}`);
    }
    return png;
  }
}
