import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import type { CommandTemplates } from '../config';
import { fillTemplate } from './command';
import { checkImageFile } from './image-file';
import type { ClipboardWriter, WriteOptions, WriterDeps } from './types';

/**
 * Linux (X11) writer built on xclip.
 *
 * HTML goes through a fresh temporary file. By default xclip is launched
 * detached and never waited on, so its failures are not reported. With
 * `{ wait: true }` the writer waits for xclip, surfaces `ProcessError`,
 * and removes the temporary file once xclip has exited, successfully or
 * not (xclip has read its input before it forks to serve the selection).
 * In detached mode the file is left to the OS temp directory lifecycle,
 * since it may still be unread.
 */
export class LinuxClipboardWriter implements ClipboardWriter {
  readonly platform = 'linux' as const;

  constructor(
    private readonly templates: CommandTemplates['linux'],
    private readonly deps: WriterDeps,
  ) {}

  async writeHtml(html: string, options: WriteOptions = {}): Promise<void> {
    const dir = fs.mkdtempSync(path.join(this.deps.tmpDir ?? os.tmpdir(), 'rich-clip-'));
    const file = path.join(dir, 'clipboard.html');
    fs.writeFileSync(file, html, 'utf8');

    const command = fillTemplate(this.templates.html, { f: file });
    if (!options.wait) {
      await this.execute(command, false);
      return;
    }

    try {
      await this.execute(command, true);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }

  async writeImage(imagePath: string, options: WriteOptions = {}): Promise<void> {
    const image = checkImageFile(imagePath);
    const command = fillTemplate(this.templates.image, {
      f: image.absolutePath,
      e: image.format,
    });
    await this.execute(command, options.wait ?? false);
  }

  private async execute(command: string, wait: boolean): Promise<void> {
    this.deps.logger.debug({ command, wait }, 'running xclip');

    if (wait) {
      await this.deps.runner.run(command);
      return;
    }

    try {
      await this.deps.runner.launch(command);
    } catch (err) {
      this.deps.logger.warn({ err, command }, 'clipboard command could not be launched');
    }
  }
}
