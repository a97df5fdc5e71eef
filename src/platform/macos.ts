import type { CommandTemplates } from '../config';
import { fillTemplate } from './command';
import { checkImageFile } from './image-file';
import type { ClipboardWriter, WriterDeps } from './types';

/**
 * macOS writer. HTML is converted to RTF by `textutil` and piped into
 * `pbcopy`; images are set as a file reference through AppleScript. Both
 * block until the command exits.
 */
export class MacClipboardWriter implements ClipboardWriter {
  readonly platform = 'darwin' as const;

  constructor(
    private readonly templates: CommandTemplates['darwin'],
    private readonly deps: WriterDeps,
  ) {}

  async writeHtml(html: string): Promise<void> {
    const command = this.templates.html;
    this.deps.logger.debug({ command }, 'writing HTML as RTF');
    await this.deps.runner.run(command, { input: html });
  }

  async writeImage(imagePath: string): Promise<void> {
    const image = checkImageFile(imagePath);
    const command = fillTemplate(this.templates.image, {
      f: image.absolutePath,
      e: image.format,
    });
    this.deps.logger.debug({ command }, 'writing image file reference');
    await this.deps.runner.run(command);
  }
}
