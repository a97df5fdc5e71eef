import * as path from 'node:path';

import { encodeHtmlFragment } from '../clipboard/html-format';
import { UnsupportedPlatformError } from '../clipboard/errors';
import type { CommandTemplates } from '../config';
import { fillTemplate, quoteWindows } from './command';
import type { ClipboardWriter, WriterDeps } from './types';

/** Packaged PowerShell script that stores stdin as the "HTML Format" clipboard type. */
export const DEFAULT_WINDOWS_HELPER = path.resolve(
  __dirname,
  '..',
  '..',
  'assets',
  'windows',
  'set-clipboard-html.ps1',
);

/**
 * Windows writer. The HTML is encoded into the "HTML Format" container
 * here and piped to the helper, which only performs the native clipboard
 * write. Blocks until the helper exits.
 */
export class WindowsClipboardWriter implements ClipboardWriter {
  readonly platform = 'windows' as const;
  private readonly helperPath: string;

  constructor(
    private readonly templates: CommandTemplates['windows'],
    private readonly deps: WriterDeps,
  ) {
    this.helperPath = deps.helperPath ?? DEFAULT_WINDOWS_HELPER;
  }

  async writeHtml(html: string): Promise<void> {
    const container = encodeHtmlFragment(html);
    const command = fillTemplate(this.templates.html, { f: this.helperPath }, quoteWindows);

    this.deps.logger.debug({ command, bytes: Buffer.byteLength(container) }, 'writing HTML Format');
    await this.deps.runner.run(command, { input: Buffer.from(container, 'utf8') });
  }

  async writeImage(imagePath: string): Promise<void> {
    throw new UnsupportedPlatformError(
      'windows',
      `Copying images to the clipboard is not supported on Windows (${imagePath})`,
    );
  }
}
