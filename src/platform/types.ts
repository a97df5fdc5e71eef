import type { Logger } from '../logger';
import type { CommandRunner } from './command';

export type ClipboardPlatform = 'windows' | 'darwin' | 'linux';

/**
 * Places finished HTML or an image file on the OS clipboard.
 *
 * One implementation exists per platform; {@link createClipboardWriter}
 * picks it once at startup.
 */
export interface ClipboardWriter {
  readonly platform: ClipboardPlatform;

  /** Put an HTML fragment on the clipboard as rich text. */
  writeHtml(html: string, options?: WriteOptions): Promise<void>;

  /** Put an image file on the clipboard. */
  writeImage(imagePath: string, options?: WriteOptions): Promise<void>;
}

export interface WriteOptions {
  /**
   * Linux only: wait for xclip to exit and report `ProcessError`
   * instead of launching it detached. Windows and macOS always wait.
   * @default false
   */
  wait?: boolean;
}

export interface WriterDeps {
  runner: CommandRunner;
  logger: Logger;
  /** Parent directory for temporary HTML files (Linux). Defaults to `os.tmpdir()`. */
  tmpDir?: string;
  /** Location of the Windows clipboard helper script. */
  helperPath?: string;
}
