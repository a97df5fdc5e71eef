/**
 * Platform clipboard writers.
 *
 * @module platform
 */

import { UnsupportedPlatformError } from '../clipboard/errors';
import type { CommandTemplates } from '../config';
import { LinuxClipboardWriter } from './linux';
import { MacClipboardWriter } from './macos';
import type { ClipboardPlatform, ClipboardWriter, WriterDeps } from './types';
import { WindowsClipboardWriter } from './windows';

export { ShellCommandRunner, fillTemplate, quotePosix, quoteWindows } from './command';
export type { CommandRunner, RunOptions } from './command';
export { LinuxClipboardWriter } from './linux';
export { MacClipboardWriter } from './macos';
export { WindowsClipboardWriter, DEFAULT_WINDOWS_HELPER } from './windows';
export type { ClipboardPlatform, ClipboardWriter, WriteOptions, WriterDeps } from './types';

/**
 * Map a Node.js platform identifier to a clipboard writer family.
 * X11 BSDs share the xclip path with Linux.
 */
export function clipboardPlatform(platform: NodeJS.Platform): ClipboardPlatform | null {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'darwin';
    case 'linux':
    case 'freebsd':
    case 'openbsd':
    case 'netbsd':
      return 'linux';
    default:
      return null;
  }
}

/**
 * Create the writer for `platform`.
 *
 * @throws {UnsupportedPlatformError} For platforms without a clipboard command.
 */
export function createClipboardWriter(
  platform: NodeJS.Platform,
  commands: CommandTemplates,
  deps: WriterDeps,
): ClipboardWriter {
  switch (clipboardPlatform(platform)) {
    case 'windows':
      return new WindowsClipboardWriter(commands.windows, deps);
    case 'darwin':
      return new MacClipboardWriter(commands.darwin, deps);
    case 'linux':
      return new LinuxClipboardWriter(commands.linux, deps);
    default:
      throw new UnsupportedPlatformError(platform, `No clipboard support for platform "${platform}"`);
  }
}
