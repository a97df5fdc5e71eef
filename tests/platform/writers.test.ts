import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { decodeHtmlFormat } from '../../src/clipboard/html-format';
import {
  ProcessError,
  RichClipError,
  UnsupportedPlatformError,
} from '../../src/clipboard/errors';
import { DEFAULT_COMMANDS, parseConfig } from '../../src/config';
import { createLogger } from '../../src/logger';
import {
  clipboardPlatform,
  createClipboardWriter,
  DEFAULT_WINDOWS_HELPER,
  LinuxClipboardWriter,
  MacClipboardWriter,
  WindowsClipboardWriter,
} from '../../src/platform';
import { RecordingRunner } from '../helpers';

const commands = parseConfig({}).commands;
const logger = createLogger('silent');

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rich-clip-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
  jest.restoreAllMocks();
});

function writeImage(name: string): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, 'not really an image');
  return file;
}

const XCLIP_HTML_RE = /^xclip -selection clipboard -t text\/html -i "(.+)"$/;

// ---------------------------------------------------------------------------
// Linux
// ---------------------------------------------------------------------------

describe('LinuxClipboardWriter', () => {
  it('writes HTML to a temp file and launches xclip detached', async () => {
    const runner = new RecordingRunner();
    const writer = new LinuxClipboardWriter(commands.linux, { runner, logger, tmpDir });

    await writer.writeHtml('<p>hello</p>');

    expect(runner.runs).toHaveLength(0);
    expect(runner.launches).toHaveLength(1);
    const match = XCLIP_HTML_RE.exec(runner.launches[0]);
    expect(match).not.toBeNull();
    const file = match?.[1] ?? '';
    expect(path.basename(file)).toBe('clipboard.html');
    expect(path.dirname(path.dirname(file))).toBe(tmpDir);
    expect(fs.readFileSync(file, 'utf8')).toBe('<p>hello</p>');
  });

  it('uses a fresh temp directory for every copy', async () => {
    const runner = new RecordingRunner();
    const writer = new LinuxClipboardWriter(commands.linux, { runner, logger, tmpDir });

    await writer.writeHtml('<p>1</p>');
    await writer.writeHtml('<p>2</p>');

    expect(runner.launches[0]).not.toBe(runner.launches[1]);
  });

  it('logs and swallows launch failures in detached mode', async () => {
    const warn = jest.spyOn(logger, 'warn');
    const failure = new ProcessError('xclip', null, '', 'spawn xclip ENOENT');
    const runner = new RecordingRunner(undefined, failure);
    const writer = new LinuxClipboardWriter(commands.linux, { runner, logger, tmpDir });

    await expect(writer.writeHtml('<p>x</p>')).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('waits for xclip and removes the temp file with { wait: true }', async () => {
    let contentDuringRun = '';
    const runner = new RecordingRunner((command) => {
      const file = XCLIP_HTML_RE.exec(command)?.[1] ?? '';
      contentDuringRun = fs.readFileSync(file, 'utf8');
    });
    const writer = new LinuxClipboardWriter(commands.linux, { runner, logger, tmpDir });

    await writer.writeHtml('<b>waited</b>', { wait: true });

    expect(runner.launches).toHaveLength(0);
    expect(runner.runs).toHaveLength(1);
    expect(contentDuringRun).toBe('<b>waited</b>');
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('reports ProcessError with { wait: true }', async () => {
    const failure = new ProcessError('xclip', 1, 'Error: Can\'t open display', 'xclip failed');
    const runner = new RecordingRunner(undefined, failure);
    const writer = new LinuxClipboardWriter(commands.linux, { runner, logger, tmpDir });

    await expect(writer.writeHtml('<p>x</p>', { wait: true })).rejects.toThrow(ProcessError);
  });

  it('removes the temp file when xclip fails with { wait: true }', async () => {
    const failure = new ProcessError('xclip', 1, '', 'xclip failed');
    const runner = new RecordingRunner(undefined, failure);
    const writer = new LinuxClipboardWriter(commands.linux, { runner, logger, tmpDir });

    await expect(writer.writeHtml('<p>x</p>', { wait: true })).rejects.toThrow('xclip failed');

    expect(runner.runs).toHaveLength(1);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });

  it('copies an image with the MIME subtype from its extension', async () => {
    const image = writeImage('photo.JPG');
    const runner = new RecordingRunner();
    const writer = new LinuxClipboardWriter(commands.linux, { runner, logger, tmpDir });

    await writer.writeImage(image);

    expect(runner.launches).toEqual([
      `xclip -selection clipboard -t image/jpeg -i "${image}"`,
    ]);
  });

  it('maps svg to svg+xml', async () => {
    const image = writeImage('diagram.svg');
    const runner = new RecordingRunner();
    const writer = new LinuxClipboardWriter(commands.linux, { runner, logger, tmpDir });

    await writer.writeImage(image, { wait: true });

    expect(runner.runs.map((r) => r.command)).toEqual([
      `xclip -selection clipboard -t image/svg+xml -i "${image}"`,
    ]);
  });

  it('rejects a file that is not an image', async () => {
    const file = writeImage('notes.txt');
    const writer = new LinuxClipboardWriter(commands.linux, {
      runner: new RecordingRunner(),
      logger,
      tmpDir,
    });

    await expect(writer.writeImage(file)).rejects.toThrow(RichClipError);
  });

  it('rejects a missing image before running anything', async () => {
    const runner = new RecordingRunner();
    const writer = new LinuxClipboardWriter(commands.linux, { runner, logger, tmpDir });

    await expect(writer.writeImage(path.join(tmpDir, 'gone.png'))).rejects.toThrow(
      'Image file not found',
    );
    expect(runner.launches).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// macOS
// ---------------------------------------------------------------------------

describe('MacClipboardWriter', () => {
  it('pipes the HTML into textutil and pbcopy', async () => {
    const runner = new RecordingRunner();
    const writer = new MacClipboardWriter(commands.darwin, { runner, logger });

    await writer.writeHtml('<p>mac</p>');

    expect(runner.runs).toEqual([
      {
        command: 'textutil -inputencoding UTF-8 -stdin -format html -convert rtf -stdout | pbcopy',
        input: '<p>mac</p>',
      },
    ]);
  });

  it('sets an image file reference through osascript', async () => {
    const image = writeImage('shot.png');
    const runner = new RecordingRunner();
    const writer = new MacClipboardWriter(commands.darwin, { runner, logger });

    await writer.writeImage(image);

    expect(runner.runs).toEqual([
      { command: `osascript -e "set the clipboard to POSIX file \\"${image}\\""`, input: undefined },
    ]);
  });

  it('propagates ProcessError', async () => {
    const runner = new RecordingRunner(undefined, new ProcessError('pbcopy', 1, '', 'failed'));
    const writer = new MacClipboardWriter(commands.darwin, { runner, logger });

    await expect(writer.writeHtml('<p>x</p>')).rejects.toThrow(ProcessError);
  });
});

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

describe('WindowsClipboardWriter', () => {
  const helperPath = 'C:\\rich-clip\\set-clipboard-html.ps1';

  it('pipes an HTML Format container into the helper', async () => {
    const runner = new RecordingRunner();
    const writer = new WindowsClipboardWriter(commands.windows, { runner, logger, helperPath });

    await writer.writeHtml('<p>héllo</p>');

    expect(runner.runs).toHaveLength(1);
    expect(runner.runs[0].command).toBe(
      `powershell.exe -NoProfile -NonInteractive -STA -ExecutionPolicy Bypass -File "${helperPath}"`,
    );
    const input = runner.runs[0].input;
    expect(Buffer.isBuffer(input)).toBe(true);
    const decoded = decodeHtmlFormat(Buffer.isBuffer(input) ? input : Buffer.alloc(0));
    expect(decoded.fragment).toBe('<p>héllo</p>');
    expect(decoded.version).toBe('0.9');
  });

  it('does not support images', async () => {
    const writer = new WindowsClipboardWriter(commands.windows, {
      runner: new RecordingRunner(),
      logger,
      helperPath,
    });

    await expect(writer.writeImage('C:\\a.png')).rejects.toThrow(UnsupportedPlatformError);
  });

  it('points at the packaged helper by default', () => {
    expect(path.basename(DEFAULT_WINDOWS_HELPER)).toBe('set-clipboard-html.ps1');
    expect(fs.existsSync(DEFAULT_WINDOWS_HELPER)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

describe('createClipboardWriter', () => {
  const deps = { runner: new RecordingRunner(), logger };

  it.each([
    ['win32', 'windows'],
    ['darwin', 'darwin'],
    ['linux', 'linux'],
    ['freebsd', 'linux'],
  ] as const)('picks the %s writer', (platform, expected) => {
    expect(createClipboardWriter(platform, commands, deps).platform).toBe(expected);
  });

  it('throws UnsupportedPlatformError for other platforms', () => {
    expect(() => createClipboardWriter('aix', commands, deps)).toThrow(UnsupportedPlatformError);
  });

  it('passes configured commands through', async () => {
    const runner = new RecordingRunner();
    const custom = parseConfig({ commands: { darwin: { html: 'my-copy --html' } } }).commands;
    await createClipboardWriter('darwin', custom, { runner, logger }).writeHtml('<i>x</i>');

    expect(runner.runs[0].command).toBe('my-copy --html');
    expect(custom.darwin.image).toBe(DEFAULT_COMMANDS.darwin.image);
  });
});

describe('clipboardPlatform', () => {
  it('returns null for platforms without a writer', () => {
    expect(clipboardPlatform('sunos')).toBeNull();
  });
});
