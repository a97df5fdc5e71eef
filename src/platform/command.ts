/**
 * Running external clipboard commands.
 *
 * Commands are shell strings built from user-configurable templates, so they
 * are executed through the platform shell (pipes such as `| pbcopy` must
 * work). Writers depend on the {@link CommandRunner} interface; tests swap in
 * a recording fake.
 *
 * @module platform/command
 */

import { spawn } from 'node:child_process';

import { ProcessError } from '../clipboard/errors';
import { silentLogger, type Logger } from '../logger';

export interface RunOptions {
  /** Data written to the command's stdin, which is then closed. */
  input?: string | Buffer;
}

export interface CommandRunner {
  /**
   * Run a command to completion.
   *
   * @throws {ProcessError} When the command cannot be launched or exits
   *   with a non-zero status.
   */
  run(command: string, options?: RunOptions): Promise<void>;

  /**
   * Start a detached command without waiting for it. Resolves once the
   * process has been spawned; its exit status is never observed.
   *
   * @throws {ProcessError} When the process cannot be spawned at all.
   */
  launch(command: string): Promise<void>;
}

/** How long stderr may stay open after the command itself has exited. */
const STDERR_DRAIN_MS = 100;

/** {@link CommandRunner} backed by `child_process.spawn` with a shell. */
export class ShellCommandRunner implements CommandRunner {
  constructor(private readonly logger: Logger = silentLogger) {}

  run(command: string, options: RunOptions = {}): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, {
        shell: true,
        stdio: ['pipe', 'ignore', 'pipe'],
        windowsHide: true,
      });

      let stderr = '';
      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      let settled = false;
      let exitCode: number | null | undefined;
      let stderrClosed = false;
      let drainTimer: NodeJS.Timeout | undefined;

      const finish = (): void => {
        if (settled || exitCode === undefined || !stderrClosed) return;
        settled = true;
        if (exitCode === 0) {
          resolve();
          return;
        }
        const detail = stderr.trim();
        reject(
          new ProcessError(
            command,
            exitCode,
            detail,
            `Command exited with status ${String(exitCode)}: ${command}${detail ? `\n${detail}` : ''}`,
          ),
        );
      };

      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(drainTimer);
        reject(new ProcessError(command, null, stderr, `Failed to launch "${command}": ${err.message}`));
      });

      child.stderr.on('close', () => {
        stderrClosed = true;
        clearTimeout(drainTimer);
        finish();
      });

      // A forked child (xclip serving the selection) inherits stderr and
      // holds it open after the command itself has exited.
      child.on('exit', (code) => {
        exitCode = code;
        if (!stderrClosed) {
          drainTimer = setTimeout(() => child.stderr.destroy(), STDERR_DRAIN_MS);
        }
        finish();
      });

      // A command that never reads stdin closes the pipe early; its exit
      // status is what gets reported.
      child.stdin.on('error', (err) => {
        this.logger.debug({ err, command }, 'stdin closed before input was written');
      });
      child.stdin.end(options.input ?? '');
    });
  }

  launch(command: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, {
        shell: true,
        detached: true,
        stdio: 'ignore',
        windowsHide: true,
      });

      child.once('error', (err) => {
        reject(new ProcessError(command, null, '', `Failed to launch "${command}": ${err.message}`));
      });
      child.once('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

/** Escape a value for use inside a double-quoted POSIX shell word. */
export function quotePosix(value: string): string {
  return value.replace(/(["\\$`])/g, '\\$1');
}

/** cmd.exe has no escape for `"` inside quotes; drop it (it is not legal in Windows paths). */
export function quoteWindows(value: string): string {
  return value.replace(/"/g, '');
}

/**
 * Substitute `%x` placeholders in a command template.
 *
 * `%%` produces a literal `%`. Unknown placeholders are left untouched so
 * that shell syntax such as `date +%s` survives.
 *
 * @example
 * ```ts
 * fillTemplate('xclip -t image/%e -i "%f"', { f: '/tmp/a.png', e: 'png' });
 * // => 'xclip -t image/png -i "/tmp/a.png"'
 * ```
 */
export function fillTemplate(
  template: string,
  values: Record<string, string>,
  quote: (value: string) => string = quotePosix,
): string {
  return template.replace(/%([a-zA-Z%])/g, (match, key: string) => {
    if (key === '%') return '%';
    const value = values[key];
    return value === undefined ? match : quote(value);
  });
}
