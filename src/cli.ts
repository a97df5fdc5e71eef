#!/usr/bin/env node
/**
 * rich-clip command-line interface
 *
 * Usage:
 *   rich-clip copy <file> [--lines A:B] [--mode markdown|code] [--language L] [--style S] [--wait]
 *   rich-clip image <file> --at LINE:COL [--scale N] [--wait]
 *   rich-clip encode [--source URL]     < fragment.html > container.txt
 *   rich-clip decode                    < container.txt
 *
 * Every command accepts `--config <path>`.
 *
 * Environment variables:
 *   RICH_CLIP_CONFIG    - Config file path (when --config is not given)
 *   RICH_CLIP_LOG_LEVEL - Overrides the configured log level
 *
 * Exit codes: 0 success, 1 operation failed, 2 usage error.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import pino from 'pino';

import { decodeHtmlFormat, encodeHtmlFragment } from './clipboard/html-format';
import { RichClipError } from './clipboard/errors';
import { loadConfig, type RichClipConfig } from './config';
import { parseLineRegion } from './core/region';
import { isStyleTemplateName } from './core/styles';
import { copyAsHtml, detectLanguage, detectMode } from './exporter';
import { locateImage } from './image/locator';
import { MarkdownDocumentContext } from './image/markdown-context';
import { LatexMathRenderer } from './image/math-renderer';
import { createLogger, type Logger } from './logger';
import { ShellCommandRunner, type CommandRunner } from './platform/command';
import { createClipboardWriter } from './platform/index';
import type { ClipboardWriter } from './platform/types';
import type { DocumentMode } from './types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface CommonArgs {
  config?: string;
}

interface CopyArgs extends CommonArgs {
  kind: 'copy';
  file: string;
  lines?: string;
  mode?: DocumentMode;
  language?: string;
  style?: string;
  wait: boolean;
}

interface ImageArgs extends CommonArgs {
  kind: 'image';
  file: string;
  line: number;
  column: number;
  scale?: number;
  wait: boolean;
}

interface EncodeArgs extends CommonArgs {
  kind: 'encode';
  source?: string;
}

interface DecodeArgs extends CommonArgs {
  kind: 'decode';
}

interface HelpArgs {
  kind: 'help';
}

type ParsedArgs = CopyArgs | ImageArgs | EncodeArgs | DecodeArgs | HelpArgs;

/** Anything with a `write(string)` method, such as `process.stdout`. */
export interface TextSink {
  write(text: string): unknown;
}

export interface CliDeps {
  readStdin(): Promise<Buffer>;
  stdout: TextSink;
  stderr: TextSink;
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  /** Directory searched for `.rich-clip.json`. */
  homeDir?: string;
  /** Parent directory for temporary clipboard files. */
  tmpDir?: string;
  runner?: CommandRunner;
  /** Replaces the stderr pino logger. */
  logger?: Logger;
}

const USAGE = `Usage:
  rich-clip copy <file> [--lines A:B] [--mode markdown|code] [--language L] [--style S] [--wait]
  rich-clip image <file> --at LINE:COL [--scale N] [--wait]
  rich-clip encode [--source URL]
  rich-clip decode

Options:
  --config <path>  Configuration file (default: $RICH_CLIP_CONFIG or ~/.rich-clip.json)
`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

const VALUE_FLAGS = new Set([
  'config',
  'lines',
  'mode',
  'language',
  'style',
  'at',
  'scale',
  'source',
]);
const BOOLEAN_FLAGS = new Set(['wait', 'help']);

interface RawArgs {
  positionals: string[];
  flags: Map<string, string>;
  switches: Set<string>;
}

function splitArgs(args: string[]): RawArgs {
  const raw: RawArgs = { positionals: [], flags: new Map(), switches: new Set() };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      raw.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (BOOLEAN_FLAGS.has(name) && eq === -1) {
      raw.switches.add(name);
    } else if (VALUE_FLAGS.has(name)) {
      const value = eq === -1 ? args[++i] : arg.slice(eq + 1);
      if (value === undefined) throw new UsageError(`Option --${name} needs a value`);
      raw.flags.set(name, value);
    } else {
      throw new UsageError(`Unknown option ${arg}`);
    }
  }

  return raw;
}

function rejectFlags(raw: RawArgs, command: string, allowed: string[]): void {
  for (const name of [...raw.flags.keys(), ...raw.switches]) {
    if (name !== 'config' && !allowed.includes(name)) {
      throw new UsageError(`Option --${name} does not apply to "${command}"`);
    }
  }
}

function requireFile(raw: RawArgs, command: string): string {
  const [file, ...extra] = raw.positionals;
  if (file === undefined) throw new UsageError(`"${command}" needs a file argument`);
  if (extra.length > 0) throw new UsageError(`Unexpected argument ${extra[0]}`);
  return file;
}

function parseMode(value: string | undefined): DocumentMode | undefined {
  if (value === undefined || value === 'markdown' || value === 'code') return value;
  throw new UsageError(`--mode must be markdown or code (got "${value}")`);
}

function parsePosition(value: string | undefined): { line: number; column: number } {
  if (value === undefined) throw new UsageError('"image" needs --at LINE:COL');
  const match = /^(\d+):(\d+)$/.exec(value);
  if (!match) throw new UsageError(`--at must look like LINE:COL (got "${value}")`);
  return { line: Number(match[1]), column: Number(match[2]) };
}

function parseScale(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const scale = Number(value);
  if (!Number.isFinite(scale) || scale <= 0) {
    throw new UsageError(`--scale must be a positive number (got "${value}")`);
  }
  return scale;
}

function parseArgs(args: string[]): ParsedArgs {
  const [kind, ...rest] = args;
  if (kind === undefined || kind === 'help' || kind === '--help') return { kind: 'help' };

  const raw = splitArgs(rest);
  if (raw.switches.has('help')) return { kind: 'help' };
  const config = raw.flags.get('config');

  switch (kind) {
    case 'copy': {
      rejectFlags(raw, kind, ['lines', 'mode', 'language', 'style', 'wait']);
      return {
        kind,
        config,
        file: requireFile(raw, kind),
        lines: raw.flags.get('lines'),
        mode: parseMode(raw.flags.get('mode')),
        language: raw.flags.get('language'),
        style: raw.flags.get('style'),
        wait: raw.switches.has('wait'),
      };
    }

    case 'image': {
      rejectFlags(raw, kind, ['at', 'scale', 'wait']);
      const file = requireFile(raw, kind);
      const { line, column } = parsePosition(raw.flags.get('at'));
      return {
        kind,
        config,
        file,
        line,
        column,
        scale: parseScale(raw.flags.get('scale')),
        wait: raw.switches.has('wait'),
      };
    }

    case 'encode':
    case 'decode': {
      rejectFlags(raw, kind, kind === 'encode' ? ['source'] : []);
      if (raw.positionals.length > 0) {
        throw new UsageError(`Unexpected argument ${raw.positionals[0]}`);
      }
      return kind === 'encode' ? { kind, config, source: raw.flags.get('source') } : { kind, config };
    }

    default:
      throw new UsageError(`Unknown command "${kind}"`);
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

interface Context {
  deps: CliDeps;
  config: RichClipConfig;
  logger: Logger;
  runner: CommandRunner;
}

function readSource(file: string): string {
  try {
    return fs.readFileSync(file, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RichClipError(`Cannot read ${file}: ${reason}`);
  }
}

function createWriter(ctx: Context): ClipboardWriter {
  return createClipboardWriter(ctx.deps.platform, ctx.config.commands, {
    runner: ctx.runner,
    logger: ctx.logger,
    tmpDir: ctx.deps.tmpDir,
  });
}

async function handleCopy(args: CopyArgs, ctx: Context): Promise<void> {
  const style = args.style ?? ctx.config.style;
  if (!isStyleTemplateName(style)) {
    throw new UsageError(`Unknown style "${style}"`);
  }

  const mode = args.mode ?? detectMode(args.file);
  const writer = createWriter(ctx);
  const result = await copyAsHtml(
    {
      source: readSource(args.file),
      mode,
      language: args.language ?? (mode === 'code' ? detectLanguage(args.file) : undefined),
      region: args.lines === undefined ? undefined : parseLineRegion(args.lines),
      style,
      baseDir: path.dirname(path.resolve(args.file)),
    },
    writer,
    { wait: args.wait },
  );

  ctx.logger.info({ file: args.file, mode, lines: result.metadata.lineCount }, 'copied as HTML');
  ctx.deps.stdout.write(`Copied ${result.metadata.lineCount} line(s) of ${args.file} as HTML\n`);
}

async function handleImage(args: ImageArgs, ctx: Context): Promise<void> {
  const mathRenderer = new LatexMathRenderer({
    command: ctx.config.math.command,
    runner: ctx.runner,
    cacheDir: ctx.config.math.cacheDir,
    logger: ctx.logger,
  });
  const context = new MarkdownDocumentContext(readSource(args.file), args.file, {
    attachmentDir: ctx.config.attachmentDir,
    mathRenderer,
  });

  const point = context.offsetAt(args.line, args.column);
  const image = await locateImage(context, point, { scale: args.scale ?? ctx.config.math.scale });
  if (!image) {
    ctx.deps.stderr.write(`No image found at ${args.line}:${args.column}\n`);
    return;
  }

  await createWriter(ctx).writeImage(image.absolutePath, { wait: args.wait });
  ctx.logger.info({ image: image.absolutePath, strategy: image.strategy }, 'copied image');
  ctx.deps.stdout.write(`Copied image ${image.path}\n`);
}

async function handleEncode(args: EncodeArgs, ctx: Context): Promise<void> {
  const fragment = (await ctx.deps.readStdin()).toString('utf8');
  ctx.deps.stdout.write(encodeHtmlFragment(fragment, { source: args.source }));
}

async function handleDecode(ctx: Context): Promise<void> {
  const decoded = decodeHtmlFormat(await ctx.deps.readStdin());
  ctx.deps.stdout.write(`${JSON.stringify(decoded, null, 2)}\n`);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

/**
 * Run the CLI with `args` (without the node and script paths).
 *
 * @returns The process exit code. Errors other than {@link RichClipError}
 *   and usage errors propagate.
 */
export async function runCli(args: string[], deps: CliDeps): Promise<number> {
  try {
    const parsed = parseArgs(args);
    if (parsed.kind === 'help') {
      deps.stdout.write(USAGE);
      return 0;
    }

    const config = loadConfig({ path: parsed.config, env: deps.env, homeDir: deps.homeDir });
    const logger = deps.logger ?? createLogger(config.logLevel, pino.destination(2));
    const ctx: Context = {
      deps,
      config,
      logger,
      runner: deps.runner ?? new ShellCommandRunner(logger),
    };

    switch (parsed.kind) {
      case 'copy':
        await handleCopy(parsed, ctx);
        break;
      case 'image':
        await handleImage(parsed, ctx);
        break;
      case 'encode':
        await handleEncode(parsed, ctx);
        break;
      case 'decode':
        await handleDecode(ctx);
        break;
    }
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      deps.stderr.write(`Error: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    if (err instanceof RichClipError) {
      deps.stderr.write(`Error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

async function readAll(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks);
}

if (require.main === module) {
  runCli(process.argv.slice(2), {
    readStdin: () => readAll(process.stdin),
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    platform: process.platform,
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error('Fatal error in rich-clip:', err);
      process.exit(1);
    });
}
