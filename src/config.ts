/**
 * Configuration for rich-clip.
 *
 * Options are read from a JSON file and validated with zod. Every field has
 * a default, so an empty file (or no file) yields a working configuration
 * for the current platform. The file location comes from `--config`, then
 * `RICH_CLIP_CONFIG`, then `~/.rich-clip.json` if it exists.
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

import { ConfigError } from './clipboard/errors';
import { STYLE_TEMPLATE_NAMES } from './core/styles';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Token replaced by a file path in command templates. */
export const FILE_PLACEHOLDER = '%f';

export const DEFAULT_COMMANDS = {
  windows: {
    html: 'powershell.exe -NoProfile -NonInteractive -STA -ExecutionPolicy Bypass -File "%f"',
  },
  darwin: {
    html: 'textutil -inputencoding UTF-8 -stdin -format html -convert rtf -stdout | pbcopy',
    image: 'osascript -e "set the clipboard to POSIX file \\"%f\\""',
  },
  linux: {
    html: 'xclip -selection clipboard -t text/html -i "%f"',
    image: 'xclip -selection clipboard -t image/%e -i "%f"',
  },
} as const;

export const DEFAULT_MATH_COMMAND =
  'latex -interaction=nonstopmode -halt-on-error -output-directory "%o" "%f"' +
  ' && dvipng -D %d -T tight -bg Transparent -o "%o/formula.png" "%o/formula.dvi"';

export const DEFAULT_MATH_SCALE = 3;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** A command template that must contain every token in `tokens`. */
function template(tokens: readonly string[]) {
  return z
    .string()
    .min(1)
    .superRefine((value, ctx) => {
      const missing = tokens.filter((token) => !value.includes(token));
      if (missing.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must contain the placeholder ${missing.join(', ')}`,
        });
      }
    });
}

const fileTemplate = template([FILE_PLACEHOLDER]);

export const configSchema = z
  .object({
    commands: z
      .object({
        windows: z
          .object({ html: fileTemplate.default(DEFAULT_COMMANDS.windows.html) })
          .strict()
          .default({}),
        darwin: z
          .object({
            // Fed on stdin: no placeholder.
            html: z.string().min(1).default(DEFAULT_COMMANDS.darwin.html),
            image: fileTemplate.default(DEFAULT_COMMANDS.darwin.image),
          })
          .strict()
          .default({}),
        linux: z
          .object({
            html: fileTemplate.default(DEFAULT_COMMANDS.linux.html),
            image: fileTemplate.default(DEFAULT_COMMANDS.linux.image),
          })
          .strict()
          .default({}),
      })
      .strict()
      .default({}),
    math: z
      .object({
        scale: z.number().positive().default(DEFAULT_MATH_SCALE),
        command: template(['%f', '%o', '%d']).default(DEFAULT_MATH_COMMAND),
        cacheDir: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    attachmentDir: z.string().min(1).default('attachments'),
    style: z.enum(STYLE_TEMPLATE_NAMES).default('minimal'),
    logLevel: z.enum(LOG_LEVELS).default('info'),
  })
  .strict();

export type RichClipConfig = z.infer<typeof configSchema>;
export type CommandTemplates = RichClipConfig['commands'];

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

export interface LoadConfigOptions {
  /** Explicit config file path; a missing file is an error. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Directory searched for `.rich-clip.json`. Defaults to the home directory. */
  homeDir?: string;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a raw configuration object, filling in defaults.
 *
 * @throws {ConfigError} Listing every failing field.
 */
export function parseConfig(raw: unknown, origin = 'configuration'): RichClipConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Invalid ${origin}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

function readJson(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${file}: ${reason}`);
  }
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${file} is not valid JSON: ${reason}`);
  }
}

function resolveConfigPath(options: LoadConfigOptions, env: NodeJS.ProcessEnv): string | undefined {
  if (options.path) return options.path;
  if (env.RICH_CLIP_CONFIG) return env.RICH_CLIP_CONFIG;

  const fallback = path.join(options.homeDir ?? os.homedir(), '.rich-clip.json');
  return fs.existsSync(fallback) ? fallback : undefined;
}

/**
 * Load, merge over defaults and validate the configuration.
 *
 * `RICH_CLIP_LOG_LEVEL` overrides `logLevel` from the file.
 */
export function loadConfig(options: LoadConfigOptions = {}): RichClipConfig {
  const env = options.env ?? process.env;
  const file = resolveConfigPath(options, env);
  const raw = file ? readJson(file) : {};
  const config = parseConfig(raw, file ? `config file ${file}` : 'configuration');

  const levelOverride = env.RICH_CLIP_LOG_LEVEL;
  if (levelOverride) {
    const level = z.enum(LOG_LEVELS).safeParse(levelOverride);
    if (!level.success) {
      throw new ConfigError(
        `RICH_CLIP_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${levelOverride}")`,
      );
    }
    return { ...config, logLevel: level.data };
  }

  return config;
}
