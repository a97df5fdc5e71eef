import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

/**
 * Create the process logger.
 *
 * The CLI passes `pino.destination(2)` so log lines go to stderr and never
 * mix with container or JSON output on stdout.
 */
export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: 'rich-clip',
    },
  };

  return destination ? pino(options, destination) : pino(options);
}

/** Logger that discards everything; the default for library callers. */
export const silentLogger: Logger = createLogger('silent');
