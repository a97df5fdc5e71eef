import type { CommandRunner, RunOptions } from '../src/platform/command';

export interface RecordedRun {
  command: string;
  input?: string | Buffer;
}

/**
 * In-process {@link CommandRunner} that records every command instead of
 * running it. `onCommand` runs before the call settles, while any temporary
 * input file still exists.
 */
export class RecordingRunner implements CommandRunner {
  readonly runs: RecordedRun[] = [];
  readonly launches: string[] = [];

  constructor(
    private readonly onCommand?: (command: string) => void,
    private readonly failure?: Error,
  ) {}

  async run(command: string, options: RunOptions = {}): Promise<void> {
    this.runs.push({ command, input: options.input });
    this.onCommand?.(command);
    if (this.failure) throw this.failure;
  }

  async launch(command: string): Promise<void> {
    this.launches.push(command);
    this.onCommand?.(command);
    if (this.failure) throw this.failure;
  }
}

/** Collects everything written to it, like a captured stdout. */
export class StringSink {
  text = '';

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}
