/** Anything that accepts text, e.g. `process.stderr`. */
export interface LogSink {
  write(text: string): unknown;
}

/**
 * Thin logging wrapper for centralized output control.
 * Writes to stderr by default so stdout only carries the generated YAML.
 */
export class Logger {
  constructor(
    private readonly verbose: boolean,
    private readonly sink: LogSink = process.stderr,
  ) {}

  private line(message: string): void {
    this.sink.write(`${message}\n`);
  }

  info(message: string): void {
    this.line(message);
  }

  warn(message: string): void {
    this.line(message);
  }

  error(message: string, err?: unknown): void {
    const detail = err instanceof Error ? err.message : String(err ?? "");
    this.line(detail ? `${message}: ${detail}` : message);
  }

  /** Log only when verbose mode is enabled. */
  debug(message: string): void {
    if (this.verbose) {
      this.line(message);
    }
  }
}
