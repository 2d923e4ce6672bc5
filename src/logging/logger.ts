/**
 * Leveled logger used by the parse entry points. Parsing defaults to
 * SilentLogger; pass a ConsoleLogger through the parse options to see what
 * the helper is doing.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LogSink {
  stdout(line: string): void;
  stderr(line: string): void;
}

const processSink: LogSink = {
  stdout: (line) => {
    process.stdout.write(line + "\n");
  },
  stderr: (line) => {
    process.stderr.write(line + "\n");
  },
};

export class ConsoleLogger implements Logger {
  private readonly minLevel: number;
  private readonly prefix: string;
  private readonly sink: LogSink;

  constructor(level: LogLevel = "info", prefix = "cqasm", sink: LogSink = processSink) {
    this.minLevel = LEVEL_ORDER[level];
    this.prefix = prefix;
    this.sink = sink;
  }

  debug(message: string, context?: LogContext): void {
    if (this.minLevel > LEVEL_ORDER.debug) return;
    this.write("DEBUG", message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.minLevel > LEVEL_ORDER.info) return;
    this.write("INFO ", message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.minLevel > LEVEL_ORDER.warn) return;
    this.write("WARN ", message, context);
  }

  error(message: string, context?: LogContext): void {
    if (this.minLevel > LEVEL_ORDER.error) return;
    this.write("ERROR", message, context, true);
  }

  private write(
    label: string,
    message: string,
    context: LogContext | undefined,
    toStderr = false
  ): void {
    const timestamp = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
    const suffix = context !== undefined ? "  " + JSON.stringify(context) : "";
    const line = `${timestamp} [${this.prefix}] [${label}] ${message}${suffix}`;
    if (toStderr) {
      this.sink.stderr(line);
    } else {
      this.sink.stdout(line);
    }
  }
}

export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const silentLogger: Logger = new SilentLogger();
