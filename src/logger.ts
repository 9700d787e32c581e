import type { LogLevel } from "./types.ts";

/**
 * Minimal structured logger.
 *
 * - One line per event: `[timestamp] LEVEL message {meta}`.
 * - Messages below the configured level are dropped.
 * - `meta` carries context (week, day, path) as a JSON blob instead of being interpolated into the message.
 *
 * The generator prints its own `SUCCESS:` summary on stdout, so warnings and errors go to stderr and stay
 * out of that output.
 */
const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Where formatted lines end up; tests swap in an array-backed sink.
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export class Logger {
  #level: LogLevel;
  #sink: LogSink;

  constructor(level: LogLevel, sink: LogSink = consoleSink) {
    this.#level = level;
    this.#sink = sink;
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.#log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.#log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    // Recovered, but something is off (skipped day, media lookup failed).
    this.#log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.#log("error", message, meta);
  }

  #log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVELS[level] < LEVELS[this.#level]) return;
    const timestamp = new Date().toISOString();
    const payload = meta ? ` ${JSON.stringify(meta)}` : "";
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}${payload}`;

    if (level === "error" || level === "warn") {
      this.#sink.err(line);
    } else {
      this.#sink.out(line);
    }
  }
}

export function createLogger(level: LogLevel, sink?: LogSink) {
  return new Logger(level, sink);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
