/**
 * Structured logging for search operations
 *
 * Entries are written as one JSON object per line to an injected sink.
 * Nothing here writes to stdout on its own; stdout carries search results.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Destination for formatted log lines
 */
export type LogSink = (line: string) => void;

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  readonly #sink: LogSink;
  readonly #minLevel: LogLevel;
  readonly #now: () => Date;

  constructor(sink: LogSink, minLevel: LogLevel = "warn", now: () => Date = () => new Date()) {
    this.#sink = sink;
    this.#minLevel = minLevel;
    this.#now = now;
  }

  get minLevel(): LogLevel {
    return this.#minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Pick<LogEntry, "message" | "details">): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      ts: this.#now().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(JSON.stringify(entry));
  }

  debug(event: string, data?: Pick<LogEntry, "message" | "details">): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Pick<LogEntry, "message" | "details">): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Pick<LogEntry, "message" | "details">): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Pick<LogEntry, "message" | "details">): void {
    this.log("error", event, data);
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger = new Logger(() => {}, "error");
