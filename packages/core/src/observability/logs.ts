/**
 * Structured diagnostic logging for store and transaction log events
 * All output goes to stderr so CLI stdout stays clean
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

export type LogSink = (line: string) => void;

function parseLevel(value: string | undefined): LogLevel {
  return LEVELS.find((level) => level === value) ?? "warn";
}

export class Logger {
  #minLevel: LogLevel;
  #sink: LogSink;

  constructor(minLevel: LogLevel = "warn", sink: LogSink = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  #shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.#shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  /**
   * Redirect output (tests capture lines this way)
   */
  setSink(sink: LogSink): void {
    this.#sink = sink;
  }
}

/**
 * Describe an unknown thrown value for a log event
 */
export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const code = "code" in err ? err.code : undefined;
    return { err_name: err.name, err_message: err.message, err_code: code ?? null };
  }
  return { err_message: String(err) };
}

/**
 * Process-wide diagnostic logger; level from KVLOG_LOG_LEVEL
 */
export const logger = new Logger(parseLevel(process.env.KVLOG_LOG_LEVEL));
