/**
 * @module utils/logger
 * @description Leveled, tagged logging for the library's stateful parts.
 *
 * The codec never logs; it returns values. The dispatcher logs rejected
 * and unhandled packets here so that drops are visible without every
 * caller subscribing to events.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type EmittingLevel = Exclude<LogLevel, "silent">;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Destination for formatted lines. Defaults to the console.
 */
export interface LogSink {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface LoggerConfig {
  /** Minimum level written. Default: "info". */
  level?: LogLevel;
  /** Prefix identifying the component. Default: "intent-wire". */
  tag?: string;
  /** One JSON object per line instead of plain text. Default: false. */
  json?: boolean;
  /** Default: console. */
  sink?: LogSink;
  /** Clock for JSON timestamps. Default: () => new Date(). */
  now?: () => Date;
}

export class Logger {
  private config: Required<LoggerConfig>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.level ?? "info",
      tag: config.tag ?? "intent-wire",
      json: config.json ?? false,
      sink: config.sink ?? console,
      now: config.now ?? (() => new Date()),
    };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  isEnabled(level: EmittingLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write("error", message, data);
  }

  private write(
    level: EmittingLevel,
    message: string,
    data: Record<string, unknown> | undefined
  ): void {
    if (!this.isEnabled(level)) return;

    const { sink, tag } = this.config;
    if (this.config.json) {
      const entry = {
        timestamp: this.config.now().toISOString(),
        level,
        tag,
        message,
        data,
      };
      sink[level](JSON.stringify(entry, jsonReplacer));
      return;
    }

    const suffix = data ? ` ${JSON.stringify(data, jsonReplacer)}` : "";
    sink[level](`[${tag}] ${level.toUpperCase()} ${message}${suffix}`);
  }
}

// bigint has no JSON form
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
