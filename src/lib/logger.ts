import chalk from "chalk";

import { FormattedLogValues } from "../templates/formatted-log-values.js";

/**
 * Log levels from most to least verbose
 */
export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

/**
 * `text` writes the rendered message; `json` writes one object per line with
 * every extracted field
 */
export type LogFormat = "text" | "json";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  format: LogFormat;
}

type Write = (line: string) => void;

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Logger whose messages are named templates:
 *
 * ```typescript
 * logger.info("Rendered {Count} templates in {Elapsed:F1} ms", 3, 1.25);
 * ```
 */
class Logger {
  private level: LogLevel = "info";
  private prefix: string = "";
  private format: LogFormat = "text";

  /**
   * Configure the logger
   */
  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.level = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
    if (config.format !== undefined) {
      this.format = config.format;
    }
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private write(
    level: Exclude<LogLevel, "silent">,
    write: Write,
    paint: (text: string) => string,
    template: string,
    args: unknown[]
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const state = new FormattedLogValues(template, ...args);

    if (this.format === "json") {
      // Template fields never replace the entry's own keys
      const entry = {
        ...state.toRecord(),
        level,
        ...(this.prefix ? { prefix: this.prefix } : {}),
        message: state.toString(),
      };
      write(JSON.stringify(entry, jsonReplacer));
      return;
    }

    const message = state.toString();
    write(paint(this.prefix ? `${this.prefix} ${message}` : message));
  }

  /**
   * Debug level logging (gray)
   */
  debug(template: string, ...args: unknown[]): void {
    this.write("debug", (line) => console.debug(line), chalk.gray, template, args);
  }

  /**
   * Info level logging (default color)
   */
  info(template: string, ...args: unknown[]): void {
    this.write("info", (line) => console.info(line), (text) => text, template, args);
  }

  /**
   * Warning level logging (yellow)
   */
  warn(template: string, ...args: unknown[]): void {
    this.write("warn", (line) => console.warn(line), chalk.yellow, template, args);
  }

  /**
   * Error level logging (red)
   */
  error(template: string, ...args: unknown[]): void {
    this.write("error", (line) => console.error(line), chalk.red, template, args);
  }

  /**
   * Success message (green)
   */
  success(template: string, ...args: unknown[]): void {
    this.write("info", (line) => console.info(line), chalk.green, template, args);
  }

  /**
   * Create a child logger with a prefix
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.format = this.format;
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }
}

export type { Logger };

/**
 * Global logger instance
 */
export const logger = new Logger();
