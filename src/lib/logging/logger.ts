/**
 * Logger
 * Level-filtered console output in "pretty" or "json" form
 */

import type { LogFormat, LogLevel } from "../../types/config.ts";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Keys owned by the JSON line itself
const RESERVED_KEYS = new Set(["level", "logger", "msg"]);

const LEVEL_SYMBOL: Record<LogLevel, string> = {
  debug: "·",
  info: "ℹ",
  warn: "⚠",
  error: "✗",
};

/**
 * Structured context attached to a log line
 */
export type LogContext = Record<string, string | number | boolean | null | undefined>;

/**
 * Logger options
 */
export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  name?: string;
}

/**
 * Minimal logger writing to the console
 */
export class Logger {
  readonly level: LogLevel;
  readonly format: LogFormat;
  readonly name: string | undefined;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.format = options.format ?? "pretty";
    this.name = options.name;
  }

  /**
   * Derive a logger that tags every line with a component name
   */
  child(name: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      name: this.name ? `${this.name}:${name}` : name,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const line = this.format === "json"
      ? formatJson(level, message, this.name, context)
      : formatPretty(level, message, this.name, context);

    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Format a log line as a single JSON object
 * Context keys named `level`, `logger` or `msg` are dropped
 */
export function formatJson(
  level: LogLevel,
  message: string,
  name?: string,
  context?: LogContext
): string {
  const fields = Object.entries(context ?? {}).filter(([key]) => !RESERVED_KEYS.has(key));

  return JSON.stringify({
    level,
    ...(name ? { logger: name } : {}),
    msg: message,
    ...Object.fromEntries(fields),
  });
}

/**
 * Format a log line for humans
 * e.g. "ℹ [merkle-tree] Evaluated frontier leaves=5"
 */
export function formatPretty(
  level: LogLevel,
  message: string,
  name?: string,
  context?: LogContext
): string {
  const prefix = name ? `${LEVEL_SYMBOL[level]} [${name}]` : LEVEL_SYMBOL[level];
  const fields = Object.entries(context ?? {})
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);

  return [prefix, message, ...fields].join(" ");
}

/**
 * Logger that writes nothing below "error"
 * Default for trees constructed without explicit options
 */
export const defaultLogger = new Logger({ level: "error" });
