/**
 * Minimal leveled logger.
 *
 * Every public entry point takes a logger in its options. When none is
 * given a console logger is built for that call only, so two concurrent
 * conversions never share logging state.
 */

import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface McpLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Lowest level that is written (default "info") */
  readonly level?: LogLevel;
  /** Tag printed after the level, e.g. "mcp" → "[INFO] [mcp] ..." */
  readonly prefix?: string;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Parse a level name case-insensitively. Unknown or empty → undefined.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): McpLogger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const prefix = options.prefix ? `[${options.prefix}] ` : "";

  const format = (level: Exclude<LogLevel, "silent">, message: string): string =>
    `${pc.gray(`[${level.toUpperCase()}]`)} ${prefix}${message}`;

  return {
    debug(message) {
      if (threshold <= LEVEL_ORDER.debug) console.debug(format("debug", message));
    },
    info(message) {
      if (threshold <= LEVEL_ORDER.info) console.info(format("info", message));
    },
    warn(message) {
      if (threshold <= LEVEL_ORDER.warn) console.warn(format("warn", message));
    },
    error(message) {
      if (threshold <= LEVEL_ORDER.error) console.error(format("error", message));
    },
  };
}

export function createNoopLogger(): McpLogger {
  const noop = (): void => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}
