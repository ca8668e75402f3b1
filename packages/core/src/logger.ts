/**
 * Scoped logging.
 *
 * Every line is written as `[strata:<scope>] <level>: <message>`. Debug
 * lines are dropped unless the `debug` setting is on (STRATA_DEBUG=1).
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

export function formatLogLine(scope: string, level: LogLevel, message: string): string {
  return `[strata:${scope}] ${level}: ${message}`;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? ((line: string) => console.error(line));
  const write = (level: LogLevel, message: string): void => {
    if (level === "debug" && !config.has("debug")) return;
    writer(formatLogLine(scope, level, message));
  };

  return {
    scope,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
