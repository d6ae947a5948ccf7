/**
 * Validator logging.
 *
 * Callers may inject any object with these four methods; the default writes
 * to the console with a prefix and a level threshold.
 */

import { DEFAULT_LOG_LEVEL, LOG_PREFIX } from "./constants";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface ValidatorLogger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function createConsoleLogger(
  level: LogLevel = DEFAULT_LOG_LEVEL,
  prefix: string = LOG_PREFIX,
): ValidatorLogger {
  const enabled = (wanted: LogLevel) => LOG_LEVELS[wanted] <= LOG_LEVELS[level];
  return {
    error: (msg, ...args) => {
      if (enabled("error")) console.error(prefix, msg, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(prefix, msg, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.info(prefix, msg, ...args);
    },
    debug: (msg, ...args) => {
      if (enabled("debug")) console.debug(prefix, msg, ...args);
    },
  };
}

export const silentLogger: ValidatorLogger = createConsoleLogger("silent");
