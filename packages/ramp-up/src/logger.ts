/**
 * Tagged console logger: `[tag] message`, filtered by level.
 *
 * Everything goes to stderr so reporter output on stdout stays parseable.
 */

import { DEFAULT_LOG_LEVEL, type Logger, type LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function createLogger(tag: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (messageLevel: Exclude<LogLevel, "silent">, message: string): void => {
    if (LEVEL_ORDER[messageLevel] > threshold) return;
    const line = `[${tag}] ${message}`;
    if (messageLevel === "error") {
      console.error(line);
    } else if (messageLevel === "warn") {
      console.warn(line);
    } else {
      // console.info/debug write to stdout; keep stdout for reports
      console.error(line);
    }
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger("silent", "silent");
