// Default adapters
import type { LogLevel, Logger } from "./types";

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console-backed logger. Every line is tagged with `[scope]` so client,
 * session and UI output can be told apart in the browser console.
 */
export const createConsoleLogger = (
  scope: string,
  level: LogLevel = "info",
): Logger => {
  const tag = `[${scope}]`;
  const enabled = (target: LogLevel) => levelRank[target] >= levelRank[level];

  return {
    debug: (msg, meta) => {
      if (enabled("debug")) console.debug(tag, msg, meta ?? "");
    },
    info: (msg, meta) => {
      if (enabled("info")) console.info(tag, msg, meta ?? "");
    },
    warn: (msg, meta) => {
      if (enabled("warn")) console.warn(tag, msg, meta ?? "");
    },
    error: (msg, meta) => {
      if (enabled("error")) console.error(tag, msg, meta ?? "");
    },
  };
};

export const consoleLogger: Logger = createConsoleLogger("backtest-client");

export const silentLogger: Logger = createConsoleLogger("silent", "silent");

export const systemClock = (): Date => new Date();
