import type { LogLevel } from "../config/schema";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const WARNED_KEYS = new Set<string>();

export interface Logger {
  debug(message: string, ...extra: unknown[]): void;
  info(message: string, ...extra: unknown[]): void;
  warn(message: string, ...extra: unknown[]): void;
  error(message: string, ...extra: unknown[]): void;
  /** warn at most once per key for the life of the process */
  warnOnce(key: string, message: string): void;
}

export function createLogger(tag: string, level: LogLevel = "info"): Logger {
  const enabled = (at: LogLevel) => RANK[at] >= RANK[level];
  const prefix = `[${tag}]`;

  return {
    debug: (message, ...extra) => {
      if (enabled("debug")) console.debug(prefix, message, ...extra);
    },
    info: (message, ...extra) => {
      if (enabled("info")) console.info(prefix, message, ...extra);
    },
    warn: (message, ...extra) => {
      if (enabled("warn")) console.warn(prefix, message, ...extra);
    },
    error: (message, ...extra) => {
      if (enabled("error")) console.error(prefix, message, ...extra);
    },
    warnOnce: (key, message) => {
      if (!enabled("warn") || WARNED_KEYS.has(key)) return;
      WARNED_KEYS.add(key);
      console.warn(prefix, message);
    },
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
