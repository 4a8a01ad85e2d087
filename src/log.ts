// src/log.ts
import { LOG_CONFIG } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(v: string): v is LogLevel {
  return v in LEVELS;
}

let minLevel: LogLevel = isLogLevel(LOG_CONFIG.level) ? LOG_CONFIG.level : "info";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export type Log = {
  debug: (...a: unknown[]) => void;
  info: (...a: unknown[]) => void;
  warn: (...a: unknown[]) => void;
  error: (...a: unknown[]) => void;
};

/** Console logger with a `[scope]` prefix, filtered by the global level. */
export function createLog(scope: string): Log {
  const tag = `[${scope}]`;
  const on = (level: LogLevel) => LEVELS[level] >= LEVELS[minLevel];
  return {
    debug: (...a) => { if (on("debug")) console.debug(tag, ...a); },
    info: (...a) => { if (on("info")) console.log(tag, ...a); },
    warn: (...a) => { if (on("warn")) console.warn(tag, ...a); },
    error: (...a) => { if (on("error")) console.error(tag, ...a); },
  };
}
