// lib/logger.ts
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, v);
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

let activeLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel) {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export type Logger = Record<LogLevel, (message: string, ...meta: unknown[]) => void>;

/**
 * Console logger tagged with `[scope]`.
 * A fixed `level` pins this logger; otherwise it follows the process-wide level.
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const enabled = (l: LogLevel) => LEVELS[l] >= LEVELS[level ?? activeLevel];
  const tag = `[${scope}]`;

  return {
    debug: (message, ...meta) => {
      if (enabled("debug")) console.debug(tag, message, ...meta);
    },
    info: (message, ...meta) => {
      if (enabled("info")) console.info(tag, message, ...meta);
    },
    warn: (message, ...meta) => {
      if (enabled("warn")) console.warn(tag, message, ...meta);
    },
    error: (message, ...meta) => {
      if (enabled("error")) console.error(tag, message, ...meta);
    },
  };
}
