// src/lib/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHTS;
}

// Default to 'error' under test, 'info' otherwise
function currentLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "test" ? "error" : "info";
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console-backed logger tagged with a namespace. The level is read on every
 * call so tests and scripts can change LOG_LEVEL at runtime.
 */
export function createLogger(namespace: string): Logger {
  const enabled = (level: LogLevel) =>
    LEVEL_WEIGHTS[level] >= LEVEL_WEIGHTS[currentLevel()];
  const prefix = (level: LogLevel) =>
    `[${new Date().toISOString()}] [${level.toUpperCase()}] [${namespace}]`;

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(prefix("debug"), message, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.log(prefix("info"), message, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(prefix("warn"), message, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(prefix("error"), message, ...details);
    },
  };
}
