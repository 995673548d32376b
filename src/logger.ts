export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: unknown): void;
}

const enabled = (level: LogLevel): boolean => LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];

const withData = (line: string, data: unknown): unknown[] => (data === undefined ? [line] : [line, data]);

/** Console logger with a `[scope]` prefix; the level is shared process-wide. */
export function createLogger(scope: string): Logger {
  return {
    debug(message, data) {
      if (enabled("debug")) console.debug(...withData(`[${scope}] ${message}`, data));
    },
    info(message, data) {
      if (enabled("info")) console.info(...withData(`[${scope}] ${message}`, data));
    },
    warn(message, data) {
      if (enabled("warn")) console.warn(...withData(`[${scope}] ${message}`, data));
    },
    error(message, data) {
      if (enabled("error")) console.error(...withData(`[${scope}] ${message}`, data));
    },
  };
}
