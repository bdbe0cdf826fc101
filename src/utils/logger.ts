export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, msg: string, data?: Record<string, unknown>, scope?: string): string {
  const ts = new Date().toISOString();
  const prefix = scope ? `[${scope}] ` : "";
  const base = `${ts} [${level.toUpperCase()}] ${prefix}${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

/** A logger whose lines carry a `[scope]` tag, e.g. `[scheduler:kernel-build]`. */
export function createLogger(scope?: string): Logger {
  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(formatMsg("debug", msg, data, scope));
    },
    info(msg, data) {
      if (shouldLog("info")) console.info(formatMsg("info", msg, data, scope));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(formatMsg("warn", msg, data, scope));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(formatMsg("error", msg, data, scope));
    },
  };
}

export const log: Logger = createLogger();
