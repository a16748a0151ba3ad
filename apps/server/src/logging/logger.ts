export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child(tag: string): Logger;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(RANK, value);
}

/** Console logger with a `[tag]` prefix, filtered by level. */
export function createLogger(tag: string, level: LogLevel = "info"): Logger {
  const on = (l: LogLevel) => RANK[l] >= RANK[level];
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => { if (on("debug")) console.debug(prefix, ...args); },
    info: (...args) => { if (on("info")) console.log(prefix, ...args); },
    warn: (...args) => { if (on("warn")) console.warn(prefix, ...args); },
    error: (...args) => { if (on("error")) console.error(prefix, ...args); },
    child: (sub) => createLogger(`${tag}:${sub}`, level),
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
