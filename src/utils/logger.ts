export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Scoped console logger. Every line carries an ISO timestamp, the level and
 * the scope, e.g. `2024-05-01T10:00:00.000Z INFO [HybridRetriever] ...`.
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;
    const sink =
      level === "error"
        ? console.error
        : level === "warn"
          ? console.warn
          : console.log;

    if (data === undefined) {
      sink(line);
    } else {
      sink(line, data);
    }
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}
