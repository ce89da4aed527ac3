import type { LogLevel } from "@/lib/schemas/astro";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function serializeLogData(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ message: data.message, stack: data.stack }, null, 2);
  }

  return JSON.stringify(data, null, 2);
}

function write(
  threshold: LogLevel,
  level: Exclude<LogLevel, "silent">,
  message: string,
  data?: unknown,
): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
    return;
  }

  const sink =
    level === "error"
      ? console.error
      : level === "warn"
        ? console.warn
        : level === "debug"
          ? console.debug
          : console.info;

  if (data === undefined) {
    sink(message);
    return;
  }

  sink(message, serializeLogData(data));
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

/**
 * A logger pinned to `level`. Without one it follows the process-wide
 * threshold set by `setLogLevel`.
 */
export function createLogger(level?: LogLevel): Logger {
  const current = () => level ?? threshold;

  return {
    debug: (message, data) => write(current(), "debug", message, data),
    info: (message, data) => write(current(), "info", message, data),
    warn: (message, data) => write(current(), "warn", message, data),
    error: (message, error) => write(current(), "error", message, error),
  };
}

export const logger = createLogger();
