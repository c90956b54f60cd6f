/**
 * Structured logger.
 * Outputs JSON lines in production and readable lines in development.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  scope?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const IS_PRODUCTION = process.env.NODE_ENV === "production";

function resolveThreshold(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "").toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  return IS_PRODUCTION ? "info" : "debug";
}

const threshold = resolveThreshold();

function formatLog(level: LogLevel, message: string, scope?: string, meta?: Record<string, unknown>): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(scope ? { scope } : {}),
    ...meta,
  };

  if (IS_PRODUCTION) {
    return JSON.stringify(entry);
  }

  const prefix = scope ? `[${scope}] ` : "";
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
  return `[${entry.timestamp}] ${level.toUpperCase()} ${prefix}${message}${metaStr}`;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Create a logger whose lines carry the given scope (e.g. "Security").
 */
export function createLogger(scope?: string): Logger {
  return {
    debug(message, meta) {
      if (enabled("debug")) console.debug(formatLog("debug", message, scope, meta));
    },
    info(message, meta) {
      if (enabled("info")) console.log(formatLog("info", message, scope, meta));
    },
    warn(message, meta) {
      if (enabled("warn")) console.warn(formatLog("warn", message, scope, meta));
    },
    error(message, meta) {
      if (enabled("error")) console.error(formatLog("error", message, scope, meta));
    },
  };
}

export const logger = createLogger();

/**
 * Extract a loggable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
