/**
 * Scoped logger
 *
 * Writes `[scope] message` lines to stderr so stdout stays free for CLI and
 * MCP output. The threshold comes from SEARCHRELAY_LOG_LEVEL (default "info");
 * DEBUG=1 forces debug output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Resolve the active log level from the environment
 */
export function getLogLevel(): LogLevel {
  if (process.env.DEBUG === "1" || process.env.DEBUG === "true") {
    return "debug";
  }
  const configured = process.env.SEARCHRELAY_LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return "info";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
}

/**
 * Create a logger that prefixes every line with its scope
 *
 * @example
 * ```typescript
 * const log = createLogger("RetryFallback");
 * log.warn("HTTP 503 on attempt 2");
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.error(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.error(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(prefix, message, ...details);
    },
  };
}
