import { pino, type DestinationStream, type Logger, type LoggerOptions } from "pino";

/**
 * Structured logging for the middleware.
 *
 * Middleware take an optional `logger`; when omitted they log through the
 * shared module logger returned by `defaultLogger()`.
 */

export type { Logger };

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  /** Log level */
  level?: LogLevel;
  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
  /** Where log lines are written; stdout when omitted */
  destination?: DestinationStream;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: process.env.LOG_LEVEL === "debug" ? "debug" : "info",
  base: {
    service: "gatehouse"
  }
};

export function createLogger(config?: LoggerConfig): Logger {
  const merged = { ...DEFAULT_CONFIG, ...config };
  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base
  };
  return merged.destination ? pino(options, merged.destination) : pino(options);
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

let shared: Logger | undefined;

export function defaultLogger(): Logger {
  if (!shared) {
    shared = createLogger();
  }
  return shared;
}
