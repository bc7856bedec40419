import { BaseError } from "./errors";
import type { LogLevelName } from "./config";

const LEVELS: Record<LogLevelName, number> = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 };

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

export interface LoggerOptions {
  service: string;
  level?: LogLevelName;
  requestId?: string;
}

/**
 * Structured JSON logger. One is created per invocation and passed down;
 * nothing about logging lives at module scope.
 */
export function createLogger(options: LoggerOptions, bound: LogFields = {}): Logger {
  const threshold = LEVELS[options.level ?? "INFO"];

  const write = (level: LogLevelName, message: string, fields: LogFields = {}) => {
    if (LEVELS[level] < threshold) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      service: options.service,
      requestId: options.requestId,
      ...bound,
      ...fields,
    });

    if (level === "ERROR") console.error(line);
    else if (level === "WARN") console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, fields) => write("DEBUG", message, fields),
    info: (message, fields) => write("INFO", message, fields),
    warn: (message, fields) => write("WARN", message, fields),
    error: (message, fields) => write("ERROR", message, fields),
    child: (fields) => createLogger(options, { ...bound, ...fields }),
  };
}

export function errorFields(error: unknown): LogFields {
  if (error instanceof BaseError) {
    return { error: error.message, errorName: error.name, errorCode: error.code, stack: error.stack };
  }
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error) };
}
