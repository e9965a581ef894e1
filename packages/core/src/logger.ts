/**
 * Structured JSON logger. One JSON object per line; errors go to stderr.
 */

import { isTruthyFlag } from "./config";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
};

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export type LoggerOptions = {
  level?: LogLevel;
  /** Drops debug and info lines. Warnings and errors are always written. */
  silent?: boolean;
  sink?: LogSink;
  now?: () => Date;
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function writeToProcess(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === "error") {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
}

function serializeFields(fields: LogFields | undefined): LogFields {
  if (!fields) {
    return {};
  }
  const serialized: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    serialized[key] =
      value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
  }
  return serialized;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel: LogLevel =
    options.silent && LOG_LEVEL_PRIORITY[options.level ?? "info"] < LOG_LEVEL_PRIORITY.warn
      ? "warn"
      : options.level ?? "info";
  const sink = options.sink ?? writeToProcess;
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string, fields?: LogFields): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) {
      return;
    }
    sink({
      timestamp: now().toISOString(),
      level,
      message,
      ...serializeFields(fields)
    });
  }

  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields)
  };
}

export const logger: Logger = createLogger({
  silent: isTruthyFlag(process.env.IHH_SILENT_INIT)
});
