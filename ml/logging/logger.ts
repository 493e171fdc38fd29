import type { LogLevel } from "../config";

export type LogFields = Record<string, unknown>;

export type LogEntry = {
  at: string;
  level: LogLevel;
  scope: string;
  message: string;
  fields?: LogFields;
};

export type Logger = {
  scope: string;
  entries: LogEntry[];
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  child: (scope: string) => Logger;
};

// Recent entries kept in memory per logger.
export const MAX_LOG_ENTRIES = 500;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function resolveLevel(level?: LogLevel): LogLevel {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv === "debug" || fromEnv === "info" || fromEnv === "warn" || fromEnv === "error") {
    return fromEnv;
  }
  return "info";
}

export type LoggerOptions = {
  level?: LogLevel;
  silent?: boolean;
  // Send every level to stderr, for processes whose stdout carries a protocol.
  stderr?: boolean;
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[resolveLevel(options.level)];
  const entries: LogEntry[] = [];

  const push = (level: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_RANK[level] < threshold) return;
    const entry: LogEntry = {
      at: new Date().toISOString(),
      level,
      scope,
      message,
      ...(fields ? { fields } : {}),
    };
    entries.push(entry);
    if (entries.length > MAX_LOG_ENTRIES) entries.shift();
    if (options.silent) return;

    const line = fields ? `[${scope}:${level}] ${message} ${JSON.stringify(fields)}` : `[${scope}:${level}] ${message}`;
    if (level === "error" || options.stderr) {
      console.error(line);
      return;
    }
    if (level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  };

  return {
    scope,
    entries,
    debug: (message, fields) => push("debug", message, fields),
    info: (message, fields) => push("info", message, fields),
    warn: (message, fields) => push("warn", message, fields),
    error: (message, fields) => push("error", message, fields),
    child: (childScope) => createLogger(`${scope}.${childScope}`, options),
  };
}

export function serializeError(error: unknown): LogFields {
  if (error instanceof Error) {
    const cause = error.cause === undefined ? undefined : serializeError(error.cause);
    return {
      name: error.name,
      message: error.message,
      ...(cause ? { cause } : {}),
    };
  }
  return { name: "Error", message: String(error) };
}
