import { env } from "../config/env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function emit(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[env.LOG_LEVEL]) {
    return;
  }

  const payload = {
    ts: new Date().toISOString(),
    level,
    message,
    ...context,
  };

  const serialized = JSON.stringify(payload);

  if (level === "error") {
    console.error(serialized);
    return;
  }

  if (level === "warn") {
    console.warn(serialized);
    return;
  }

  console.log(serialized);
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bound: LogContext): Logger;
}

function createLogger(bound: LogContext): Logger {
  return {
    debug: (message, context) => emit("debug", message, { ...bound, ...context }),
    info: (message, context) => emit("info", message, { ...bound, ...context }),
    warn: (message, context) => emit("warn", message, { ...bound, ...context }),
    error: (message, context) => emit("error", message, { ...bound, ...context }),
    child: (extra) => createLogger({ ...bound, ...extra }),
  };
}

export const logger: Logger = createLogger({});

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
