// src/core/log/logger.ts
// Scoped console-backed logging with a process-wide level

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogRecord = {
  level: Exclude<LogLevel, "silent">;
  scope: string;
  message: string;
  args: unknown[];
};

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(scope: string): Logger;
}

export const consoleSink: LogSink = (record) => {
  const line = `[${record.scope}] ${record.message}`;
  switch (record.level) {
    case "debug": console.debug(line, ...record.args); break;
    case "info": console.info(line, ...record.args); break;
    case "warn": console.warn(line, ...record.args); break;
    case "error": console.error(line, ...record.args); break;
  }
};

const state: { level: LogLevel; sink: LogSink } = {
  level: "warn",
  sink: consoleSink,
};

/** Set the level and sink once, at program start. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level) state.level = options.level;
  if (options.sink) state.sink = options.sink;
}

export function currentLogLevel(): LogLevel {
  return state.level;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

class ScopedLogger implements Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, ...args: unknown[]): void { this.emit("debug", message, args); }
  info(message: string, ...args: unknown[]): void { this.emit("info", message, args); }
  warn(message: string, ...args: unknown[]): void { this.emit("warn", message, args); }
  error(message: string, ...args: unknown[]): void { this.emit("error", message, args); }

  child(scope: string): Logger {
    return new ScopedLogger(`${this.scope}:${scope}`);
  }

  private emit(level: LogRecord["level"], message: string, args: unknown[]): void {
    if (RANK[level] < RANK[state.level]) return;
    state.sink({ level, scope: this.scope, message, args });
  }
}

export function getLogger(scope: string): Logger {
  return new ScopedLogger(scope);
}
