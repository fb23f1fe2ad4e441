// src/core/log/index.ts
// Logging exports

export {
  type LogLevel,
  type LogRecord,
  type LogSink,
  type Logger,
  LOG_LEVELS,
  consoleSink,
  configureLogging,
  currentLogLevel,
  isLogLevel,
  getLogger,
} from "./logger";
