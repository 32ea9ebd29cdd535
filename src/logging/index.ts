/**
 * Logging utilities.
 */

export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from "./logger.js";
