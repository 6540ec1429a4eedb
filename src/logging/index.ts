export {
  createLogger,
  formatLogLine,
  isLogLevel,
  setDefaultLogLevel,
  setDefaultLogSink,
  consoleSink,
  stderrSink,
  silentLogger,
  LOG_LEVELS,
} from "./logger.js";
export type { Logger, LoggerOptions, LogLevel, LogData, LogSink } from "./logger.js";
