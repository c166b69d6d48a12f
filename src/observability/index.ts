export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  createLogger,
  parseLogLevel,
  maskSecret,
  DEFAULT_LOG_CONFIG,
} from './logging.js';
export type { Logger, LogEntry, LogConfig, LogSink } from './logging.js';
