export {
  QosLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  setLogHandler,
  type LogEntry,
  type LogHandler,
  type LogLevel,
  type QosLoggerConfig,
} from './logger.js';
