export {
  ObservaLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type ObservaLoggerConfig,
} from './logger.js';
