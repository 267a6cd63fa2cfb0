/**
 * Logging Module
 */

export {
  LogLevel,
  LogEntry,
  LogSink,
  Logger,
  ConsoleLogSink,
  MemoryLogSink,
  LoggingManager,
  CategoryLogger,
  getLoggingManager,
  resetLoggingManager,
  createLogger,
  formatLogEntry,
  getLogLevelDescription,
} from './SyncLogger';
