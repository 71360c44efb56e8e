export {
  createLogger,
  configureLogging,
  resetLogging,
  isLogLevel,
  logger,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerOptions,
  type ConfigureLoggingOptions,
} from './logger.js';

export { Semaphore, Mutex, type Release } from './concurrency.js';
