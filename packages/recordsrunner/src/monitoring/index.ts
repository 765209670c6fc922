export {
  Logger,
  REQUEST_ID_HEADER,
  getLogger,
  errorMessage,
  redactObject,
  requestLoggingMiddleware,
} from './logger.js';
export type { LogLevel, LogEntry, LogSink, LoggerOptions } from './logger.js';
