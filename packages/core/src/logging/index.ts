export {
  createLogger,
  createSilentLogger,
  REDACTED,
  REDACT_PATHS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from './logger.js';
