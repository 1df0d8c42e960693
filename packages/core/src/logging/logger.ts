/**
 * Structured logger using pino
 *
 * - JSON lines with ISO timestamps
 * - Written to stderr by default: stdout belongs to the MCP stdio protocol
 * - Tokens and Authorization headers are redacted wherever they appear
 */

import pino, { type DestinationStream, type Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const REDACTED = '[REDACTED]';

export const REDACT_PATHS = [
  'token',
  '*.token',
  'headers.Authorization',
  'headers.authorization',
  '*.headers.Authorization',
  '*.headers.authorization',
];

export interface LoggerOptions {
  level?: LogLevel | undefined;
  name?: string | undefined;
  /** Defaults to stderr */
  destination?: DestinationStream | undefined;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'sonargate',
      level: options.level ?? 'info',
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: {
        paths: REDACT_PATHS,
        censor: REDACTED,
      },
    },
    options.destination ?? pino.destination(2)
  );
}

/**
 * Logger that discards everything, for tests and embedders that bring no logger
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
