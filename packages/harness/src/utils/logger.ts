/**
 * Structured logging.
 *
 * Every component receives a child of the root logger and logs with
 * `logger.info({ ...context }, 'message')`.
 */

import pino from 'pino';
import type { Logger as PinoLogger, LevelWithSilent } from 'pino';

export type Logger = PinoLogger;
export type LogLevel = LevelWithSilent;

export interface LoggerOptions {
  level: LogLevel;
  service: string;
  /** File descriptor to write to. Defaults to stdout. */
  fd?: 1 | 2;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      level: options.level,
      base: { service: options.service },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(options.fd ?? 1)
  );
}

let shared: Logger | undefined;

/**
 * Logger that discards everything. Used by tests and by components
 * constructed without one. Every call returns the same instance.
 */
export function silentLogger(): Logger {
  shared ??= createLogger({ level: 'silent', service: 'silent' });
  return shared;
}
