/**
 * Logging
 *
 * pino loggers, configured the way the HTTP gateway configures its request
 * logger: a level, and pino-pretty when human-readable output is wanted.
 */

import pino, { type Logger } from 'pino';
import type { LoggingSettings, LogLevel } from './config/config.js';

export type { Logger };

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions extends Partial<LoggingSettings> {
  /** Logger name, shown on every line */
  name?: string;
  /** File descriptor written to; 2 keeps stdout free for command output */
  destination?: 1 | 2;
}

/**
 * Create a root logger
 *
 * The level falls back to LOG_LEVEL, then 'info'.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');

  const name = options.name ?? 'drover';
  const destination = options.destination ?? 1;

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: { target: 'pino-pretty', options: { destination } },
    });
  }

  return pino({ name, level }, pino.destination(destination));
}

let defaultLogger: Logger | undefined;

/**
 * Child logger for one component, of the shared default logger when no
 * parent is given
 */
export function componentLogger(parent: Logger | undefined, component: string): Logger {
  if (parent) {
    return parent.child({ component });
  }
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger.child({ component });
}
