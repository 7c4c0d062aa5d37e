/**
 * Logger setup for pop3-client
 */

import { pino, type Logger } from 'pino';

/**
 * Levels accepted in POP3_LOG_LEVEL
 */
const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const DEFAULT_LOG_LEVEL: LogLevel = 'silent';

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolves a level name, falling back to silent for anything unknown
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase();
  return level && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL;
}

/**
 * Returns the logger a client should write to
 *
 * @param option - Logger from the configuration, false to disable, or undefined for the default
 */
export function createLogger(option: Logger | false | undefined): Logger {
  if (option === false) {
    return pino({ enabled: false });
  }
  if (option) {
    return option;
  }
  return pino({
    name: 'pop3-client',
    level: resolveLogLevel(process.env.POP3_LOG_LEVEL)
  });
}
