/**
 * Logger
 *
 * One pino root for the process. Components take children of it, and
 * operations take children of those.
 */

import { pino } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env['LOG_LEVEL'];
const pretty = (process.env['NODE_ENV'] ?? 'development') === 'development';

export const logger = pino({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: { service: 'tunegrab' },
  redact: { paths: ['botToken', '*.botToken', 'headers.cookie', 'headers.authorization'], censor: '[redacted]' },
  ...(pretty ? { transport: { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname,service' } } } : {}),
});

export type Logger = typeof logger;

/**
 * Apply the configured level once `.env` has been read; children
 * created before this call keep the level they were created with.
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
