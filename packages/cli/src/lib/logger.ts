import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/**
 * Process-wide logger. Writes JSON lines to stderr so stdout stays
 * reserved for the allocation table.
 */
export const logger = pino(
  {
    name: 'hour-split',
    level: initialLevel(),
  },
  pino.destination(2),
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
