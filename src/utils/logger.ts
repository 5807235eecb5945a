import pino from 'pino';

export type LogLevel = pino.LevelWithSilent;

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Narrow a configured level name, falling back when it is not one pino knows
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? fallback;
}

/**
 * Get the log level from environment variables
 * Priority: LOG_LEVEL > NODE_ENV=test (silent) > default (info)
 */
function getLogLevel(): LogLevel {
  if (process.env.LOG_LEVEL) {
    return parseLogLevel(process.env.LOG_LEVEL);
  }

  // In test and CI environments, default to silent to reduce noise
  if (process.env.NODE_ENV === 'test' || process.env.CI === 'true') {
    return 'silent';
  }

  return 'info';
}

/**
 * Create a named logger with environment-aware log level
 * @param name - Logger name (used for filtering and debugging)
 */
export function createLogger(name: string): pino.Logger {
  return pino({
    name,
    level: getLogLevel(),
  });
}
