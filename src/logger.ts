/**
 * Logger
 * pino root logger shared by the server, the request logger and the database
 */

import { pino, stdTimeFunctions, type Logger, type LevelWithSilent } from 'pino';

export type { Logger, LevelWithSilent };

const LEVEL_NAMES: Record<string, LevelWithSilent> = {
  ERROR: 'error',
  WARNING: 'warn',
  INFO: 'info',
  DEBUG: 'debug',
  TRACE: 'trace',
  OFF: 'silent',
};

/**
 * Map a LOG_LEVEL value (ERROR, WARNING, INFO, DEBUG, TRACE, OFF) to a pino level.
 * Unset or unrecognised values fall back to `warn`.
 */
export function parseLogLevel(raw: string | undefined): LevelWithSilent {
  if (raw === undefined) return 'warn';
  return LEVEL_NAMES[raw.trim().toUpperCase()] ?? 'warn';
}

export function createLogger(level: LevelWithSilent = 'warn'): Logger {
  return pino({
    name: 'laundry-api',
    level,
    timestamp: stdTimeFunctions.isoTime,
  });
}
