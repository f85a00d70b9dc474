/**
 * Logging
 * @module logger
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

function defaultLevel(): LevelWithSilent {
  if (process.env.NODE_ENV === 'test' || process.env.VITEST) {
    return 'silent';
  }
  const level = process.env.LOG_LEVEL;
  const known: LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
  return known.find((candidate) => candidate === level) ?? 'info';
}

let rootLogger: Logger | null = null;

/**
 * Get the process-wide root logger
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({ name: 'stockbill', level: defaultLevel() });
  }
  return rootLogger;
}

/**
 * Create a child logger tagged with a component name
 */
export function createLogger(component: string, parent: Logger = getRootLogger()): Logger {
  return parent.child({ component });
}
