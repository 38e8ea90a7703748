/**
 * Console logging with a level gate. `--logall` switches to debug.
 */

import { KeyWarning } from './types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export const logger = {
  debug(message: string, ...context: unknown[]): void {
    if (enabled('debug')) console.log(message, ...context);
  },
  info(message: string, ...context: unknown[]): void {
    if (enabled('info')) console.log(message, ...context);
  },
  warn(message: string, ...context: unknown[]): void {
    if (enabled('warn')) console.warn(message, ...context);
  },
  error(message: string, ...context: unknown[]): void {
    if (enabled('error')) console.error(message, ...context);
  }
};

export function logWarnings(warnings: readonly KeyWarning[]): void {
  for (const warning of warnings) {
    logger.warn(`[${warning.kind}] ${warning.message}`);
  }
}
