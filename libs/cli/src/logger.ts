/**
 * Leveled stderr logger
 */

import type { Logger } from '@quicklaunch/core';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(
  threshold: LogLevel,
  write: (line: string) => void = (line) => { process.stderr.write(`${line}\n`); },
): Logger {
  const log = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (SEVERITY[level] >= SEVERITY[threshold]) {
      write(`[ql] ${level}: ${message}`);
    }
  };

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  };
}
