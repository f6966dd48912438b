import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// Logs go to stderr; stdout carries the run report.
export function createLogger(name: string, level: LogLevel = 'info'): Logger {
  return pino({ name, level }, process.stderr);
}
