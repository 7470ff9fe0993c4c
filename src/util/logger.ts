/**
 * Leveled logger for diagnostics.
 *
 * Everything goes to stderr: stdout carries event output and the
 * space-separated completion feeds that shells read back.
 */

import { z } from 'zod';

import { describeError } from './errors.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Overridden from LOG_LEVEL once configuration is loaded
let currentLogLevel: LogLevel = 'warn';

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLogLevel];
}

function formatMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
}

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export const logger = {
  debug(message: string): void {
    if (shouldLog('debug')) {
      console.error(formatMessage('debug', message));
    }
  },

  info(message: string): void {
    if (shouldLog('info')) {
      console.error(formatMessage('info', message));
    }
  },

  warn(message: string, err?: unknown): void {
    if (shouldLog('warn')) {
      console.error(formatMessage('warn', err ? `${message}: ${describeError(err)}` : message));
    }
  },

  /**
   * Log error-level messages with optional error object
   */
  error(message: string, err?: unknown): void {
    if (shouldLog('error')) {
      console.error(formatMessage('error', err ? `${message}: ${describeError(err)}` : message));
    }
  },
};
