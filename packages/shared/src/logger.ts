/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include the correlation ID and file name from the
 * AsyncLocalStorage context. Logs are written to stderr; stdout carries the
 * CLI's rendered results.
 */

import { getCorrelationId, getContext } from './context';
import { config, type LogLevel } from './config';

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[config.logLevel];
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const runContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    fileName: runContext?.fileName,
    issuer: runContext?.issuer,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (isEnabled('info')) {
      console.error(formatLog('INFO', message, context));
    }
  },

  warn: (message: string, context?: LogContext) => {
    if (isEnabled('warn')) {
      console.error(formatLog('WARN', message, context));
    }
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!isEnabled('error')) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (isEnabled('debug')) {
      console.error(formatLog('DEBUG', message, context));
    }
  },
};
