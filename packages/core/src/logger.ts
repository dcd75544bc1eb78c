/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context.
 * Output goes to stderr so that JSON results printed on stdout stay parseable.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

// Read on every call so tests and the CLI can change LOG_LEVEL at runtime
function isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[parseLogLevel(process.env.LOG_LEVEL)];
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    documentId: reqContext?.documentId,
    sourceFile: reqContext?.sourceFile,
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
