// src/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';

import { loadEnv } from './config';

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const env = loadEnv();
  return pino({
    name: 'srx-model',
    level: env.LOG_LEVEL,
    base: {
      env: env.NODE_ENV,
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}

export type { Logger };
