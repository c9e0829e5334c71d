// src/utils/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Create the shared logger. Pretty-printed in development, silent under test.
 */
function createLogger(): Logger {
  const env = process.env.NODE_ENV || 'development';
  const isTest = env === 'test';
  const isDevelopment = env === 'development';
  const level = isTest ? 'silent' : process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

  return pino({
    level,
    base: {
      env,
      service: 'statute-retrieval',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

export const logger = createLogger();

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null) {
    try {
      return JSON.stringify(error);
    } catch {
      return 'Unknown object error';
    }
  }
  return String(error);
}
