import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for run context (document ID, pipeline stage, etc.)
 */
export const runContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current run context
 */
export function getRunContext(): Record<string, unknown> {
  return runContext.getStore() || {};
}

/**
 * Create logger instance based on environment; every line carries the active run context
 */
export function createLogger(destination?: DestinationStream): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  // Tests stay quiet unless LOG_LEVEL asks otherwise
  const defaultLevel = nodeEnv === 'test' ? 'silent' : isDevelopment ? 'debug' : 'info';
  const options: LoggerOptions = {
    level: process.env.LOG_LEVEL || defaultLevel,
    base: {
      env: nodeEnv,
      service: 'contract-evidence-engine',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    mixin: () => getRunContext(),
    ...(isDevelopment && !destination && process.env.LOG_PRETTY !== 'false'
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  };

  return destination ? pino(options, destination) : pino(options);
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
