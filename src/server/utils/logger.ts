import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for run context (run ID, batch index, etc.)
 */
export const runContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current run context
 */
export function getRunContext(): Record<string, unknown> {
  return runContext.getStore() || {};
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  const isTest = nodeEnv === 'test';
  const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');
  const usePretty = isDevelopment && process.env.LOG_PRETTY !== 'false';

  return pino({
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'demand-forecast-pipeline',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(usePretty && {
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

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRunContext(), ...additionalContext };
  return logger.child(context);
}

/**
 * Run a function with the given context bound for every child logger created inside it
 */
export function withRunContext<T>(context: Record<string, unknown>, fn: () => T): T {
  return runContext.run({ ...getRunContext(), ...context }, fn);
}

export type { Logger };
