import pino, { type Logger, type LoggerOptions } from 'pino';
import { env } from '../env.js';

const isDevelopment = env.NODE_ENV === 'development';

const errorSerializer = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    return {
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { value: error };
};

const baseOptions: LoggerOptions = {
  level: env.LOG_LEVEL,
  serializers: {
    err: errorSerializer,
    error: errorSerializer,
  },
  formatters: {
    level(label) {
      return { level: label };
    },
    bindings(bindings) {
      return {
        pid: bindings['pid'],
        hostname: bindings['hostname'],
      };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isDevelopment
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss.l',
            ignore: 'pid,hostname',
            singleLine: false,
            destination: 2,
          },
        },
      }
    : {}),
};

// stdout carries the report; diagnostics go to stderr.
const rootLogger: Logger = isDevelopment
  ? pino(baseOptions)
  : pino(baseOptions, pino.destination(2));

type ModuleName = 'cli' | 'discovery' | 'pipeline' | 'proxy' | 'report';

const childLoggerCache = new Map<string, Logger>();

/**
 * Creates or retrieves a cached child logger for a specific module.
 * Child loggers automatically include the module name in all log output.
 */
export function getLogger(module: ModuleName, bindings?: Record<string, unknown>): Logger {
  const cacheKey = bindings ? `${module}:${JSON.stringify(bindings)}` : module;

  const cached = childLoggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const child = rootLogger.child({ module, ...bindings });
  childLoggerCache.set(cacheKey, child);
  return child;
}
