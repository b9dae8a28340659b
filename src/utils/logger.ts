import pino, { type Logger, type LoggerOptions } from 'pino';
import { getConfig, type AppConfig } from '../config/index.js';
import { APP_NAME, APP_VERSION } from './constants.js';
import { EngineError, ProcessingFailedError } from './errors.js';

let logger: Logger | null = null;

/**
 * Error serializer that keeps the underlying cause of engine and
 * processing failures (spawn errors, inference exceptions, vips errors)
 */
export function serializeError(value: unknown): unknown {
  if (!(value instanceof Error)) {
    return value;
  }
  const serialized = pino.stdSerializers.err(value);
  if ((value instanceof EngineError || value instanceof ProcessingFailedError) && value.originalError) {
    return { ...serialized, originalError: pino.stdSerializers.err(value.originalError) };
  }
  return serialized;
}

/**
 * Logger options for the given configuration. Call sites log failures
 * under both `err` and `error`.
 */
export function createLoggerOptions(config: AppConfig): LoggerOptions {
  const isDev = config.server.env === 'development';

  return {
    level: config.logging.level,
    transport: isDev
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    base: {
      service: APP_NAME,
      version: APP_VERSION,
      env: config.server.env,
    },
    serializers: {
      err: serializeError,
      error: serializeError,
    },
  };
}

/**
 * Create or get the application logger
 */
export function getLogger(): Logger {
  if (!logger) {
    logger = pino(createLoggerOptions(getConfig()));
  }
  return logger;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return getLogger().child(context);
}
