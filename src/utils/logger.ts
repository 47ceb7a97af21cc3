import pino from 'pino';
import { config } from '../config/env';

type LogLevel = pino.LevelWithSilent;

const baseOptions: pino.LoggerOptions = {
  level: config.app.isTest ? 'silent' : config.logging.level,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
};

// Build streams for multi-stream logging
const streams: pino.StreamEntry[] = [];

if (config.logging.format === 'pretty') {
  streams.push({
    stream: pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        destination: 2,
      },
    }),
    level: 'trace',
  });
} else {
  // JSON to stderr; stdout is left free for the CLI
  streams.push({ stream: process.stderr, level: 'trace' });
}

if (config.logging.file) {
  streams.push({
    stream: pino.destination({ dest: config.logging.file, sync: false, mkdir: true }),
    level: 'trace',
  });
}

// Test runs never open transports or files
export const logger: pino.Logger = config.app.isTest
  ? pino(baseOptions)
  : pino(baseOptions, pino.multistream(streams));

const children = new Set<pino.Logger>();

// Create child logger with context
export const createLogger = (context: string): pino.Logger => {
  const child = logger.child({ context });
  children.add(child);
  return child;
};

/**
 * Change the level of the root logger and every child created so far.
 * Children copy the level at creation time, so they are tracked here.
 */
export const setLogLevel = (level: LogLevel): void => {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
};

// Helper for structured error logging
export const logError = (error: Error, context?: Record<string, unknown>) => {
  logger.error(
    {
      err: error,
      ...context,
    },
    error.message
  );
};

// Helper for performance logging
export const logPerformance = (operation: string, startTime: number, metadata?: object) => {
  const duration = Date.now() - startTime;
  logger.info(
    {
      operation,
      duration,
      ...metadata,
    },
    `${operation} completed in ${duration}ms`
  );
};
