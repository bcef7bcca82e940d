import pino from 'pino';

/**
 * Structured Logger
 *
 * pino JSON lines in production, pino-pretty in development, silent under
 * NODE_ENV=test. Components take a child logger from `loggers` (or
 * createLogger) and always attach `fileId` when they act on a file, so a
 * single file's run can be followed across stages.
 */

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

// Configure log level from environment
const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Configure transport for pretty printing in development
const transport = isDevelopment && !isTest
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    }
  : undefined;

/**
 * Base logger configuration
 */
export const logger = pino({
  level: isTest ? 'silent' : logLevel,
  transport,
  base: {
    env: process.env.NODE_ENV,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger with additional context
 * 
 * @param context - Object with context properties (e.g., { module: 'auth' })
 * @returns A child logger instance
 * 
 * @example
 * const blobLogger = createLogger({ module: 'blob-store' });
 * blobLogger.info({ contentHash }, 'Blob stored');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

/**
 * Pre-configured loggers for pipeline components
 */
export const loggers = {
  api: createLogger({ module: 'api' }),
  ingestion: createLogger({ module: 'ingestion' }),
  pipeline: createLogger({ module: 'pipeline' }),
  suggestions: createLogger({ module: 'suggestions' }),
  scheduler: createLogger({ module: 'batch-scheduler' }),
};

/**
 * Request logger middleware context creator
 * Use this to add request-specific context to logs
 */
export interface RequestContext {
  requestId?: string;
  path?: string;
  method?: string;
}

export function createRequestLogger(context: RequestContext): pino.Logger {
  return logger.child({
    module: 'http',
    ...context,
  });
}

/**
 * Error logging helper with stack trace handling
 */
export function logError(
  loggerInstance: pino.Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  loggerInstance.error(
    {
      err: {
        message: err.message,
        stack: err.stack,
        name: err.name,
        code,
      },
      ...context,
    },
    message
  );
}

/**
 * Performance timing helper
 */
export function logTiming(
  loggerInstance: pino.Logger,
  operation: string,
  startTime: number,
  context?: Record<string, unknown>
): number {
  const duration = Date.now() - startTime;
  loggerInstance.info(
    {
      operation,
      durationMs: duration,
      ...context,
    },
    `${operation} completed in ${duration}ms`
  );
  return duration;
}
