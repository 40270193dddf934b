/**
 * Logger Service
 *
 * Structured logging with Pino.
 *
 * Log Levels:
 * - fatal: Application crash
 * - error: Error conditions
 * - warn: Warning conditions
 * - info: Informational messages (default)
 * - debug: Debug information
 * - trace: Very detailed tracing
 */

import pino from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';
const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// =============================================================================
// Logger Instance
// =============================================================================

export const logger = pino({
  level: logLevel,
  transport: isDevelopment && !isTest
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
    app: 'bindery',
  },
});

// =============================================================================
// Child Loggers for Services
// =============================================================================

/**
 * Create a child logger with service context
 */
export function createServiceLogger(service: string) {
  return logger.child({ service });
}

// Pre-configured service loggers
export const configLogger = createServiceLogger('config');
export const databaseLogger = createServiceLogger('database');
export const libraryLogger = createServiceLogger('library');
export const seriesLogger = createServiceLogger('series');
export const bookLogger = createServiceLogger('book');
export const metadataLogger = createServiceLogger('metadata');
export const batchLogger = createServiceLogger('batch');

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Log an error with context
 */
export function logError(context: string, error: unknown, metadata?: Record<string, unknown>) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  logger.error({
    context,
    error: errorMessage,
    stack,
    ...metadata,
  }, `[${context}] ${errorMessage}`);
}

/**
 * Log a warning with context
 */
export function logWarn(context: string, message: string, metadata?: Record<string, unknown>) {
  logger.warn({
    context,
    ...metadata,
  }, `[${context}] ${message}`);
}

/**
 * Log info with context
 */
export function logInfo(context: string, message: string, metadata?: Record<string, unknown>) {
  logger.info({
    context,
    ...metadata,
  }, `[${context}] ${message}`);
}

/**
 * Log debug with context
 */
export function logDebug(context: string, message: string, metadata?: Record<string, unknown>) {
  logger.debug({
    context,
    ...metadata,
  }, `[${context}] ${message}`);
}

export default logger;
