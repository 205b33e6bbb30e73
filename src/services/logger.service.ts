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
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
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
    app: 'tomekeeper',
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
export const grouperLogger = createServiceLogger('grouper');
export const metadataLogger = createServiceLogger('metadata');
export const resolverLogger = createServiceLogger('resolver');
export const adapterLogger = createServiceLogger('adapters');
export const storeLogger = createServiceLogger('approval-store');
export const batchLogger = createServiceLogger('batch');

// =============================================================================
// Express Middleware Logger
// =============================================================================

/**
 * Express request logging middleware
 */
export function requestLogger() {
  const httpLogger = createServiceLogger('http');

  return (req: { method: string; url: string; ip?: string }, res: { statusCode: number; on: (event: string, cb: () => void) => void }, next: () => void) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

      httpLogger[level]({
        method: req.method,
        url: req.url,
        status: res.statusCode,
        duration,
      }, `${req.method} ${req.url} ${res.statusCode} ${duration}ms`);
    });

    next();
  };
}

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

export default logger;
