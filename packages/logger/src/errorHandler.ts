/**
 * @fileoverview Process-level handlers for uncaught exceptions and
 * unhandled rejections. Errors are logged, then the process exits with 1.
 */

import type { Logger } from './types.js';

/**
 * Time allowed for transports to flush before a forced exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Serializes a thrown value for structured logging.
 */
export function serializeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return {
      name: reason.name,
      message: reason.message,
      ...('code' in reason && typeof reason.code === 'string' ? { code: reason.code } : {}),
      stack: reason.stack,
    };
  }
  return { message: String(reason) };
}

/**
 * Attaches global error handlers to the Node.js process.
 *
 * The process does not try to continue after an unhandled error: the error
 * is logged and the process exits with code 1 once the logger has flushed.
 * Attaching twice is a no-op that logs a warning.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: serializeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: serializeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  process.on('warning', (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: serializeError(warning),
      event: 'warning',
    });
  });

  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });
}

/**
 * Ends the logger and exits once it has flushed, or after
 * {@link FLUSH_TIMEOUT_MS} if it never does.
 */
export function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
