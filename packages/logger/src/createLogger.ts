/**
 * @fileoverview Logger factory for the market data pipeline.
 * Creates Winston loggers with structured fields, sensitive-field redaction
 * and console and/or file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Ingest started', { symbols: 503 });
 *
 * const rosterLogger = logger.child({ component: 'symbol-roster' });
 * rosterLogger.debug('Requesting roster page', { url });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  // Order matters: redact first, then standard fields, then output format
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        // stdout carries command output; logs go to stderr
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // errorHandler.ts decides when the process exits
    exitOnError: false,
  });
}
