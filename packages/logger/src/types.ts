/**
 * @fileoverview Type definitions for the pipeline logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity of messages that will be logged.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/ingest.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Machine-readable JSON when true, pretty-print otherwise.
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for a file transport, written in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;
}

/**
 * Winston's Logger type, re-exported so packages depend on this one only.
 */
export type Logger = WinstonLogger;
