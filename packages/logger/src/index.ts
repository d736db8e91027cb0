/**
 * @fileoverview Public API exports for @mdpoc/logger
 * Structured logging and error handling for the market data pipeline
 */

// Core logger creation
export { createLogger } from './createLogger.js';

// In-memory logger
export { createMemoryLogger } from './memory.js';

// Global error handlers
export { attachGlobalHandlers, gracefulExit, serializeError } from './errorHandler.js';

// Run context management
export { generateRunId, getRunId, withRunContext } from './run-context.js';

// Timing
export { startTimer } from './timer.js';

// Redaction helpers
export { isSensitiveFieldName, redactSensitiveFields } from './formats.js';

export type { Logger, LoggerConfig, LogLevel } from './types.js';
export type { RunContext } from './run-context.js';
export type { PerfTimer } from './timer.js';
export type { CapturedEntry, MemoryLogger } from './memory.js';
