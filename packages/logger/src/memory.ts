/**
 * @fileoverview In-memory logger for tests and embedding.
 * Entries pass through the same format chain as {@link createLogger}.
 */

import winston, { format } from 'winston';
import Transport from 'winston-transport';
import { redactPII, standardFields } from './formats.js';
import type { Logger, LogLevel } from './types.js';

/**
 * A captured log entry, after redaction and standard fields.
 */
export type CapturedEntry = Record<string, unknown> & {
  level: string;
  message: unknown;
};

class MemoryTransport extends Transport {
  readonly entries: CapturedEntry[] = [];

  override log(info: CapturedEntry, next: () => void): void {
    this.entries.push({ ...info });
    next();
  }
}

/**
 * A logger whose entries are kept in memory.
 */
export interface MemoryLogger {
  logger: Logger;
  entries: CapturedEntry[];

  /** Resolves once entries written so far have reached `entries` */
  flush(): Promise<void>;
}

/**
 * Creates a logger that keeps every entry in memory.
 *
 * @example
 * ```typescript
 * const { logger, entries, flush } = createMemoryLogger();
 * logger.warn('Symbol fetch failed', { symbol: 'ZZZZ' });
 * await flush();
 * entries[0]?.['symbol']; // 'ZZZZ'
 * ```
 */
export function createMemoryLogger(level: LogLevel = 'debug'): MemoryLogger {
  const transport = new MemoryTransport({ level });
  const logger = winston.createLogger({
    level,
    format: format.combine(redactPII(), standardFields),
    transports: [transport],
    exitOnError: false,
  });
  return {
    logger,
    entries: transport.entries,
    flush: () => new Promise<void>((resolve) => setImmediate(resolve)),
  };
}
