/**
 * @fileoverview Tests for logger creation and the format chain
 */

import { describe, it, expect } from 'vitest';
import winston from 'winston';
import { createLogger } from '../src/createLogger.js';
import { createMemoryLogger } from '../src/memory.js';
import type { LoggerConfig } from '../src/types.js';

describe('createLogger', () => {
  it('should create a logger with the configured level', () => {
    const logger = createLogger({ level: 'info', json: true, console: false });

    expect(logger.level).toBe('info');
  });

  it('should support all log levels', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      expect(createLogger({ level, console: false }).level).toBe(level);
    }
  });

  it('should attach a console transport by default', () => {
    const logger = createLogger({ level: 'info' });

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('should attach no transport when console is disabled and no file is set', () => {
    const logger = createLogger({ level: 'info', console: false });

    expect(logger.transports).toHaveLength(0);
  });
});

describe('memory logger', () => {
  it('should capture message, level, timestamp and metadata', async () => {
    const { logger, entries, flush } = createMemoryLogger();

    logger.info('Roster fetched', { count: 503 });
    await flush();

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('info');
    expect(entries[0]?.message).toBe('Roster fetched');
    expect(entries[0]?.['count']).toBe(503);
    expect(typeof entries[0]?.['timestamp']).toBe('string');
  });

  it('should include child logger context', async () => {
    const { logger, entries, flush } = createMemoryLogger();

    logger.child({ component: 'bar-batch' }).info('Batch complete');
    await flush();

    expect(entries[0]?.['component']).toBe('bar-batch');
  });

  it('should respect level filtering', async () => {
    const { logger, entries, flush } = createMemoryLogger('warn');

    logger.debug('Debug message');
    logger.info('Info message');
    logger.warn('Warn message');
    logger.error('Error message');
    await flush();

    expect(entries.map((entry) => entry.message)).toEqual(['Warn message', 'Error message']);
  });

  it('should redact sensitive fields at any depth', async () => {
    const { logger, entries, flush } = createMemoryLogger();

    logger.info('Provider configured', {
      provider: 'yahoo',
      apiKey: 'test-key',
      headers: { Authorization: 'Bearer test-token', 'User-Agent': 'Mozilla/5.0' },
    });
    await flush();

    expect(entries[0]?.['provider']).toBe('yahoo');
    expect(entries[0]?.['apiKey']).toBe('[REDACTED]');
    expect(entries[0]?.['headers']).toEqual({
      Authorization: '[REDACTED]',
      'User-Agent': 'Mozilla/5.0',
    });
  });
});
