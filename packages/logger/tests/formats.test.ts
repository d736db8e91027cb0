/**
 * @fileoverview Tests for sensitive-field detection and redaction
 */

import { describe, it, expect } from 'vitest';
import { isSensitiveFieldName, redactSensitiveFields } from '../src/formats.js';

describe('isSensitiveFieldName', () => {
  it('should flag credential-like names case-insensitively', () => {
    expect(isSensitiveFieldName('password')).toBe(true);
    expect(isSensitiveFieldName('API_KEY')).toBe(true);
    expect(isSensitiveFieldName('apiKey')).toBe(true);
    expect(isSensitiveFieldName('accessToken')).toBe(true);
    expect(isSensitiveFieldName('Cookie')).toBe(true);
  });

  it('should leave ordinary names alone', () => {
    expect(isSensitiveFieldName('symbol')).toBe(false);
    expect(isSensitiveFieldName('url')).toBe(false);
    expect(isSensitiveFieldName('User-Agent')).toBe(false);
  });
});

describe('redactSensitiveFields', () => {
  it('should redact nested objects and arrays without mutating the input', () => {
    const input = {
      symbol: 'AAPL',
      clients: [{ name: 'yahoo', secret: 'test-secret' }],
    };

    const output = redactSensitiveFields(input);

    expect(output).toEqual({
      symbol: 'AAPL',
      clients: [{ name: 'yahoo', secret: '[REDACTED]' }],
    });
    expect(input.clients[0]?.secret).toBe('test-secret');
  });

  it('should pass primitives and errors through', () => {
    const error = new Error('boom');

    expect(redactSensitiveFields('text')).toBe('text');
    expect(redactSensitiveFields(null)).toBeNull();
    expect(redactSensitiveFields(error)).toBe(error);
  });

  it('should pass dates and maps through untouched', () => {
    const sessionStart = new Date('2025-01-14T14:30:00.000Z');
    const counts = new Map([['AAPL', 78]]);

    const output = redactSensitiveFields({ sessionStart, counts, token: 'test-token' });

    expect(output).toEqual({ sessionStart, counts, token: '[REDACTED]' });
    expect(redactSensitiveFields(sessionStart)).toBe(sessionStart);
    expect(redactSensitiveFields(counts)).toBe(counts);
  });
});
