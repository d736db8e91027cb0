/**
 * @fileoverview Custom Winston formats for the pipeline logger.
 * Includes sensitive-field redaction, standard fields with run ID injection,
 * and human-readable output.
 */

import { format } from 'winston';
import { getRunId } from './run-context.js';

/**
 * Field name patterns whose values never reach a transport.
 * Matches are case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/**
 * Winston's own fields, never treated as metadata.
 */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label']);

/**
 * Check whether a field name matches a sensitive pattern.
 */
export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Returns a copy of `value` with sensitive fields replaced, at any depth.
 * Only arrays and plain objects are copied; class instances such as
 * `Error`, `Date` or `Map` are passed through untouched.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ user: 'alice', apiKey: 'test-key' });
 * // { user: 'alice', apiKey: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must run first in the format chain.
 *
 * @example
 * ```typescript
 * logger.info('Provider configured', { provider: 'yahoo', apiKey: 'test-key' });
 * // {"level":"info","message":"Provider configured","provider":"yahoo","apiKey":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(info[key]);
  }
  return info;
});

/**
 * Winston format that adds the timestamp, expands errors and injects
 * `run_id` from the active run context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),

  format.errors({ stack: true }),

  format((info) => {
    const runId = getRunId();
    if (runId && !info['run_id']) {
      info['run_id'] = runId;
    }
    return info;
  })()
);

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2025-01-16T09:00:01.120+0000] info: Roster fetched component=symbol-roster run_id=... count=503
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, run_id, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (run_id) context.push(`run_id=${String(run_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (info['stack']) {
      return `${baseMsg}\n${String(info['stack'])}`;
    }

    return baseMsg;
  })
);
