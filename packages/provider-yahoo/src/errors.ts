/**
 * @fileoverview Mapping of Yahoo chart failures onto pipeline errors.
 *
 * Symbol-level problems become {@link BarDataError}; problems reaching or
 * being served by Yahoo become {@link ConnectivityError}.
 *
 * @module @mdpoc/provider-yahoo/errors
 */

import { BarDataError, ConnectivityError, describeCause, type PipelineError } from '@mdpoc/contracts';

export const PROVIDER_NAME = 'yahoo';

/** Statuses that say nothing about the symbol itself */
const CONNECTIVITY_STATUSES = new Set([401, 403, 408, 429]);

/**
 * Maps a non-2xx chart response to an error.
 *
 * @example
 * ```typescript
 * mapYahooHttpError('ZZZZ', 404, 'Not Found');
 * // BarDataError: Yahoo chart request for ZZZZ failed: HTTP 404 Not Found
 * mapYahooHttpError('AAPL', 503, 'Service Unavailable');
 * // ConnectivityError: Yahoo chart request for AAPL failed: HTTP 503 Service Unavailable
 * ```
 */
export function mapYahooHttpError(symbol: string, status: number, statusText: string): PipelineError {
  const message = `Yahoo chart request for ${symbol} failed: HTTP ${status} ${statusText}`.trimEnd();
  const data = { symbol, provider: PROVIDER_NAME, status };

  if (status >= 500 || CONNECTIVITY_STATUSES.has(status)) {
    return new ConnectivityError(message, data);
  }
  return new BarDataError(message, data);
}

/**
 * Maps a thrown fetch or body-read failure to an error.
 */
export function mapYahooTransportError(
  symbol: string,
  error: unknown,
  timedOut: boolean,
  timeoutMs: number
): PipelineError {
  if (timedOut) {
    return new ConnectivityError(
      `Yahoo chart request for ${symbol} timed out after ${timeoutMs}ms`,
      { symbol, provider: PROVIDER_NAME, timeoutMs },
      { cause: error }
    );
  }

  if (error instanceof SyntaxError) {
    return new BarDataError(
      `Yahoo chart response for ${symbol} is not valid JSON`,
      { symbol, provider: PROVIDER_NAME },
      { cause: error }
    );
  }

  return new ConnectivityError(
    `Yahoo chart request for ${symbol} failed: ${describeCause(error)}`,
    { symbol, provider: PROVIDER_NAME },
    { cause: error }
  );
}
