/**
 * @fileoverview Parser for Yahoo Finance chart responses.
 *
 * Converts a chart payload into pipeline {@link Bar}s.
 *
 * @module @mdpoc/provider-yahoo/parser
 */

import { BarDataError, type Bar } from '@mdpoc/contracts';
import { PROVIDER_NAME } from './errors.js';
import { YahooChartResponseSchema } from './types.js';

/**
 * Half-open range `[start, end)` a parsed bar must open in.
 */
export interface BarRange {
  start: Date;
  end: Date;
}

/**
 * Parses a chart payload into bars for `symbol`.
 *
 * - intervals with a null open, high, low or close are dropped
 * - a null volume becomes 0
 * - with a `range`, bars opening outside `[start, end)` are dropped
 * - a result without timestamps is an empty range, not an error
 *
 * @param symbol - Symbol the bars are attributed to, in pipeline notation
 * @param payload - Decoded JSON body
 * @param range - Optional bar-open filter
 * @throws {BarDataError} On a chart-level error, a missing result or quote, or an unexpected shape
 *
 * @example
 * ```typescript
 * const bars = parseChartResponse('BRK.B', await response.json());
 * // [{ symbol: 'BRK.B', timestamp: '2025-01-15T14:30:00.000Z', open: 470.1, ... }]
 * ```
 */
export function parseChartResponse(symbol: string, payload: unknown, range?: BarRange): Bar[] {
  const parsed = YahooChartResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new BarDataError(`Unexpected Yahoo chart response for ${symbol}`, {
      symbol,
      provider: PROVIDER_NAME,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const { result, error } = parsed.data.chart;
  if (error) {
    throw new BarDataError(`Yahoo chart error for ${symbol}: ${error.description ?? error.code}`, {
      symbol,
      provider: PROVIDER_NAME,
      code: error.code,
    });
  }

  const chart = result?.[0];
  if (!chart) {
    throw new BarDataError(`No chart result for ${symbol}`, { symbol, provider: PROVIDER_NAME });
  }

  const timestamps = chart.timestamp ?? [];
  if (timestamps.length === 0) {
    return [];
  }

  const quote = chart.indicators?.quote[0];
  if (!quote) {
    throw new BarDataError(`No quote data for ${symbol}`, { symbol, provider: PROVIDER_NAME });
  }

  const startMs = range?.start.getTime() ?? Number.NEGATIVE_INFINITY;
  const endMs = range?.end.getTime() ?? Number.POSITIVE_INFINITY;
  const bars: Bar[] = [];

  timestamps.forEach((seconds, index) => {
    const openMs = seconds * 1000;
    if (openMs < startMs || openMs >= endMs) {
      return;
    }

    const open = quote.open?.[index];
    const high = quote.high?.[index];
    const low = quote.low?.[index];
    const close = quote.close?.[index];
    if (typeof open !== 'number' || typeof high !== 'number' || typeof low !== 'number' || typeof close !== 'number') {
      return;
    }

    bars.push({
      symbol,
      timestamp: new Date(openMs).toISOString(),
      open,
      high,
      low,
      close,
      volume: quote.volume?.[index] ?? 0,
    });
  });

  return bars;
}
