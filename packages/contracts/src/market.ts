/**
 * @fileoverview Market data types and the bar client contract.
 *
 * Pure data structures with no I/O. Every provider adapter and the batch
 * fetcher speak these types.
 *
 * @module @mdpoc/contracts/market
 */

import type { BarInterval } from './intervals.js';

/**
 * Ticker symbol, e.g. `'AAPL'` or `'BRK.B'`.
 *
 * Valid symbols are 1-5 characters of uppercase letters, digits and `.`,
 * contain at least one letter and neither start nor end with `.`.
 */
export type TickerSymbol = string;

/**
 * A single OHLCV observation for one symbol.
 *
 * No range invariants are enforced here; price and volume sanity belong to
 * the provider that produced the bar.
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   symbol: 'AAPL',
 *   timestamp: '2025-01-15T14:30:00.000Z',
 *   open: 231.5,
 *   high: 232.1,
 *   low: 231.2,
 *   close: 231.9,
 *   volume: 412000
 * };
 * ```
 */
export interface Bar {
  /** Symbol the bar belongs to */
  symbol: TickerSymbol;

  /** ISO 8601 timestamp of bar open (UTC) */
  timestamp: string;

  /** Opening price for the period */
  open: number;

  /** Highest price during the period */
  high: number;

  /** Lowest price during the period */
  low: number;

  /** Closing price for the period */
  close: number;

  /** Traded volume during the period */
  volume: number;
}

/**
 * Regular trading hours for one calendar date, as a half-open interval.
 *
 * @invariant start < end
 * @invariant start and end fall on `date` in local time
 */
export interface SessionWindow {
  /** Calendar date of the session (YYYY-MM-DD, local) */
  date: string;

  /** Session open (inclusive), 09:30 local */
  start: Date;

  /** Session close (exclusive), 16:00 local */
  end: Date;

  /** Bar granularity requested for the session */
  interval: BarInterval;
}

/**
 * Parameters for one bar request against a {@link BarDataClient}.
 *
 * @invariant start < end
 */
export interface BarRequest {
  /** Symbol to fetch */
  symbol: TickerSymbol;

  /** Start of range (inclusive) */
  start: Date;

  /** End of range (exclusive) */
  end: Date;

  /** Bar granularity */
  interval: BarInterval;
}

/**
 * Capability to fetch bars for a single symbol.
 *
 * Implementations resolve with bars in chronological order, or reject with
 * `BarDataError` (unknown symbol, no data in range) or `ConnectivityError`
 * (network failure, timeout). Any other rejection is treated by callers as
 * unexpected.
 */
export interface BarDataClient {
  fetchBars(request: BarRequest): Promise<Bar[]>;
}
