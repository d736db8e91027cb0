/**
 * @fileoverview Bar interval identifiers.
 *
 * Intervals are the provider-facing granularity strings used when requesting
 * bars (`'5m'`, `'1h'`, ...). The batch fetcher always requests `'5m'`.
 *
 * @module @mdpoc/contracts/intervals
 */

/**
 * Supported bar intervals, ordered from smallest to largest duration.
 */
const BAR_INTERVALS = ['1m', '5m', '15m', '30m', '1h', '1d'] as const;

/**
 * A supported bar interval.
 */
export type BarInterval = (typeof BAR_INTERVALS)[number];

/**
 * Interval used for previous-session intraday ingestion.
 */
export const SESSION_BAR_INTERVAL: BarInterval = '5m';
