/**
 * @fileoverview Public API for @mdpoc/provider-yahoo package.
 *
 * @module @mdpoc/provider-yahoo
 * @example
 * ```typescript
 * import { YahooChartClient } from '@mdpoc/provider-yahoo';
 * import { fetchPreviousSessionBars } from '@mdpoc/bar-batch';
 *
 * const bars = await fetchPreviousSessionBars(['AAPL', 'MSFT'], new YahooChartClient());
 * ```
 */

export { YahooChartClient, toYahooSymbol, DEFAULT_YAHOO_BASE_URL, DEFAULT_YAHOO_TIMEOUT_MS } from './client.js';

export { parseChartResponse } from './parser.js';
export type { BarRange } from './parser.js';

export { mapYahooHttpError, mapYahooTransportError, PROVIDER_NAME } from './errors.js';

export type { YahooChartClientOptions, YahooChartResponse, YahooChartResult, YahooQuote } from './types.js';
