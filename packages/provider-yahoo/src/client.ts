/**
 * @fileoverview Yahoo Finance chart client.
 *
 * @module @mdpoc/provider-yahoo/client
 */

import { isPipelineError, type Bar, type BarDataClient, type BarRequest } from '@mdpoc/contracts';
import type { Logger } from '@mdpoc/logger';
import { mapYahooHttpError, mapYahooTransportError } from './errors.js';
import { parseChartResponse } from './parser.js';
import type { YahooChartClientOptions } from './types.js';

export const DEFAULT_YAHOO_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

export const DEFAULT_YAHOO_TIMEOUT_MS = 10_000;

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; market-data-poc/0.1)';

/**
 * Converts a pipeline symbol to Yahoo notation: share-class dots become
 * dashes (`BRK.B` → `BRK-B`).
 */
export function toYahooSymbol(symbol: string): string {
  return symbol.replace(/\./g, '-');
}

/**
 * Bar client backed by the Yahoo Finance chart endpoint.
 *
 * Rejects with `BarDataError` when Yahoo has no data for the symbol, and
 * with `ConnectivityError` when Yahoo cannot be reached or refuses service.
 *
 * @example
 * ```typescript
 * const client = new YahooChartClient({ timeoutMs: 5000 });
 * const bars = await client.fetchBars({
 *   symbol: 'AAPL',
 *   start: new Date(2025, 0, 15, 9, 30),
 *   end: new Date(2025, 0, 15, 16, 0),
 *   interval: '5m'
 * });
 * ```
 */
export class YahooChartClient implements BarDataClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly logger?: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: YahooChartClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_YAHOO_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_YAHOO_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger?.child({ component: 'provider-yahoo' });
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  /**
   * Builds the chart URL of a request. Period bounds are epoch seconds.
   */
  buildUrl(request: BarRequest): string {
    const params = new URLSearchParams({
      period1: String(Math.floor(request.start.getTime() / 1000)),
      period2: String(Math.floor(request.end.getTime() / 1000)),
      interval: request.interval,
      includePrePost: 'false',
    });
    return `${this.baseUrl}/${encodeURIComponent(toYahooSymbol(request.symbol))}?${params.toString()}`;
  }

  async fetchBars(request: BarRequest): Promise<Bar[]> {
    const url = this.buildUrl(request);
    this.logger?.debug('Requesting Yahoo chart', { symbol: request.symbol, url });

    const payload = await this.fetchWithTimeout(url, request.symbol);
    const bars = parseChartResponse(request.symbol, payload, { start: request.start, end: request.end });

    this.logger?.debug('Yahoo chart parsed', { symbol: request.symbol, count: bars.length });
    return bars;
  }

  /**
   * Makes the HTTP request and decodes the JSON body, under one timeout.
   *
   * @internal
   */
  private async fetchWithTimeout(url: string, symbol: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw mapYahooHttpError(symbol, response.status, response.statusText);
      }

      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      if (isPipelineError(error)) {
        throw error;
      }
      throw mapYahooTransportError(symbol, error, controller.signal.aborted, this.timeoutMs);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
