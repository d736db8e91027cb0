/**
 * Symbol roster: fetches the roster page and extracts its symbols.
 */

import { FetchError, describeCause } from '@mdpoc/contracts';
import { startTimer, type Logger } from '@mdpoc/logger';
import { parseRosterHtml } from './extract.js';
import type { SymbolRosterOptions } from './types.js';

/** S&P 500 constituents list */
export const DEFAULT_ROSTER_URL = 'https://stockanalysis.com/list/sp-500-stocks/';

/** Desktop browser identifier; the page rejects obvious bots */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

export const DEFAULT_ROSTER_TIMEOUT_MS = 10_000;

/**
 * Fetches the universe of ticker symbols from one roster page.
 *
 * @example
 * ```typescript
 * const roster = new SymbolRoster({ logger });
 * const symbols = await roster.fetchSymbols();
 * // ['A', 'AAPL', 'ABBV', ..., 'BRK.B', ...]
 * ```
 */
export class SymbolRoster {
  readonly url: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: SymbolRosterOptions = {}) {
    this.url = options.url ?? DEFAULT_ROSTER_URL;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ROSTER_TIMEOUT_MS;
    this.logger = options.logger?.child({ component: 'symbol-roster' });
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  /**
   * Fetches the roster page and returns its unique symbols, sorted ascending.
   *
   * @throws {FetchError} If the request fails, times out or returns a non-2xx status
   * @throws {ParseError} If the page has no table, or no valid symbol
   */
  async fetchSymbols(): Promise<string[]> {
    const timer = startTimer();
    const html = await this.fetchPage();
    const { symbols, rowCount, skippedRows } = parseRosterHtml(html);

    this.logger?.debug('Roster table scanned', { rows: rowCount, skipped_rows: skippedRows });
    this.logger?.info('Symbol roster fetched', {
      operation: 'fetch_symbols',
      count: symbols.length,
      duration_ms: timer.stop(),
      result: 'success',
    });

    return symbols;
  }

  /**
   * Performs the single GET for the roster page.
   *
   * The timeout covers the whole exchange, body included.
   */
  private async fetchPage(): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    this.logger?.debug('Requesting roster page', { url: this.url, timeout_ms: this.timeoutMs });

    try {
      const response = await this.fetchImpl(this.url, {
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new FetchError(
          `Failed to fetch symbol roster from ${this.url}: HTTP ${response.status} ${response.statusText}`.trimEnd(),
          { url: this.url, status: response.status }
        );
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }

      const cause = controller.signal.aborted
        ? `request timed out after ${this.timeoutMs}ms`
        : describeCause(error);
      throw new FetchError(
        `Failed to fetch symbol roster from ${this.url}: ${cause}`,
        { url: this.url, timeoutMs: this.timeoutMs },
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Fetches the default roster with default options.
 *
 * @throws {FetchError} If the page request fails
 * @throws {ParseError} If the page yields no symbols
 */
export function fetchSymbols(options: SymbolRosterOptions = {}): Promise<string[]> {
  return new SymbolRoster(options).fetchSymbols();
}
