/**
 * Previous-session bar fetching for a batch of symbols.
 *
 * One session window is computed per batch and every symbol is requested
 * against it. Data and connectivity failures of a single symbol are
 * recorded as that symbol's outcome; anything else aborts the batch.
 */

import pLimit from 'p-limit';
import {
  InvalidInputError,
  describeCause,
  isPipelineError,
  type BarDataClient,
  type SessionWindow,
  type TickerSymbol,
} from '@mdpoc/contracts';
import { serializeError, startTimer, type Logger } from '@mdpoc/logger';
import { classifyFailure } from './outcome.js';
import { computeSessionWindow, resolveTargetDate } from './session.js';
import type { BarBatchResult, BatchFetchOptions, SessionOutcomes, SymbolFetchOutcome } from './types.js';

const DEFAULT_CONCURRENCY = 1;

function validateConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidInputError(`Invalid concurrency: ${concurrency}. Must be a positive integer`, {
      concurrency,
    });
  }
}

async function fetchOne(
  client: BarDataClient,
  symbol: TickerSymbol,
  window: SessionWindow,
  logger: Logger | undefined
): Promise<SymbolFetchOutcome> {
  logger?.debug('Fetching session bars', { symbol });

  try {
    const bars = await client.fetchBars({
      symbol,
      start: window.start,
      end: window.end,
      interval: window.interval,
    });
    logger?.debug('Session bars fetched', { symbol, count: bars.length });
    return { status: 'ok', symbol, bars };
  } catch (error) {
    const reason = classifyFailure(error);
    if (reason === null || !isPipelineError(error)) {
      throw error;
    }

    logger?.warn('Symbol fetch failed', {
      symbol,
      reason,
      error_code: error.code,
      error: describeCause(error),
    });
    return { status: 'failed', symbol, reason, error };
  }
}

/**
 * Fetches the session bars of every symbol and reports one outcome each.
 *
 * Symbols are requested in input order; a repeated symbol is requested
 * once. With `concurrency` above 1, up to that many requests run at a time
 * and outcomes still come back in input order.
 *
 * @param symbols - Symbols to fetch, at least one
 * @param client - Bar source
 * @param date - Session date; defaults to the day before `options.now()`
 * @returns The session window and the outcome of each unique symbol
 * @throws {InvalidInputError} If `symbols` is empty, or the date or concurrency is invalid
 * @throws Any client error other than a data or connectivity failure
 */
export async function fetchSessionOutcomes(
  symbols: readonly TickerSymbol[],
  client: BarDataClient,
  date?: Date,
  options: BatchFetchOptions = {}
): Promise<SessionOutcomes> {
  if (symbols.length === 0) {
    throw new InvalidInputError('No symbols provided for bar fetch');
  }

  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  validateConcurrency(concurrency);

  const logger = options.logger?.child({ component: 'bar-batch' });
  const now = options.now ?? (() => new Date());
  const window = computeSessionWindow(resolveTargetDate(date, now()));
  const unique = Array.from(new Set(symbols));
  const timer = startTimer();

  logger?.info('Starting session batch', {
    operation: 'fetch_session_bars',
    date: window.date,
    start: window.start.toISOString(),
    end: window.end.toISOString(),
    interval: window.interval,
    symbols: unique.length,
    concurrency,
  });

  const limit = pLimit(concurrency);
  let aborted = false;

  const tasks = unique.map((symbol) =>
    limit(async (): Promise<SymbolFetchOutcome | null> => {
      if (aborted) {
        return null;
      }
      try {
        return await fetchOne(client, symbol, window, logger);
      } catch (error) {
        aborted = true;
        limit.clearQueue();
        logger?.error('Session batch aborted', {
          symbol,
          error: serializeError(error),
          duration_ms: timer.stop(),
        });
        throw error;
      }
    })
  );

  const settled = await Promise.all(tasks);
  const outcomes = settled.filter((outcome): outcome is SymbolFetchOutcome => outcome !== null);

  const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
  const bars = outcomes.reduce((total, outcome) => total + (outcome.status === 'ok' ? outcome.bars.length : 0), 0);

  logger?.info('Session batch complete', {
    operation: 'fetch_session_bars',
    date: window.date,
    ok: outcomes.length - failed,
    failed,
    bars,
    duration_ms: timer.stop(),
    result: failed === 0 ? 'success' : 'partial',
  });

  return { window, outcomes };
}

/**
 * Folds batch outcomes into a symbol-to-bars map. Failed symbols map to `[]`.
 */
export function toBarBatchResult(outcomes: readonly SymbolFetchOutcome[]): BarBatchResult {
  const result: BarBatchResult = new Map();
  for (const outcome of outcomes) {
    result.set(outcome.symbol, outcome.status === 'ok' ? outcome.bars : []);
  }
  return result;
}

/**
 * Fetches the previous session's 5-minute bars for every symbol.
 *
 * The returned map has exactly one key per distinct input symbol. A symbol
 * whose fetch failed for data or connectivity reasons maps to an empty list.
 *
 * @example
 * ```typescript
 * const bars = await fetchPreviousSessionBars(['AAPL', 'MSFT'], client);
 * bars.get('AAPL'); // Bar[] for yesterday 09:30-16:00 local
 * ```
 *
 * @throws {InvalidInputError} If `symbols` is empty
 * @throws Any client error other than a data or connectivity failure
 */
export async function fetchPreviousSessionBars(
  symbols: readonly TickerSymbol[],
  client: BarDataClient,
  date?: Date,
  options: BatchFetchOptions = {}
): Promise<BarBatchResult> {
  const { outcomes } = await fetchSessionOutcomes(symbols, client, date, options);
  return toBarBatchResult(outcomes);
}
