/**
 * Ingest pipeline: symbol roster, then previous-session bars.
 */

import {
  cleanBars,
  fetchSessionOutcomes,
  toBarBatchResult,
  type BarBatchResult,
  type SymbolFetchOutcome,
} from '@mdpoc/bar-batch';
import type { BarDataClient, TickerSymbol } from '@mdpoc/contracts';
import { generateRunId, startTimer, withRunContext, type Logger } from '@mdpoc/logger';
import type { Config } from './config/index.js';
import { createBarClient, createSymbolSource, type SymbolSource } from './services/providers/factory.js';

export type FailedOutcome = Extract<SymbolFetchOutcome, { status: 'failed' }>;

export interface IngestOptions {
  config: Config;
  logger: Logger;

  /** Symbols to fetch; the roster is scraped when absent or empty */
  symbols?: TickerSymbol[];

  /** Session date; defaults to yesterday */
  date?: Date;

  /** Normalize each symbol's bars with cleanBars */
  clean?: boolean;

  /** Overrides the configured roster */
  roster?: SymbolSource;

  /** Overrides the configured bar client */
  client?: BarDataClient;

  now?: () => Date;
  runId?: string;
}

export interface IngestResult {
  runId: string;

  /** Session date, YYYY-MM-DD */
  date: string;

  symbols: TickerSymbol[];
  bars: BarBatchResult;
  failures: FailedOutcome[];
}

function isFailed(outcome: SymbolFetchOutcome): outcome is FailedOutcome {
  return outcome.status === 'failed';
}

/**
 * Lists the symbol universe from the configured roster.
 */
export async function runRoster(options: Pick<IngestOptions, 'config' | 'logger' | 'roster'>): Promise<TickerSymbol[]> {
  const roster = options.roster ?? createSymbolSource(options.config, options.logger);
  return roster.fetchSymbols();
}

/**
 * Runs one ingest inside a run context, so every log line of the run
 * carries its `run_id`.
 *
 * @example
 * ```typescript
 * const result = await runIngest({ config, logger, symbols: ['AAPL', 'MSFT'] });
 * result.bars.get('AAPL');
 * ```
 */
export async function runIngest(options: IngestOptions): Promise<IngestResult> {
  const runId = options.runId ?? generateRunId();

  return withRunContext(async () => {
    const logger = options.logger.child({ component: 'ingest' });
    const timer = startTimer();

    logger.info('Ingest started', {
      operation: 'ingest',
      provider: options.config.provider.type,
      requested_symbols: options.symbols?.length ?? 0,
    });

    const symbols =
      options.symbols && options.symbols.length > 0 ? options.symbols : await runRoster(options);

    const client = options.client ?? createBarClient(options.config, options.logger);
    const { window, outcomes } = await fetchSessionOutcomes(symbols, client, options.date, {
      logger: options.logger,
      concurrency: options.config.batch.concurrency,
      now: options.now,
    });

    const bars = toBarBatchResult(outcomes);
    if (options.clean) {
      for (const [symbol, symbolBars] of bars) {
        bars.set(symbol, cleanBars(symbolBars));
      }
    }

    const failures = outcomes.filter(isFailed);

    logger.info('Ingest complete', {
      operation: 'ingest',
      date: window.date,
      symbols: bars.size,
      failed: failures.length,
      duration_ms: timer.stop(),
      result: failures.length === 0 ? 'success' : 'partial',
    });

    return { runId, date: window.date, symbols, bars, failures };
  }, runId);
}

/**
 * JSON-ready view of an ingest result.
 */
export function toIngestReport(result: IngestResult): Record<string, unknown> {
  return {
    runId: result.runId,
    date: result.date,
    symbols: result.symbols,
    failures: result.failures.map((failure) => ({
      symbol: failure.symbol,
      reason: failure.reason,
      code: failure.error.code,
      message: failure.error.message,
    })),
    bars: Object.fromEntries(result.bars),
  };
}
