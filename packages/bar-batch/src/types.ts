/**
 * Core types for batch bar fetching
 */

import type { Bar, PipelineError, SessionWindow, TickerSymbol } from '@mdpoc/contracts';
import type { Logger } from '@mdpoc/logger';

/**
 * Why a symbol's fetch was absorbed instead of failing the batch.
 */
export type FailureReason = 'data' | 'connectivity';

/**
 * Result of fetching one symbol's session bars.
 */
export type SymbolFetchOutcome =
  | { status: 'ok'; symbol: TickerSymbol; bars: Bar[] }
  | { status: 'failed'; symbol: TickerSymbol; reason: FailureReason; error: PipelineError };

/**
 * Per-symbol bars of one session. Failed symbols map to an empty list.
 */
export type BarBatchResult = Map<TickerSymbol, Bar[]>;

/**
 * Outcomes of a batch, in input order, with the window they cover.
 */
export interface SessionOutcomes {
  window: SessionWindow;
  outcomes: SymbolFetchOutcome[];
}

/**
 * Batch fetch configuration.
 */
export interface BatchFetchOptions {
  /** Logger for per-symbol and summary entries */
  logger?: Logger;

  /**
   * Clock used to resolve the default target date.
   * @default () => new Date()
   */
  now?: () => Date;

  /**
   * Maximum number of client calls in flight.
   * @default 1
   */
  concurrency?: number;
}
