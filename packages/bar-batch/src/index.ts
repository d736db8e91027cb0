/**
 * @mdpoc/bar-batch
 *
 * Previous-session intraday bars for a batch of symbols, with per-symbol
 * failure isolation
 */

export type {
  FailureReason,
  SymbolFetchOutcome,
  BarBatchResult,
  SessionOutcomes,
  BatchFetchOptions,
} from './types.js';

export {
  SESSION_OPEN,
  SESSION_CLOSE,
  formatLocalDate,
  parseSessionDate,
  resolveTargetDate,
  computeSessionWindow,
} from './session.js';

export { ABSORBED_FAILURES, classifyFailure } from './outcome.js';

export { cleanBars } from './clean.js';

export { fetchSessionOutcomes, fetchPreviousSessionBars, toBarBatchResult } from './batch-fetcher.js';
