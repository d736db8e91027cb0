/**
 * @fileoverview Main entry point for @mdpoc/contracts.
 *
 * @module @mdpoc/contracts
 */

// Intervals
export { SESSION_BAR_INTERVAL } from './intervals.js';
export type { BarInterval } from './intervals.js';

// Market data types
export type { TickerSymbol, Bar, SessionWindow, BarRequest, BarDataClient } from './market.js';

// Error classes and guards
export {
  ErrorCode,
  PipelineError,
  FetchError,
  ParseError,
  InvalidInputError,
  BarDataError,
  ConnectivityError,
  ConfigError,
  isPipelineError,
  isFetchError,
  isParseError,
  isInvalidInputError,
  isBarDataError,
  isConnectivityError,
  describeCause,
} from './errors.js';
