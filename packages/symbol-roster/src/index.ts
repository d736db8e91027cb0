/**
 * @mdpoc/symbol-roster
 *
 * Ticker symbol roster scraped from a constituents list page
 *
 * @example
 * ```typescript
 * import { SymbolRoster, isValidSymbol } from '@mdpoc/symbol-roster';
 *
 * const symbols = await new SymbolRoster().fetchSymbols();
 * isValidSymbol('BRK.B'); // true
 * ```
 */

export type {
  RosterCell,
  RosterRow,
  RosterTable,
  RosterExtraction,
  SymbolRosterOptions,
} from './types.js';

export { isValidSymbol, MAX_SYMBOL_LENGTH } from './validate.js';

export { readFirstTable } from './document.js';

export {
  symbolFromHref,
  extractSymbolFromCell,
  extractSymbolFromRow,
  extractSymbols,
  parseRosterHtml,
  parseSymbolsFromHtml,
} from './extract.js';

export {
  SymbolRoster,
  fetchSymbols,
  DEFAULT_ROSTER_URL,
  DEFAULT_USER_AGENT,
  DEFAULT_ROSTER_TIMEOUT_MS,
} from './roster.js';
