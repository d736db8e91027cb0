/**
 * Symbol extraction from roster tables
 */

import { ParseError } from '@mdpoc/contracts';
import { readFirstTable } from './document.js';
import { isValidSymbol } from './validate.js';
import type { RosterCell, RosterExtraction, RosterRow, RosterTable } from './types.js';

/** Path marker of symbol links, e.g. `/stocks/brk.b/` */
const STOCKS_PATH = '/stocks/';

/** Column holding the symbol (after the rank column) */
const SYMBOL_CELL_INDEX = 1;

/**
 * Reads the candidate symbol out of a `/stocks/<symbol>/` link.
 *
 * @returns The upper-cased path segment after `/stocks/`, or null when the
 *          href has no such segment
 *
 * @example
 * ```typescript
 * symbolFromHref('/stocks/brk.b/')                          // 'BRK.B'
 * symbolFromHref('https://stockanalysis.com/stocks/aapl/')  // 'AAPL'
 * symbolFromHref('/etf/spy/')                               // null
 * ```
 */
export function symbolFromHref(href: string): string | null {
  const markerIndex = href.indexOf(STOCKS_PATH);
  if (markerIndex === -1) {
    return null;
  }

  const rest = href.slice(markerIndex + STOCKS_PATH.length);
  const segment = rest.split('/')[0] ?? '';
  return segment ? segment.toUpperCase() : null;
}

/**
 * Extracts a valid symbol from a symbol cell.
 *
 * Precedence:
 * 1. the `/stocks/<symbol>/` link of the cell, when it validates
 * 2. the trimmed, upper-cased cell text, when it validates
 *
 * @returns The symbol, or null when neither candidate is valid
 *
 * @example
 * ```typescript
 * extractSymbolFromCell({ text: 'Berkshire', href: '/stocks/brk.b/' })  // 'BRK.B'
 * extractSymbolFromCell({ text: ' goog ', href: null })                 // 'GOOG'
 * extractSymbolFromCell({ text: 'Apple Inc.', href: null })             // null
 * ```
 */
export function extractSymbolFromCell(cell: RosterCell): string | null {
  if (cell.href) {
    const fromLink = symbolFromHref(cell.href);
    if (fromLink && isValidSymbol(fromLink)) {
      return fromLink;
    }
  }

  const fromText = cell.text.trim().toUpperCase();
  return isValidSymbol(fromText) ? fromText : null;
}

/**
 * Extracts the symbol of one row: its second cell, if it has one.
 */
export function extractSymbolFromRow(row: RosterRow): string | null {
  const cell = row[SYMBOL_CELL_INDEX];
  if (row.length < 2 || !cell) {
    return null;
  }
  return extractSymbolFromCell(cell);
}

/**
 * Scans every row of a roster table.
 *
 * @returns Unique symbols sorted ascending, with row counts
 * @throws {ParseError} If no row yields a valid symbol
 */
export function extractSymbols(table: RosterTable): RosterExtraction {
  const collected: string[] = [];

  for (const row of table.rows) {
    const symbol = extractSymbolFromRow(row);
    if (symbol !== null) {
      collected.push(symbol);
    }
  }

  if (collected.length === 0) {
    throw new ParseError('No symbols found in the table. Page structure may have changed.', {
      rowCount: table.rows.length,
    });
  }

  return {
    symbols: Array.from(new Set(collected)).sort(),
    rowCount: table.rows.length,
    skippedRows: table.rows.length - collected.length,
  };
}

/**
 * Parses a roster page into its symbol list.
 *
 * Deterministic: the same document always yields the same list.
 *
 * @throws {ParseError} If the page has no table, or no valid symbol
 */
export function parseRosterHtml(html: string): RosterExtraction {
  const table = readFirstTable(html);
  if (!table) {
    throw new ParseError('No table found on the symbol roster page');
  }
  return extractSymbols(table);
}

/**
 * Parses a roster page and returns its unique, sorted symbols.
 *
 * @throws {ParseError} If the page has no table, or no valid symbol
 */
export function parseSymbolsFromHtml(html: string): string[] {
  return parseRosterHtml(html).symbols;
}
