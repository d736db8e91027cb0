/**
 * Core types for symbol roster extraction
 */

import type { Logger } from '@mdpoc/logger';

/**
 * One table cell, reduced to what symbol extraction reads.
 */
export interface RosterCell {
  /** Text content of the cell, untrimmed */
  text: string;

  /** `href` of the first anchor inside the cell, if any */
  href: string | null;
}

/**
 * One table row: its `td`/`th` cells in document order.
 */
export type RosterRow = RosterCell[];

/**
 * The first table of a roster page.
 */
export interface RosterTable {
  rows: RosterRow[];
}

/**
 * Result of scanning a roster table.
 */
export interface RosterExtraction {
  /** Unique symbols, sorted ascending */
  symbols: string[];

  /** Rows in the table */
  rowCount: number;

  /** Rows that yielded no valid symbol (headers, short rows, garbage) */
  skippedRows: number;
}

/**
 * SymbolRoster configuration.
 */
export interface SymbolRosterOptions {
  /**
   * Roster page URL.
   * @default 'https://stockanalysis.com/list/sp-500-stocks/'
   */
  url?: string;

  /**
   * User-Agent header sent with the page request.
   * @default a desktop Chrome identifier
   */
  userAgent?: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /** Logger for debug and summary entries */
  logger?: Logger;

  /** fetch implementation; defaults to the global one */
  fetch?: typeof fetch;
}
