/**
 * HTML access for roster pages.
 *
 * The only module that touches cheerio: it turns a page into a plain
 * {@link RosterTable} that extraction can walk without a DOM.
 */

import * as cheerio from 'cheerio';
import type { RosterCell, RosterRow, RosterTable } from './types.js';

/**
 * Reads the first `<table>` of an HTML document.
 *
 * Every `tr` of the table (nested tables included) becomes a row; its `td`
 * and `th` cells keep their text and the `href` of their first anchor.
 *
 * @returns The table, or null when the document has none
 *
 * @example
 * ```typescript
 * const table = readFirstTable('<table><tr><td>1</td><td><a href="/stocks/aapl/">AAPL</a></td></tr></table>');
 * // { rows: [[{ text: '1', href: null }, { text: 'AAPL', href: '/stocks/aapl/' }]] }
 * ```
 */
export function readFirstTable(html: string): RosterTable | null {
  const $ = cheerio.load(html);
  const table = $('table').first();

  if (table.length === 0) {
    return null;
  }

  const rows: RosterRow[] = [];
  table.find('tr').each((_, row) => {
    const cells: RosterCell[] = [];
    $(row)
      .find('td, th')
      .each((_, cell) => {
        const $cell = $(cell);
        cells.push({
          text: $cell.text(),
          href: $cell.find('a').first().attr('href') ?? null,
        });
      });
    rows.push(cells);
  });

  return { rows };
}
