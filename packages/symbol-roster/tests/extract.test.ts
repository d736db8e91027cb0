/**
 * Tests for roster table reading and symbol extraction
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { isParseError } from '@mdpoc/contracts';
import { readFirstTable } from '../src/document.js';
import {
  extractSymbolFromCell,
  extractSymbolFromRow,
  extractSymbols,
  parseRosterHtml,
  parseSymbolsFromHtml,
  symbolFromHref,
} from '../src/extract.js';

const ROSTER_PAGE = readFileSync(new URL('./fixtures/roster-page.html', import.meta.url), 'utf8');

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('symbolFromHref', () => {
  it('should read the segment after /stocks/', () => {
    expect(symbolFromHref('/stocks/brk.b/')).toBe('BRK.B');
    expect(symbolFromHref('https://stockanalysis.com/stocks/aapl/')).toBe('AAPL');
    expect(symbolFromHref('/stocks/msft')).toBe('MSFT');
  });

  it('should return null without a /stocks/ segment', () => {
    expect(symbolFromHref('/etf/spy/')).toBeNull();
    expect(symbolFromHref('/stocks/')).toBeNull();
  });
});

describe('extractSymbolFromCell', () => {
  it('should prefer a valid link over the cell text', () => {
    expect(extractSymbolFromCell({ text: 'NVIDIA Corp', href: '/stocks/nvda/' })).toBe('NVDA');
  });

  it('should fall back to the text when the link is not a valid symbol', () => {
    expect(extractSymbolFromCell({ text: 'ABC', href: '/stocks/toolongsym/' })).toBe('ABC');
    expect(extractSymbolFromCell({ text: 'ABC', href: '/etf/spy/' })).toBe('ABC');
  });

  it('should trim and upper-case the text', () => {
    expect(extractSymbolFromCell({ text: '  goog\n', href: null })).toBe('GOOG');
  });

  it('should return null when neither candidate is valid', () => {
    expect(extractSymbolFromCell({ text: 'Apple Inc.', href: null })).toBeNull();
    expect(extractSymbolFromCell({ text: '', href: '/stocks/' })).toBeNull();
  });
});

describe('extractSymbolFromRow', () => {
  it('should read the second cell', () => {
    const row = [
      { text: '1', href: null },
      { text: 'MSFT', href: '/stocks/msft/' },
      { text: 'Microsoft', href: null },
    ];

    expect(extractSymbolFromRow(row)).toBe('MSFT');
  });

  it('should skip rows with fewer than two cells', () => {
    expect(extractSymbolFromRow([{ text: 'AAPL', href: '/stocks/aapl/' }])).toBeNull();
    expect(extractSymbolFromRow([])).toBeNull();
  });
});

describe('readFirstTable', () => {
  it('should return null when the document has no table', () => {
    expect(readFirstTable('<html><body><p>Nothing here</p></body></html>')).toBeNull();
  });

  it('should keep cell text and the first anchor href', () => {
    const table = readFirstTable(
      '<table><tr><td>1</td><td><a href="/stocks/aapl/">AAPL</a><a href="/other/">x</a></td></tr></table>'
    );

    expect(table).toEqual({
      rows: [
        [
          { text: '1', href: null },
          { text: 'AAPLx', href: '/stocks/aapl/' },
        ],
      ],
    });
  });
});

describe('parseRosterHtml', () => {
  it('should extract unique sorted symbols from the first table only', () => {
    const result = parseRosterHtml(ROSTER_PAGE);

    expect(result.symbols).toEqual(['AAPL', 'BRK.B', 'GOOG', 'MSFT']);
    expect(result.rowCount).toBe(7);
    expect(result.skippedRows).toBe(3);
  });

  it('should deduplicate repeated symbols', () => {
    const html = `
      <table>
        <tr><td>1</td><td><a href="/stocks/aapl/">AAPL</a></td></tr>
        <tr><td>2</td><td>AAPL</td></tr>
        <tr><td>3</td><td>aapl</td></tr>
      </table>`;

    expect(parseSymbolsFromHtml(html)).toEqual(['AAPL']);
  });

  it('should throw ParseError when there is no table', () => {
    const error = catchError(() => parseRosterHtml('<div>maintenance</div>'));

    expect(isParseError(error)).toBe(true);
    expect(error).toMatchObject({
      code: 'PARSE_ERROR',
      message: 'No table found on the symbol roster page',
    });
  });

  it('should throw ParseError when no row yields a symbol', () => {
    const html = '<table><tr><th>No.</th><th>Symbol</th></tr><tr><td>1</td><td>Apple Inc.</td></tr></table>';
    const error = catchError(() => parseRosterHtml(html));

    expect(isParseError(error)).toBe(true);
    expect(error).toMatchObject({
      message: 'No symbols found in the table. Page structure may have changed.',
      data: { rowCount: 2 },
    });
  });

  it('should return the same result for the same document', () => {
    expect(parseSymbolsFromHtml(ROSTER_PAGE)).toEqual(parseSymbolsFromHtml(ROSTER_PAGE));
  });
});

describe('extractSymbols', () => {
  it('should work on a table built without HTML', () => {
    const result = extractSymbols({
      rows: [
        [
          { text: '1', href: null },
          { text: 'ZTS', href: null },
        ],
        [
          { text: '2', href: null },
          { text: 'A', href: null },
        ],
      ],
    });

    expect(result).toEqual({ symbols: ['A', 'ZTS'], rowCount: 2, skippedRows: 0 });
  });
});
