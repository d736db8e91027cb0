/**
 * Tests for bar normalization
 */

import { describe, it, expect } from 'vitest';
import { cleanBars } from '../src/clean.js';
import { makeBar } from './helpers.js';

describe('cleanBars', () => {
  it('should order by timestamp, then symbol', () => {
    const bars = [
      makeBar('MSFT', '2025-01-15T14:35:00.000Z'),
      makeBar('MSFT', '2025-01-15T14:30:00.000Z'),
      makeBar('AAPL', '2025-01-15T14:35:00.000Z'),
      makeBar('AAPL', '2025-01-15T14:30:00.000Z'),
    ];

    expect(cleanBars(bars).map((bar) => `${bar.timestamp} ${bar.symbol}`)).toEqual([
      '2025-01-15T14:30:00.000Z AAPL',
      '2025-01-15T14:30:00.000Z MSFT',
      '2025-01-15T14:35:00.000Z AAPL',
      '2025-01-15T14:35:00.000Z MSFT',
    ]);
  });

  it('should keep the last bar for a repeated symbol and timestamp', () => {
    const first = makeBar('AAPL', '2025-01-15T14:30:00.000Z', 230);
    const revised = makeBar('AAPL', '2025-01-15T14:30:00.000Z', 231);

    expect(cleanBars([first, revised])).toEqual([revised]);
  });

  it('should treat equal instants in different notations as duplicates', () => {
    const utc = makeBar('AAPL', '2025-01-15T14:30:00.000Z', 230);
    const offset = makeBar('AAPL', '2025-01-15T09:30:00-05:00', 231);

    expect(cleanBars([utc, offset])).toEqual([offset]);
  });

  it('should drop bars with non-finite values or bad timestamps', () => {
    const good = makeBar('AAPL', '2025-01-15T14:30:00.000Z');
    const nanClose = { ...makeBar('AAPL', '2025-01-15T14:35:00.000Z'), close: Number.NaN };
    const infiniteVolume = { ...makeBar('AAPL', '2025-01-15T14:40:00.000Z'), volume: Number.POSITIVE_INFINITY };
    const badTime = makeBar('AAPL', 'yesterday');

    expect(cleanBars([good, nanClose, infiniteVolume, badTime])).toEqual([good]);
  });

  it('should not modify its input', () => {
    const bars = [makeBar('MSFT', '2025-01-15T14:35:00.000Z'), makeBar('AAPL', '2025-01-15T14:30:00.000Z')];
    const copy = [...bars];

    cleanBars(bars);

    expect(bars).toEqual(copy);
  });
});
