/**
 * Bar normalization ahead of storage
 */

import type { Bar } from '@mdpoc/contracts';

function isFiniteBar(bar: Bar): boolean {
  return (
    Number.isFinite(bar.open) &&
    Number.isFinite(bar.high) &&
    Number.isFinite(bar.low) &&
    Number.isFinite(bar.close) &&
    Number.isFinite(bar.volume) &&
    !Number.isNaN(Date.parse(bar.timestamp))
  );
}

function compareBars(a: Bar, b: Bar): number {
  const byTime = Date.parse(a.timestamp) - Date.parse(b.timestamp);
  if (byTime !== 0) {
    return byTime;
  }
  if (a.symbol === b.symbol) {
    return 0;
  }
  return a.symbol < b.symbol ? -1 : 1;
}

/**
 * Normalizes a set of bars.
 *
 * - drops bars with a non-finite price or volume, or an unparseable timestamp
 * - keeps the last bar seen for each (symbol, timestamp)
 * - orders by timestamp, then symbol
 *
 * The input is not modified.
 *
 * @example
 * ```typescript
 * cleanBars([...batch.get('AAPL') ?? [], ...batch.get('MSFT') ?? []]);
 * ```
 */
export function cleanBars(bars: readonly Bar[]): Bar[] {
  const latest = new Map<string, Bar>();

  for (const bar of bars) {
    if (!isFiniteBar(bar)) {
      continue;
    }
    const key = `${bar.symbol}|${Date.parse(bar.timestamp)}`;
    latest.set(key, bar);
  }

  return Array.from(latest.values()).sort(compareBars);
}
