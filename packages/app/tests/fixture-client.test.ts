/**
 * Tests for the fixture bar client
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { isBarDataError, type BarRequest } from '@mdpoc/contracts';
import { FixtureBarClient } from '../src/services/providers/fixture-client.js';

const FIXTURES_PATH = fileURLToPath(new URL('./fixtures/bars', import.meta.url));

const REQUEST: BarRequest = {
  symbol: 'AAPL',
  start: new Date(2025, 0, 15, 9, 30),
  end: new Date(2025, 0, 15, 16, 0),
  interval: '5m',
};

async function catchRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}

describe('FixtureBarClient', () => {
  const client = new FixtureBarClient({ fixturesPath: FIXTURES_PATH });

  it('should place fixture bars on the requested date inside the window', async () => {
    const bars = await client.fetchBars(REQUEST);

    expect(bars).toEqual([
      {
        symbol: 'AAPL',
        timestamp: new Date(2025, 0, 15, 9, 30).toISOString(),
        open: 230.0,
        high: 231.0,
        low: 229.5,
        close: 230.5,
        volume: 120000,
      },
      {
        symbol: 'AAPL',
        timestamp: new Date(2025, 0, 15, 9, 35).toISOString(),
        open: 230.5,
        high: 231.2,
        low: 230.1,
        close: 231.0,
        volume: 0,
      },
    ]);
  });

  it('should serve the same shape for another date', async () => {
    const bars = await client.fetchBars({
      ...REQUEST,
      start: new Date(2024, 6, 3, 9, 30),
      end: new Date(2024, 6, 3, 16, 0),
    });

    expect(bars[0]?.timestamp).toBe(new Date(2024, 6, 3, 9, 30).toISOString());
  });

  it('should reject a symbol without a fixture with BarDataError', async () => {
    const error = await catchRejection(client.fetchBars({ ...REQUEST, symbol: 'ZZZZ' }));

    expect(isBarDataError(error)).toBe(true);
    expect(error).toMatchObject({ message: 'No fixture for ZZZZ', data: { symbol: 'ZZZZ', provider: 'fixture' } });
  });

  it.each(['../AAPL', 'bars/AAPL', 'AAPL\\..', 'aapl'])(
    'should reject %j without reading a file',
    async (symbol) => {
      const error = await catchRejection(client.fetchBars({ ...REQUEST, symbol }));

      expect(isBarDataError(error)).toBe(true);
      expect(error).toMatchObject({
        message: `Invalid symbol for fixture lookup: ${symbol}`,
        data: { symbol, provider: 'fixture' },
      });
    }
  );

  it('should reject a fixture that is not JSON', async () => {
    const error = await catchRejection(client.fetchBars({ ...REQUEST, symbol: 'JUNK' }));

    expect(error).toMatchObject({ code: 'BAR_DATA_ERROR', message: 'Fixture for JUNK is not valid JSON' });
  });

  it('should reject a fixture that fails validation', async () => {
    const error = await catchRejection(client.fetchBars({ ...REQUEST, symbol: 'BAD' }));

    expect(error).toMatchObject({ code: 'BAR_DATA_ERROR', message: 'Fixture for BAD is invalid' });
  });
});
