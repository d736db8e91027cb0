/**
 * Fake bar client for batch tests
 */

import { BarDataError, type Bar, type BarDataClient, type BarRequest } from '@mdpoc/contracts';

export function makeBar(symbol: string, timestamp: string, close = 100): Bar {
  return { symbol, timestamp, open: close, high: close + 1, low: close - 1, close, volume: 1000 };
}

type FakeResponse = Bar[] | Error | { bars: Bar[]; delayMs: number };

/**
 * Serves canned bars per symbol. Unknown symbols reject with BarDataError.
 */
export class FakeBarClient implements BarDataClient {
  readonly requests: BarRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly responses: Record<string, FakeResponse>) {}

  async fetchBars(request: BarRequest): Promise<Bar[]> {
    this.requests.push(request);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      const response = this.responses[request.symbol];
      if (response === undefined) {
        throw new BarDataError(`No data for ${request.symbol}`, { symbol: request.symbol, provider: 'fake' });
      }
      if (response instanceof Error) {
        throw response;
      }
      if (Array.isArray(response)) {
        return response;
      }
      await new Promise((resolve) => setTimeout(resolve, response.delayMs));
      return response.bars;
    } finally {
      this.inFlight -= 1;
    }
  }
}
