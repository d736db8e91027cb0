/**
 * Fixture-based bar client for deterministic runs
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { BarDataError, type Bar, type BarDataClient, type BarRequest } from '@mdpoc/contracts';
import type { Logger } from '@mdpoc/logger';
import { isValidSymbol } from '@mdpoc/symbol-roster';

const PROVIDER_NAME = 'fixture';

const FixtureBarSchema = z.object({
  /** Local wall-clock open time, HH:MM */
  time: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().default(0),
});

/**
 * A fixture file: one session's bars, by time of day.
 *
 * Bars carry no date. They are placed on the local date of each request,
 * so one file serves every session.
 *
 * @example
 * ```json
 * { "bars": [{ "time": "09:30", "open": 230.1, "high": 230.9, "low": 229.8, "close": 230.4, "volume": 120000 }] }
 * ```
 */
export const FixtureFileSchema = z.object({
  bars: z.array(FixtureBarSchema),
});

export type FixtureFile = z.infer<typeof FixtureFileSchema>;

export interface FixtureBarClientConfig {
  /** Directory holding `<SYMBOL>.json` files */
  fixturesPath: string;
  logger?: Logger;
}

/**
 * Bar client that serves `<fixturesPath>/<SYMBOL>.json`.
 *
 * A symbol without a readable, valid fixture file rejects with
 * `BarDataError`, like an unknown symbol at a live provider. So does a
 * symbol that is not a valid ticker; it never reaches the file system.
 */
export class FixtureBarClient implements BarDataClient {
  private readonly fixturesPath: string;
  private readonly logger?: Logger;

  constructor(config: FixtureBarClientConfig) {
    this.fixturesPath = config.fixturesPath;
    this.logger = config.logger?.child({ component: 'fixture-client' });
  }

  async fetchBars(request: BarRequest): Promise<Bar[]> {
    const fixture = await this.loadFixture(request.symbol);
    const day = request.start;
    const startMs = request.start.getTime();
    const endMs = request.end.getTime();

    const bars: Bar[] = [];
    for (const bar of fixture.bars) {
      const [hours, minutes] = bar.time.split(':').map(Number);
      const openTime = new Date(day.getFullYear(), day.getMonth(), day.getDate(), hours ?? 0, minutes ?? 0);
      if (openTime.getTime() < startMs || openTime.getTime() >= endMs) {
        continue;
      }
      bars.push({
        symbol: request.symbol,
        timestamp: openTime.toISOString(),
        open: bar.open,
        high: bar.high,
        low: bar.low,
        close: bar.close,
        volume: bar.volume,
      });
    }

    this.logger?.debug('Fixture bars served', { symbol: request.symbol, count: bars.length });
    return bars;
  }

  private async loadFixture(symbol: string): Promise<FixtureFile> {
    if (!isValidSymbol(symbol)) {
      throw new BarDataError(`Invalid symbol for fixture lookup: ${symbol}`, { symbol, provider: PROVIDER_NAME });
    }

    const path = join(this.fixturesPath, `${symbol}.json`);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      throw new BarDataError(`No fixture for ${symbol}`, { symbol, provider: PROVIDER_NAME, path }, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new BarDataError(`Fixture for ${symbol} is not valid JSON`, { symbol, provider: PROVIDER_NAME, path }, {
        cause: error,
      });
    }

    const result = FixtureFileSchema.safeParse(data);
    if (!result.success) {
      throw new BarDataError(`Fixture for ${symbol} is invalid`, {
        symbol,
        provider: PROVIDER_NAME,
        path,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  }
}
