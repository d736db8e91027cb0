/**
 * Construction of the configured bar client and symbol roster
 */

import { ConfigError, type BarDataClient } from '@mdpoc/contracts';
import type { Logger } from '@mdpoc/logger';
import { YahooChartClient } from '@mdpoc/provider-yahoo';
import { SymbolRoster } from '@mdpoc/symbol-roster';
import type { Config } from '../../config/index.js';
import { FixtureBarClient } from './fixture-client.js';

/**
 * Anything that can list the symbol universe.
 */
export interface SymbolSource {
  fetchSymbols(): Promise<string[]>;
}

export function createBarClient(config: Config, logger?: Logger): BarDataClient {
  const { provider } = config;

  switch (provider.type) {
    case 'fixture':
      if (!provider.fixturesPath) {
        throw new ConfigError('FIXTURES_PATH is required when PROVIDER_TYPE is fixture', {
          issues: ['provider.fixturesPath: Required'],
        });
      }
      return new FixtureBarClient({ fixturesPath: provider.fixturesPath, logger });
    case 'yahoo':
      return new YahooChartClient({
        baseUrl: provider.baseUrl,
        timeoutMs: provider.timeoutMs,
        logger,
      });
  }
}

export function createSymbolSource(config: Config, logger?: Logger): SymbolSource {
  return new SymbolRoster({
    url: config.roster.url,
    timeoutMs: config.roster.timeoutMs,
    userAgent: config.roster.userAgent,
    logger,
  });
}
