/**
 * Command definitions for the mdpoc CLI
 */

import { Command } from 'commander';
import { parseSessionDate } from '@mdpoc/bar-batch';
import type { BarDataClient } from '@mdpoc/contracts';
import type { Logger } from '@mdpoc/logger';
import type { Config } from './config/index.js';
import { runIngest, runRoster, toIngestReport } from './pipeline.js';
import type { SymbolSource } from './services/providers/factory.js';

export interface ProgramDeps {
  config: Config;
  logger: Logger;

  /** Receives command output (JSON) */
  write: (text: string) => void;

  roster?: SymbolSource;
  client?: BarDataClient;
  now?: () => Date;
}

interface BarsCommandOptions {
  date?: string;
  clean: boolean;
}

/**
 * Builds the CLI program. Commands reject on failure; the caller decides
 * the exit code.
 */
export function createProgram(deps: ProgramDeps): Command {
  const program = new Command();

  program
    .name('mdpoc')
    .description('Scrape the S&P 500 symbol roster and fetch previous-session 5-minute bars')
    .version('0.1.0');

  program
    .command('symbols')
    .description('Print the current symbol roster as a JSON array')
    .action(async () => {
      const symbols = await runRoster(deps);
      deps.write(`${JSON.stringify(symbols)}\n`);
    });

  program
    .command('bars')
    .description('Fetch session bars for the given symbols, or for the whole roster')
    .argument('[symbols...]', 'ticker symbols, e.g. AAPL BRK.B')
    .option('-d, --date <date>', 'session date (YYYY-MM-DD), defaults to yesterday')
    .option('-c, --clean', 'drop invalid and duplicate bars and sort them', false)
    .action(async (symbols: string[], options: BarsCommandOptions) => {
      const result = await runIngest({
        config: deps.config,
        logger: deps.logger,
        symbols: symbols.map((symbol) => symbol.toUpperCase()),
        date: options.date === undefined ? undefined : parseSessionDate(options.date),
        clean: options.clean,
        roster: deps.roster,
        client: deps.client,
        now: deps.now,
      });
      deps.write(`${JSON.stringify(toIngestReport(result), null, 2)}\n`);
    });

  return program;
}
