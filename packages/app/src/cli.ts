#!/usr/bin/env tsx

/**
 * CLI entry point for the mdpoc command
 */

// Load environment variables from .env file
import 'dotenv/config';

import { describeCause } from '@mdpoc/contracts';
import { attachGlobalHandlers, createLogger, serializeError, type Logger } from '@mdpoc/logger';
import { getConfigSummary, loadConfig, type Config } from './config/index.js';
import { createProgram } from './program.js';

function createAppLogger(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
}

async function main(): Promise<void> {
  let logger: Logger | undefined;

  try {
    const config = loadConfig(process.env);
    logger = createAppLogger(config);
    attachGlobalHandlers(logger);
    logger.debug('Configuration loaded', getConfigSummary(config));

    const program = createProgram({
      config,
      logger,
      write: (text) => {
        process.stdout.write(text);
      },
    });

    await program.parseAsync(process.argv);
  } catch (error) {
    if (logger) {
      logger.error('Command failed', { error: serializeError(error) });
    } else {
      process.stderr.write(`mdpoc: ${describeCause(error)}\n`);
    }
    process.exitCode = 1;
  }
}

void main();
