/**
 * @mdpoc/app
 *
 * Configuration, ingest pipeline and CLI program
 */

export { loadConfig, getConfigSummary, configSchema, envMapping, type Config } from './config/index.js';
export { runIngest, runRoster, toIngestReport } from './pipeline.js';
export type { IngestOptions, IngestResult, FailedOutcome } from './pipeline.js';
export { createProgram, type ProgramDeps } from './program.js';
export { FixtureBarClient, FixtureFileSchema } from './services/providers/fixture-client.js';
export type { FixtureFile, FixtureBarClientConfig } from './services/providers/fixture-client.js';
export { createBarClient, createSymbolSource, type SymbolSource } from './services/providers/factory.js';
