/**
 * @fileoverview Run context management using AsyncLocalStorage.
 * Every log line written inside {@link withRunContext} carries the run's id.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Context of one pipeline run.
 */
export interface RunContext {
  /** Unique run identifier (UUID v4) */
  run_id: string;
}

const runContextStorage = new AsyncLocalStorage<RunContext>();

/**
 * Generate a new unique run ID (UUID v4).
 */
export function generateRunId(): string {
  return randomUUID();
}

/**
 * Get the current run ID, or undefined outside a run.
 */
export function getRunId(): string | undefined {
  return runContextStorage.getStore()?.run_id;
}

/**
 * Execute a function within a new run context.
 * The run ID propagates through all async operations started inside `fn`.
 *
 * @param fn - Function to execute
 * @param runId - Run ID to use (generated when omitted)
 *
 * @example
 * ```typescript
 * await withRunContext(async () => {
 *   logger.info('Ingest started'); // includes run_id
 *   await fetcher.fetchPreviousSessionBars(symbols);
 * });
 * ```
 */
export async function withRunContext<T>(
  fn: () => Promise<T> | T,
  runId?: string
): Promise<T> {
  return runContextStorage.run({ run_id: runId || generateRunId() }, fn);
}
