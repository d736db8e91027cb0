/**
 * Classification of per-symbol fetch failures
 */

import { ErrorCode, isPipelineError } from '@mdpoc/contracts';
import type { FailureReason } from './types.js';

/**
 * Error codes a batch absorbs, and the failure reason each one records.
 *
 * Any error whose code is not listed here aborts the batch.
 */
export const ABSORBED_FAILURES: Readonly<Partial<Record<string, FailureReason>>> = {
  [ErrorCode.BAR_DATA]: 'data',
  [ErrorCode.CONNECTIVITY]: 'connectivity',
};

/**
 * Maps a client error to its failure reason.
 *
 * @returns The reason, or null when the error must propagate
 */
export function classifyFailure(error: unknown): FailureReason | null {
  if (!isPipelineError(error)) {
    return null;
  }
  return ABSORBED_FAILURES[error.code] ?? null;
}
