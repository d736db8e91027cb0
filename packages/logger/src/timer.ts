/**
 * @fileoverview Duration measurement for log fields such as `duration_ms`.
 */

/**
 * Performance timer for measuring operation durations.
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Stop the timer and return the final duration in milliseconds */
  stop(): number;
}

/**
 * Create a new timer backed by performance.now().
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * await doSomeWork();
 * logger.info('Work completed', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },
  };
}
