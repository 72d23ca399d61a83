/**
 * @fileoverview High-resolution timers for the `duration_ms` log field.
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start (or until stop, once stopped) */
  elapsed(): number;

  /** Freeze the timer and return the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * await directory.refresh();
 * logger.info('Directory refreshed', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}
