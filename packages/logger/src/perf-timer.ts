/**
 * @fileoverview Performance timing utilities for `duration_ms` log fields.
 * Uses high-resolution timers (performance.now()).
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since start (frozen once stopped) */
  elapsed(): number;

  /** Stops the timer and returns the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * Create a new performance timer.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const series = load(rows);
 * logger.info('Dataset loaded', { rows: series.length, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return Math.round(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return Math.round(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Measure the duration of a synchronous function.
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = measureSync(() => buildDashboard(series, request));
 * logger.info('Dashboard built', { duration_ms });
 * ```
 */
export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}
