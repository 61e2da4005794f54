/**
 * @fileoverview Tests for performance timing utilities
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { startTimer, measureSync } from '../src/perf-timer.js';

describe('Performance Timers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('startTimer', () => {
    it('should report elapsed milliseconds, rounded', () => {
      const now = vi.spyOn(performance, 'now');
      now.mockReturnValueOnce(1000).mockReturnValueOnce(1042.4);

      const timer = startTimer();

      expect(timer.startTime).toBe(1000);
      expect(timer.elapsed()).toBe(42);
    });

    it('should freeze the duration once stopped', () => {
      const now = vi.spyOn(performance, 'now');
      now.mockReturnValueOnce(0).mockReturnValueOnce(25).mockReturnValue(500);

      const timer = startTimer();
      expect(timer.isRunning()).toBe(true);

      expect(timer.stop()).toBe(25);
      expect(timer.isRunning()).toBe(false);
      expect(timer.elapsed()).toBe(25);
      expect(timer.stop()).toBe(25);
    });
  });

  describe('measureSync', () => {
    it('should return the function result and its duration', () => {
      const now = vi.spyOn(performance, 'now');
      now.mockReturnValueOnce(10).mockReturnValueOnce(17);

      const { result, duration_ms } = measureSync(() => 'done');

      expect(result).toBe('done');
      expect(duration_ms).toBe(7);
    });
  });
});
