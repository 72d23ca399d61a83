import { describe, it, expect } from 'vitest';
import { startTimer } from '../src/perf-timer.js';

describe('startTimer', () => {
  it('should report a non-negative elapsed time while running', () => {
    const timer = startTimer();

    expect(timer.isRunning()).toBe(true);
    expect(timer.elapsed()).toBeGreaterThanOrEqual(0);
  });

  it('should freeze the duration once stopped', async () => {
    const timer = startTimer();
    const first = timer.stop();

    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(timer.isRunning()).toBe(false);
    expect(timer.stop()).toBe(first);
    expect(timer.elapsed()).toBe(first);
  });
});
