import { describe, it, expect } from 'vitest';
import { BackoffTimer } from './backoff-timer.js';

function createClock(start = 0) {
  let time = start;
  return {
    now: () => time,
    advanceBy: (ms: number) => {
      time += ms;
    },
  };
}

describe('BackoffTimer', () => {
  it('starts with one second of backoff and no retries', () => {
    const clock = createClock();
    const timer = new BackoffTimer({ minConnectionTimeoutMs: 0, now: clock.now, random: () => 0.5 });

    expect(timer.retries).toBe(0);
    expect(timer.backoffMs).toBe(1000);
    expect(timer.timeUntilDeadlineMs()).toBe(1000);
  });

  it('never hands out a timeout below the configured floor', () => {
    const clock = createClock();
    const timer = new BackoffTimer({ minConnectionTimeoutMs: 10_000, now: clock.now, random: () => 0.5 });

    expect(timer.timeoutMs()).toBe(10_000);

    const unfloored = new BackoffTimer({ minConnectionTimeoutMs: 0, now: clock.now, random: () => 0.5 });
    expect(unfloored.timeoutMs()).toBe(1000);
  });

  it('returns the wait until the previous deadline and grows the backoff by 1.6', () => {
    const clock = createClock();
    const timer = new BackoffTimer({ minConnectionTimeoutMs: 0, now: clock.now, random: () => 0.5 });

    expect(timer.advance()).toBe(1000);
    expect(timer.retries).toBe(1);
    expect(timer.backoffMs).toBeCloseTo(1600);
    expect(timer.timeUntilDeadlineMs()).toBeCloseTo(1600);

    clock.advanceBy(1600);
    expect(timer.advance()).toBe(0);
    expect(timer.retries).toBe(2);
    expect(timer.backoffMs).toBeCloseTo(2560);
  });

  it('keeps the time until the deadline at zero once it has passed', () => {
    const clock = createClock();
    const timer = new BackoffTimer({ minConnectionTimeoutMs: 0, now: clock.now, random: () => 0.5 });

    clock.advanceBy(5000);
    expect(timer.timeUntilDeadlineMs()).toBe(0);
  });

  it('applies jitter of at most 23 percent in either direction', () => {
    const clock = createClock();
    const low = new BackoffTimer({ minConnectionTimeoutMs: 0, now: clock.now, random: () => 0 });
    const high = new BackoffTimer({ minConnectionTimeoutMs: 0, now: clock.now, random: () => 1 });

    low.advance();
    high.advance();

    expect(low.timeUntilDeadlineMs()).toBeCloseTo(1600 * 0.77);
    expect(high.timeUntilDeadlineMs()).toBeCloseTo(1600 * 1.23);
  });

  it('caps the backoff at 120 seconds and never decreases it', () => {
    const clock = createClock();
    const timer = new BackoffTimer({ minConnectionTimeoutMs: 0, now: clock.now, random: () => 0.5 });

    let previous = timer.backoffMs;
    for (let retry = 1; retry <= 20; retry += 1) {
      timer.advance();
      expect(timer.retries).toBe(retry);
      expect(timer.backoffMs).toBeGreaterThanOrEqual(previous);
      expect(timer.backoffMs).toBeLessThanOrEqual(120_000);
      previous = timer.backoffMs;
    }

    expect(timer.backoffMs).toBe(120_000);
  });
});
