import { describe, it, expect } from 'vitest';
import { RequestMetrics } from './request-metrics.js';

describe('RequestMetrics', () => {
  it('increments counters', () => {
    const metrics = new RequestMetrics();
    metrics.increment('attempts');
    metrics.increment('attempts');
    metrics.increment('backoff-ms', 1600);

    expect(metrics.count('attempts')).toBe(2);
    expect(metrics.count('backoff-ms')).toBe(1600);
    expect(metrics.count('retries')).toBe(0);
  });

  it('counts status codes and durations', () => {
    const metrics = new RequestMetrics();
    metrics.recordStatus(200);
    metrics.recordStatus(503);
    metrics.recordStatus(503);
    metrics.recordDuration(100);
    metrics.recordDuration(300);

    const snap = metrics.snapshot();
    expect(snap.statusCodes).toEqual({ '200': 1, '503': 2 });
    expect(snap.durations).toEqual({ count: 2, min: 100, max: 300, avg: 200, total: 400 });
  });

  it('keeps duration aggregates across many attempts', () => {
    const metrics = new RequestMetrics();
    for (let ms = 1; ms <= 10_000; ms += 1) {
      metrics.recordDuration(ms);
    }
    metrics.recordDuration(0);

    expect(metrics.snapshot().durations).toEqual({
      count: 10_001,
      min: 0,
      max: 10_000,
      avg: 5000,
      total: 50_005_000,
    });
  });

  it('reports zeros when nothing was recorded', () => {
    expect(new RequestMetrics().snapshot()).toEqual({
      counters: {},
      statusCodes: {},
      durations: { count: 0, min: 0, max: 0, avg: 0, total: 0 },
    });
  });

  it('resets all values', () => {
    const metrics = new RequestMetrics();
    metrics.increment('requests');
    metrics.recordStatus(200);
    metrics.recordDuration(50);
    metrics.reset();

    expect(metrics.snapshot().counters).toEqual({});
    expect(metrics.snapshot().durations.count).toBe(0);
  });
});
