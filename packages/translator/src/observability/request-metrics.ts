type DurationSummary = {
  count: number;
  min: number;
  max: number;
  total: number;
};

type MetricSnapshot = {
  counters: Record<string, number>;
  statusCodes: Record<string, number>;
  durations: {
    count: number;
    min: number;
    max: number;
    avg: number;
    total: number;
  };
};

/**
 * Counts requests, attempts and retries made through a RequestExecutor.
 * Counter names in use: `requests`, `attempts`, `retries`,
 * `connection-errors`, `backoff-ms`.
 */
export class RequestMetrics {
  private readonly counters: Map<string, number>;
  private readonly statusCodes: Map<number, number>;
  private durations: DurationSummary;

  constructor() {
    this.counters = new Map();
    this.statusCodes = new Map();
    this.durations = { count: 0, min: 0, max: 0, total: 0 };
  }

  increment(counter: string, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  count(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  recordStatus(statusCode: number): void {
    this.statusCodes.set(statusCode, (this.statusCodes.get(statusCode) ?? 0) + 1);
  }

  recordDuration(ms: number): void {
    const { count, min, max, total } = this.durations;
    this.durations = {
      count: count + 1,
      min: count === 0 ? ms : Math.min(min, ms),
      max: count === 0 ? ms : Math.max(max, ms),
      total: total + ms,
    };
  }

  snapshot(): MetricSnapshot {
    const counters: Record<string, number> = {};
    for (const [key, value] of this.counters) {
      counters[key] = value;
    }

    const statusCodes: Record<string, number> = {};
    for (const [code, value] of this.statusCodes) {
      statusCodes[String(code)] = value;
    }

    const { count, min, max, total } = this.durations;
    const avg = count > 0 ? total / count : 0;

    return {
      counters,
      statusCodes,
      durations: { count, min, max, avg, total },
    };
  }

  reset(): void {
    this.counters.clear();
    this.statusCodes.clear();
    this.durations = { count: 0, min: 0, max: 0, total: 0 };
  }
}

export type { MetricSnapshot };
