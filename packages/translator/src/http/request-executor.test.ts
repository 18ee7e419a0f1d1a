import { describe, it, expect } from 'vitest';
import { ApiError, ConnectionError } from '../errors.js';
import { RequestMetrics } from '../observability/request-metrics.js';
import { BackoffTimer } from './backoff-timer.js';
import { createRequest, createResponse, describeRequest } from './request.js';
import { RequestExecutor } from './request-executor.js';
import type { HttpRequest, SendOutcome, Transport } from './types.js';

class ScriptedTransport implements Transport<HttpRequest> {
  readonly name = 'scripted';
  readonly sent: Array<{ prepared: HttpRequest; timeoutMs: number }> = [];
  prepareCalls = 0;
  private readonly outcomes: SendOutcome[];

  constructor(outcomes: SendOutcome[]) {
    this.outcomes = [...outcomes];
  }

  prepare(request: HttpRequest): HttpRequest {
    this.prepareCalls += 1;
    return request;
  }

  async send(prepared: HttpRequest, timeoutMs: number): Promise<SendOutcome> {
    this.sent.push({ prepared, timeoutMs });
    const outcome = this.outcomes.shift();
    if (!outcome) {
      throw new Error('no scripted outcome left');
    }
    return outcome;
  }

  async close(): Promise<void> {}
}

function status(statusCode: number, text = ''): SendOutcome {
  return { ok: true, response: createResponse(statusCode, text, {}) };
}

function createExecutor(
  transport: Transport<HttpRequest>,
  config: { maxRetries?: number; minConnectionTimeoutMs?: number; retryServiceUnavailable?: boolean } = {},
) {
  const sleeps: number[] = [];
  const metrics = new RequestMetrics();
  const executor = new RequestExecutor(transport, {
    config: {
      maxRetries: config.maxRetries ?? 5,
      minConnectionTimeoutMs: config.minConnectionTimeoutMs ?? 0,
      retryServiceUnavailable: config.retryServiceUnavailable ?? true,
    },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    createTimer: (minConnectionTimeoutMs) =>
      new BackoffTimer({ minConnectionTimeoutMs, now: () => 0, random: () => 0.5 }),
    metrics,
  });

  return { executor, sleeps, metrics };
}

const request = createRequest({
  method: 'POST',
  url: 'https://api.example.test/v2/translate',
  headers: { Authorization: 'DeepL-Auth-Key test-secret' },
  body: { kind: 'json', json: { text: ['Hello'], target_lang: 'DE' } },
});

describe('RequestExecutor', () => {
  it('returns the first successful response without sleeping', async () => {
    const transport = new ScriptedTransport([status(200, '{"ok":true}')]);
    const { executor, sleeps } = createExecutor(transport);

    const response = await executor.execute(request);

    expect(response.statusCode).toBe(200);
    expect(response.json).toEqual({ ok: true });
    expect(transport.sent).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it('resends the same prepared request after retryable statuses', async () => {
    const transport = new ScriptedTransport([status(503), status(429), status(200)]);
    const { executor, sleeps, metrics } = createExecutor(transport);

    const response = await executor.execute(request);

    expect(response.statusCode).toBe(200);
    expect(transport.prepareCalls).toBe(1);
    expect(transport.sent).toHaveLength(3);
    for (const attempt of transport.sent) {
      expect(attempt.prepared).toBe(request);
      expect(describeRequest(attempt.prepared)).toBe(describeRequest(request));
    }
    expect(sleeps).toEqual([1000, 1600]);
    expect(metrics.count('attempts')).toBe(3);
    expect(metrics.count('retries')).toBe(2);
  });

  it('passes the backoff deadline as the per-attempt timeout', async () => {
    const transport = new ScriptedTransport([status(500), status(200)]);
    const { executor } = createExecutor(transport);

    await executor.execute(request);

    expect(transport.sent.map((attempt) => attempt.timeoutMs)).toEqual([1000, 1600]);
  });

  it('raises the per-attempt timeout to the configured floor', async () => {
    const transport = new ScriptedTransport([status(500), status(200)]);
    const { executor } = createExecutor(transport, { minConnectionTimeoutMs: 10_000 });

    await executor.execute(request);

    expect(transport.sent.map((attempt) => attempt.timeoutMs)).toEqual([10_000, 10_000]);
  });

  it('returns the last response once retries are exhausted', async () => {
    const transport = new ScriptedTransport([status(500), status(502), status(504)]);
    const { executor, sleeps } = createExecutor(transport, { maxRetries: 2 });

    const response = await executor.execute(request);

    expect(response.statusCode).toBe(504);
    expect(transport.sent).toHaveLength(3);
    expect(sleeps).toHaveLength(2);
  });

  it('does not retry client errors', async () => {
    const transport = new ScriptedTransport([status(400), status(200)]);
    const { executor } = createExecutor(transport);

    const response = await executor.execute(request);

    expect(response.statusCode).toBe(400);
    expect(transport.sent).toHaveLength(1);
  });

  it('returns 503 without retrying when service-unavailable retries are off', async () => {
    const transport = new ScriptedTransport([status(503), status(200)]);
    const { executor } = createExecutor(transport, { retryServiceUnavailable: false });

    const response = await executor.execute(request);

    expect(response.statusCode).toBe(503);
    expect(transport.sent).toHaveLength(1);
  });

  it('rethrows the last connection error once retries are exhausted', async () => {
    const first = new ConnectionError('Request timed out: first', true);
    const last = new ConnectionError('Request timed out: last', true);
    const transport = new ScriptedTransport([
      { ok: false, error: first },
      { ok: false, error: last },
    ]);
    const { executor, metrics } = createExecutor(transport, { maxRetries: 1 });

    await expect(executor.execute(request)).rejects.toBe(last);
    expect(metrics.count('connection-errors')).toBe(2);
  });

  it('raises non-retryable connection errors immediately', async () => {
    const error = new ConnectionError('Request failed: bad header', false);
    const transport = new ScriptedTransport([{ ok: false, error }, status(200)]);
    const { executor, sleeps } = createExecutor(transport);

    await expect(executor.execute(request)).rejects.toBe(error);
    expect(transport.sent).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  it('recovers from a retryable connection error', async () => {
    const transport = new ScriptedTransport([
      { ok: false, error: new ConnectionError('Connection failed: reset', true) },
      status(200),
    ]);
    const { executor } = createExecutor(transport);

    const response = await executor.execute(request);
    expect(response.statusCode).toBe(200);
  });

  it('wraps failures while preparing the request', async () => {
    const transport = new ScriptedTransport([]);
    transport.prepare = () => {
      throw new Error('cannot encode body');
    };
    const { executor } = createExecutor(transport);

    const error = await executor.execute(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toHaveProperty('message', 'Error occurred while preparing request: cannot encode body');
    expect(transport.sent).toHaveLength(0);
  });

  it('wraps exceptions escaping the transport', async () => {
    const transport = new ScriptedTransport([]);
    const { executor } = createExecutor(transport);

    const error = await executor.execute(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty('shouldRetry', false);
    expect(error).toHaveProperty('message', 'Unexpected error raised while sending request: no scripted outcome left');
    expect(transport.sent).toHaveLength(1);
  });
});
