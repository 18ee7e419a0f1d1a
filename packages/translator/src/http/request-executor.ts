import { createLogger } from '@workspace/logger';
import { ApiError, ConnectionError } from '../errors.js';
import type { ClientConfig } from '../config.js';
import type { RequestMetrics } from '../observability/request-metrics.js';
import { BackoffTimer } from './backoff-timer.js';
import { RetryPolicy } from './retry-policy.js';
import type { HttpRequest, HttpResponse, SendOutcome, Transport } from './types.js';

const executorLog = createLogger('RequestExecutor');

type Sleep = (ms: number) => Promise<void>;

type RequestExecutorOptions = {
  config: Pick<ClientConfig, 'maxRetries' | 'minConnectionTimeoutMs' | 'retryServiceUnavailable'>;
  sleep?: Sleep;
  /** Creates the backoff timer of each execution; injectable for tests */
  createTimer?: (minConnectionTimeoutMs: number) => BackoffTimer;
  metrics?: RequestMetrics;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sends requests through a transport, retrying connection failures, 429 and
 * server errors with exponential backoff. HTTP error statuses that are not
 * retried are returned as responses; classifying them is the caller's job.
 */
export class RequestExecutor<Prepared = unknown> {
  private readonly transport: Transport<Prepared>;
  private readonly policy: RetryPolicy;
  private readonly minConnectionTimeoutMs: number;
  private readonly sleep: Sleep;
  private readonly createTimer: (minConnectionTimeoutMs: number) => BackoffTimer;
  private readonly metrics: RequestMetrics | undefined;

  constructor(transport: Transport<Prepared>, options: RequestExecutorOptions) {
    this.transport = transport;
    this.policy = new RetryPolicy({
      maxRetries: options.config.maxRetries,
      retryServiceUnavailable: options.config.retryServiceUnavailable,
    });
    this.minConnectionTimeoutMs = options.config.minConnectionTimeoutMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.createTimer =
      options.createTimer ?? ((minConnectionTimeoutMs) => new BackoffTimer({ minConnectionTimeoutMs }));
    this.metrics = options.metrics;
  }

  async execute(request: HttpRequest): Promise<HttpResponse> {
    executorLog.debug('Request to translation API', { method: request.method, url: request.url });
    this.metrics?.increment('requests');

    let prepared: Prepared;
    try {
      prepared = this.transport.prepare(request);
    } catch (error) {
      throw new ApiError(`Error occurred while preparing request: ${describeError(error)}`, {
        cause: error,
      });
    }

    const timer = this.createTimer(this.minConnectionTimeoutMs);

    for (;;) {
      const outcome = await this.attempt(prepared, timer.timeoutMs());
      const decision = this.policy.decide(outcome, timer.retries);

      if (!decision.shouldRetry) {
        if (outcome.ok) {
          executorLog.debug('Translation API response', {
            url: request.url,
            statusCode: outcome.response.statusCode,
            retries: timer.retries,
          });
          return outcome.response;
        }

        throw outcome.error;
      }

      if (!outcome.ok) {
        executorLog.info(`Encountered a retryable error: ${outcome.error.message}`);
      }

      const waitMs = timer.advance();
      this.metrics?.increment('retries');
      this.metrics?.increment('backoff-ms', waitMs);
      executorLog.info(
        `Starting retry ${timer.retries} for request ${request.method} ${request.url} ` +
          `after sleeping for ${(waitMs / 1000).toFixed(2)} seconds.`,
      );
      await this.sleep(waitMs);
    }
  }

  private async attempt(prepared: Prepared, timeoutMs: number): Promise<SendOutcome> {
    const startTime = Date.now();
    this.metrics?.increment('attempts');

    let outcome: SendOutcome;
    try {
      outcome = await this.transport.send(prepared, timeoutMs);
    } catch (error) {
      throw new ConnectionError(`Unexpected error raised while sending request: ${describeError(error)}`, false, error);
    } finally {
      this.metrics?.recordDuration(Date.now() - startTime);
    }

    if (outcome.ok) {
      this.metrics?.recordStatus(outcome.response.statusCode);
    } else {
      this.metrics?.increment('connection-errors');
    }

    return outcome;
  }
}

export type { RequestExecutorOptions, Sleep };
