import type { SendOutcome } from './types.js';

const HTTP_STATUS_TOO_MANY_REQUESTS = 429;
const HTTP_STATUS_INTERNAL_SERVER_ERROR = 500;
const HTTP_STATUS_SERVICE_UNAVAILABLE = 503;

type RetryPolicyConfig = {
  maxRetries: number;
  /** Whether 503 responses are retried like other server errors */
  retryServiceUnavailable: boolean;
};

const DEFAULT_CONFIG: RetryPolicyConfig = {
  maxRetries: 5,
  retryServiceUnavailable: true,
};

type RetryDecision = {
  shouldRetry: boolean;
  reason: 'budget-exhausted' | 'connection' | 'status';
};

export class RetryPolicy {
  private readonly config: RetryPolicyConfig;

  constructor(config?: Partial<RetryPolicyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  decide(outcome: SendOutcome, retryCount: number): RetryDecision {
    if (retryCount >= this.config.maxRetries) {
      return { shouldRetry: false, reason: 'budget-exhausted' };
    }

    if (!outcome.ok) {
      return { shouldRetry: outcome.error.shouldRetry, reason: 'connection' };
    }

    return { shouldRetry: this.isRetryableStatus(outcome.response.statusCode), reason: 'status' };
  }

  shouldRetry(outcome: SendOutcome, retryCount: number): boolean {
    return this.decide(outcome, retryCount).shouldRetry;
  }

  isRetryableStatus(statusCode: number): boolean {
    if (statusCode === HTTP_STATUS_TOO_MANY_REQUESTS) {
      return true;
    }

    if (statusCode === HTTP_STATUS_SERVICE_UNAVAILABLE) {
      return this.config.retryServiceUnavailable;
    }

    return statusCode >= HTTP_STATUS_INTERNAL_SERVER_ERROR;
  }
}

export type { RetryDecision, RetryPolicyConfig };
