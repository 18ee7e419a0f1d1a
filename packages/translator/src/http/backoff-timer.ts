/**
 * Exponential backoff with symmetric jitter, following the gRPC connection
 * backoff protocol: https://github.com/grpc/grpc/blob/master/doc/connection-backoff.md
 *
 * One timer belongs to one request execution and is never shared.
 */

const BACKOFF_INITIAL_SECONDS = 1.0;
const BACKOFF_MAX_SECONDS = 120.0;
const BACKOFF_MULTIPLIER = 1.6;
const BACKOFF_JITTER = 0.23;

type BackoffTimerOptions = {
  minConnectionTimeoutMs: number;
  now?: () => number;
  /** Uniform random value in [0, 1) */
  random?: () => number;
};

export class BackoffTimer {
  private readonly minConnectionTimeoutMs: number;
  private readonly now: () => number;
  private readonly random: () => number;
  private retryCount: number;
  private backoffSeconds: number;
  private deadline: number;

  constructor(options: BackoffTimerOptions) {
    this.minConnectionTimeoutMs = options.minConnectionTimeoutMs;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.retryCount = 0;
    this.backoffSeconds = BACKOFF_INITIAL_SECONDS;
    this.deadline = this.now() + this.backoffSeconds * 1000;
  }

  get retries(): number {
    return this.retryCount;
  }

  get backoffMs(): number {
    return this.backoffSeconds * 1000;
  }

  /** Per-attempt network timeout, never below the configured floor. */
  timeoutMs(): number {
    return Math.max(this.timeUntilDeadlineMs(), this.minConnectionTimeoutMs);
  }

  timeUntilDeadlineMs(): number {
    return Math.max(this.deadline - this.now(), 0);
  }

  /**
   * Moves to the next retry and returns how long to wait before it, which is
   * the time left until the deadline as it stood before advancing.
   */
  advance(): number {
    const waitMs = this.timeUntilDeadlineMs();

    this.backoffSeconds = Math.min(this.backoffSeconds * BACKOFF_MULTIPLIER, BACKOFF_MAX_SECONDS);

    // jitter of 0.23 scales the backoff by a factor in [0.77, 1.23]
    const jitter = 1 + BACKOFF_JITTER * (this.random() * 2 - 1);
    this.deadline = this.now() + this.backoffSeconds * jitter * 1000;
    this.retryCount += 1;

    return waitMs;
  }
}

export {
  BACKOFF_INITIAL_SECONDS,
  BACKOFF_JITTER,
  BACKOFF_MAX_SECONDS,
  BACKOFF_MULTIPLIER,
};
export type { BackoffTimerOptions };
