import { createLogger } from '@workspace/logger';
import type { DocumentHandle, DocumentStatus } from '../api-data.js';
import { ApiError } from '../errors.js';
import type { Sleep } from '../http/request-executor.js';

const pollerLog = createLogger('DocumentPoller');

/** Fixed cadence; the server's seconds-remaining estimate is not used. */
const DEFAULT_POLL_INTERVAL_MS = 5_000;

type StatusFetcher = (handle: DocumentHandle) => Promise<DocumentStatus>;

type WaitOptions = {
  intervalMs?: number;
  /** Overall deadline for the job; exceeding it is not retryable */
  timeoutMs?: number;
};

type DocumentPollerOptions = {
  intervalMs?: number;
  sleep?: Sleep;
  now?: () => number;
};

// `downloaded` means the result was already fetched, possibly by another process
function isFinished(status: DocumentStatus): boolean {
  return !status.ok || status.done || status.status === 'downloaded';
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Polls a document translation job until it reaches a terminal state
 * (`done`, `downloaded` or `error`). Each poll goes through the retrying request executor;
 * errors from a poll propagate unchanged.
 */
export class DocumentPoller {
  private readonly getStatus: StatusFetcher;
  private readonly intervalMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(getStatus: StatusFetcher, options: DocumentPollerOptions = {}) {
    this.getStatus = getStatus;
    this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async waitUntilDone(handle: DocumentHandle, options: WaitOptions = {}): Promise<DocumentStatus> {
    const intervalMs = options.intervalMs ?? this.intervalMs;
    const startTime = this.now();
    let polls = 1;

    let status = await this.getStatus(handle);
    while (!isFinished(status)) {
      if (options.timeoutMs !== undefined && this.now() - startTime + intervalMs > options.timeoutMs) {
        throw new ApiError(
          `Document translation timed out after ${this.now() - startTime}ms (limit ${options.timeoutMs}ms), ` +
            `last status: ${status.status}`,
          { shouldRetry: false },
        );
      }

      pollerLog.info(
        `Rechecking document translation status after sleeping for ${(intervalMs / 1000).toFixed(3)} seconds.`,
        { documentId: handle.documentId, status: status.status, polls },
      );
      await this.sleep(intervalMs);
      status = await this.getStatus(handle);
      polls += 1;
    }

    pollerLog.debug('Document translation reached terminal status', {
      documentId: handle.documentId,
      status: status.status,
      polls,
    });
    return status;
  }
}

export { DEFAULT_POLL_INTERVAL_MS };
export type { DocumentPollerOptions, StatusFetcher, WaitOptions };
