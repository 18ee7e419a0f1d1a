import type { DocumentHandle } from './api-data.js';

type ApiErrorOptions = {
  httpStatusCode?: number;
  shouldRetry?: boolean;
  cause?: unknown;
};

/** Base class of every error raised by the translator client. */
export class ApiError extends Error {
  readonly httpStatusCode: number | undefined;
  readonly shouldRetry: boolean;

  constructor(message: string, options?: ApiErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ApiError';
    this.httpStatusCode = options?.httpStatusCode;
    this.shouldRetry = options?.shouldRetry ?? false;
  }
}

/** Authorization failed, check the auth key. */
export class AuthorizationError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, options);
    this.name = 'AuthorizationError';
  }
}

/** Quota for this billing period has been exceeded. */
export class QuotaExceededError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, options);
    this.name = 'QuotaExceededError';
  }
}

/** The server reported high load; the request may be retried later. */
export class TooManyRequestsError extends ApiError {
  constructor(message: string, options?: Omit<ApiErrorOptions, 'shouldRetry'>) {
    super(message, { ...options, shouldRetry: true });
    this.name = 'TooManyRequestsError';
  }
}

/**
 * No response was received. `shouldRetry` is set by the transport that
 * observed the failure: timeouts and refused connections are retryable,
 * malformed requests are not.
 */
export class ConnectionError extends ApiError {
  constructor(message: string, shouldRetry: boolean, cause?: unknown) {
    super(message, { shouldRetry, cause });
    this.name = 'ConnectionError';
  }
}

export class DocumentNotReadyError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, options);
    this.name = 'DocumentNotReadyError';
  }
}

export class GlossaryNotFoundError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, options);
    this.name = 'GlossaryNotFoundError';
  }
}

/** A document translation failed; carries the handle of the job. */
export class DocumentTranslationError extends ApiError {
  readonly handle: DocumentHandle;

  constructor(message: string, handle: DocumentHandle, options?: ApiErrorOptions) {
    super(message, options);
    this.name = 'DocumentTranslationError';
    this.handle = handle;
  }

  override toString(): string {
    return `${super.toString()}, document handle: ${this.handle.toString()}`;
  }
}
