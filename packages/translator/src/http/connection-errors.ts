import { ConnectionError } from '../errors.js';

// Transient socket-level failures: timeouts, refused or reset connections, DNS
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ERR_NETWORK',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const TIMEOUT_ERROR_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

export function isRetryableErrorCode(code: string | undefined): boolean {
  return code !== undefined && RETRYABLE_ERROR_CODES.has(code);
}

/**
 * Builds the ConnectionError for a failure with a known error code, or
 * returns undefined when the code does not mark a transient failure.
 */
export function retryableConnectionError(
  code: string | undefined,
  error: unknown,
): ConnectionError | undefined {
  if (!isRetryableErrorCode(code)) {
    return undefined;
  }

  const message = error instanceof Error ? error.message : String(error);
  return code !== undefined && TIMEOUT_ERROR_CODES.has(code)
    ? new ConnectionError(`Request timed out: ${message}`, true, error)
    : new ConnectionError(`Connection failed: ${message}`, true, error);
}
