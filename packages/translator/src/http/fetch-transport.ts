import { Readable } from 'node:stream';
import { ConnectionError } from '../errors.js';
import { encodeBody } from './body-encoding.js';
import { errorCode, retryableConnectionError } from './connection-errors.js';
import { createResponse, mergeHeaders } from './request.js';
import { pipeChunks } from './streams.js';
import type { HttpRequest, SendOutcome, Transport } from './types.js';

type FetchPreparedRequest = {
  request: HttpRequest;
  url: string;
  init: {
    method: string;
    headers: Record<string, string>;
    body: string | FormData | undefined;
  };
};

type FetchTransportOptions = {
  /** Defaults to Node's global fetch, which pools connections in undici */
  fetch?: typeof fetch;
};

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key.toLowerCase()] = value;
  });
  return record;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function toConnectionError(error: unknown): ConnectionError {
  if (isTimeout(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new ConnectionError(`Request timed out: ${message}`, true, error);
  }

  // undici reports network failures as TypeError('fetch failed') with the socket error as cause
  const cause: unknown = error instanceof Error ? error.cause : undefined;
  const retryable =
    retryableConnectionError(errorCode(cause), error) ?? retryableConnectionError(errorCode(error), error);
  if (retryable) {
    return retryable;
  }

  const message = error instanceof Error ? error.message : String(error);
  return error instanceof TypeError
    ? new ConnectionError(`Request failed: ${message}`, false, error)
    : new ConnectionError(`Unexpected request failure: ${message}`, false, error);
}

/**
 * Transport on the WHATWG fetch API. Interchangeable with AxiosTransport;
 * pick one per Translator at construction time.
 */
export class FetchTransport implements Transport<FetchPreparedRequest> {
  readonly name = 'fetch';
  private readonly fetchFn: typeof fetch;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
  }

  prepare(request: HttpRequest): FetchPreparedRequest {
    const encoded = encodeBody(request.body);

    return {
      request,
      url: request.url,
      init: {
        method: request.method,
        headers: mergeHeaders(
          request.headers,
          encoded.contentType ? { 'Content-Type': encoded.contentType } : undefined,
        ),
        body: encoded.data,
      },
    };
  }

  async send(prepared: FetchPreparedRequest, timeoutMs: number): Promise<SendOutcome> {
    const { request } = prepared;

    try {
      const response = await this.fetchWithTimeout(prepared, timeoutMs);
      const headers = headersToRecord(response.headers);
      const wantsStream = request.stream || request.onChunk !== undefined;

      if (!wantsStream || response.status >= 400 || response.body === null) {
        const text = wantsStream && response.body === null ? undefined : await response.text();
        return { ok: true, response: createResponse(response.status, text, headers) };
      }

      const body = Readable.fromWeb(response.body);

      if (request.onChunk) {
        const streamError = await pipeChunks(body, request.onChunk);
        return streamError
          ? { ok: false, error: streamError }
          : { ok: true, response: createResponse(response.status, undefined, headers) };
      }

      return { ok: true, response: createResponse(response.status, undefined, headers, body) };
    } catch (error) {
      return { ok: false, error: toConnectionError(error) };
    }
  }

  /**
   * The timeout covers the wait for response headers only, as axios' does;
   * a body that keeps arriving is read to the end.
   */
  private async fetchWithTimeout(prepared: FetchPreparedRequest, timeoutMs: number): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      const timeout = new Error(`No response within ${timeoutMs}ms`);
      timeout.name = 'TimeoutError';
      controller.abort(timeout);
    }, timeoutMs);

    try {
      return await this.fetchFn(prepared.url, {
        ...prepared.init,
        headers: { ...prepared.init.headers },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    // connections belong to the global undici dispatcher
  }
}

export type { FetchPreparedRequest, FetchTransportOptions };
