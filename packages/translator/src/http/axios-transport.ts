import axios, {
  isAxiosError,
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosProxyConfig,
  type AxiosRequestConfig,
} from 'axios';
import http from 'node:http';
import https from 'node:https';
import { Readable } from 'node:stream';
import { ConnectionError } from '../errors.js';
import { encodeBody } from './body-encoding.js';
import { errorCode, retryableConnectionError } from './connection-errors.js';
import { createResponse, mergeHeaders } from './request.js';
import { pipeChunks, readText } from './streams.js';
import type { HttpRequest, SendOutcome, Transport } from './types.js';

type AxiosPreparedRequest = {
  request: HttpRequest;
  config: AxiosRequestConfig;
};

type AxiosTransportOptions = {
  proxyUrl?: string;
  /** Maximum sockets per host in the keep-alive pool */
  maxSockets?: number;
  /** Replaces axios' network adapter, used to run the transport in process */
  adapter?: AxiosAdapter;
};

function parseProxyUrl(proxyUrl: string): AxiosProxyConfig {
  const url = new URL(proxyUrl);
  const defaultPort = url.protocol === 'https:' ? 443 : 80;

  return {
    protocol: url.protocol.replace(':', ''),
    host: url.hostname,
    port: url.port ? Number(url.port) : defaultPort,
    ...(url.username
      ? {
          auth: {
            username: decodeURIComponent(url.username),
            password: decodeURIComponent(url.password),
          },
        }
      : {}),
  };
}

function normalizeHeaders(headers: object): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[key.toLowerCase()] = value;
    } else if (typeof value === 'number') {
      normalized[key.toLowerCase()] = String(value);
    } else if (Array.isArray(value)) {
      normalized[key.toLowerCase()] = value.map(String).join(', ');
    }
  }

  return normalized;
}

/**
 * Transport on axios with keep-alive agents. The agents form the connection
 * pool shared by all requests sent through one transport instance.
 */
export class AxiosTransport implements Transport<AxiosPreparedRequest> {
  readonly name = 'axios';
  private readonly client: AxiosInstance;
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(options: AxiosTransportOptions = {}) {
    const maxSockets = options.maxSockets ?? 10;

    this.httpAgent = new http.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets, maxFreeSockets: 2 });
    this.httpsAgent = new https.Agent({ keepAlive: true, keepAliveMsecs: 1000, maxSockets, maxFreeSockets: 2 });

    this.client = axios.create({
      maxRedirects: 5,
      // Every status is handed back; classification happens above the transport
      validateStatus: () => true,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      proxy: options.proxyUrl ? parseProxyUrl(options.proxyUrl) : false,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  prepare(request: HttpRequest): AxiosPreparedRequest {
    const encoded = encodeBody(request.body);
    const headers = mergeHeaders(
      request.headers,
      encoded.contentType ? { 'Content-Type': encoded.contentType } : undefined,
    );

    return {
      request,
      config: {
        method: request.method,
        url: request.url,
        headers,
        data: encoded.data,
        responseType: request.stream || request.onChunk ? 'stream' : 'text',
        responseEncoding: 'utf8',
      },
    };
  }

  async send(prepared: AxiosPreparedRequest, timeoutMs: number): Promise<SendOutcome> {
    const { request } = prepared;

    try {
      const response = await this.client.request<unknown>({ ...prepared.config, timeout: timeoutMs });
      const headers = normalizeHeaders(response.headers);
      const data: unknown = response.data;

      if (!request.stream && !request.onChunk) {
        const text = typeof data === 'string' ? data : data === undefined ? undefined : JSON.stringify(data);
        return { ok: true, response: createResponse(response.status, text, headers) };
      }

      if (!(data instanceof Readable)) {
        return {
          ok: false,
          error: new ConnectionError('Expected a streamed response body', false),
        };
      }

      if (request.onChunk && response.status < 400) {
        const streamError = await pipeChunks(data, request.onChunk);
        return streamError
          ? { ok: false, error: streamError }
          : { ok: true, response: createResponse(response.status, undefined, headers) };
      }

      if (request.stream && response.status < 400) {
        return { ok: true, response: createResponse(response.status, undefined, headers, data) };
      }

      // Error bodies are small; read them so the status can be explained
      return { ok: true, response: createResponse(response.status, await readText(data), headers) };
    } catch (error) {
      return { ok: false, error: toConnectionError(error) };
    }
  }

  async close(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

function toConnectionError(error: unknown): ConnectionError {
  const code = errorCode(error);
  const retryable = retryableConnectionError(code, error);
  if (retryable) {
    return retryable;
  }

  if (isAxiosError(error)) {
    return new ConnectionError(`Request failed: ${error.message}`, false, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(`Unexpected request failure: ${message}`, false, error);
}

export { normalizeHeaders, parseProxyUrl };
export type { AxiosPreparedRequest, AxiosTransportOptions };
