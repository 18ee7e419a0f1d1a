import type { Readable } from 'node:stream';
import type { ChunkCallback, HttpMethod, HttpRequest, HttpResponse, RequestBody } from './types.js';

type CreateRequestInput = {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: RequestBody;
  stream?: boolean;
  onChunk?: ChunkCallback;
};

function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value) || Buffer.isBuffer(value)) {
    return value;
  }

  for (const key of Object.keys(value)) {
    deepFreeze(Reflect.get(value, key));
  }

  return Object.freeze(value);
}

export function createRequest(input: CreateRequestInput): HttpRequest {
  const request: HttpRequest = {
    method: input.method,
    url: input.url,
    headers: { ...input.headers },
    body: input.body ?? { kind: 'none' },
    stream: input.stream ?? false,
    ...(input.onChunk ? { onChunk: input.onChunk } : {}),
  };

  return deepFreeze(request);
}

export function getHeader(
  headers: Readonly<Record<string, string>>,
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }

  return undefined;
}

/**
 * Merges headers, keeping the first occurrence of each name regardless of
 * case, so request-specific headers win over client defaults.
 */
export function mergeHeaders(
  ...sources: Array<Readonly<Record<string, string>> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source ?? {})) {
      if (getHeader(merged, key) === undefined) {
        merged[key] = value;
      }
    }
  }

  return merged;
}

export function parseJson(text: string | undefined): unknown {
  if (!text) {
    return undefined;
  }

  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function createResponse(
  statusCode: number,
  text: string | undefined,
  headers: Record<string, string>,
  stream?: Readable,
): HttpResponse {
  return {
    statusCode,
    headers,
    ...(text === undefined ? {} : { text, json: parseJson(text) }),
    ...(stream ? { stream } : {}),
  };
}

/** Stable serialization of a request, used to compare attempts. */
export function describeRequest(request: HttpRequest): string {
  return JSON.stringify({
    method: request.method,
    url: request.url,
    headers: request.headers,
    body: request.body,
    stream: request.stream,
  });
}

export type { CreateRequestInput };
