import type { Readable } from 'node:stream';
import type { ConnectionError } from '../errors.js';

type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

type FormFields = Readonly<Record<string, string>>;

type FilePart = {
  filename: string;
  content: Buffer;
  contentType?: string;
};

type RequestBody =
  | { kind: 'none' }
  | { kind: 'json'; json: unknown }
  | { kind: 'form'; fields: FormFields }
  | { kind: 'multipart'; fields: FormFields; files: Readonly<Record<string, FilePart>> };

type ChunkCallback = (chunk: Uint8Array) => void | Promise<void>;

/**
 * Description of one HTTP call, independent of the HTTP library. The same
 * object is sent on every attempt, so nothing in it may be consumed by a
 * send: file contents are held as buffers, never as one-shot streams.
 */
type HttpRequest = {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: RequestBody;
  /** Leave the body unread and hand back a stream, see HttpResponse.stream */
  readonly stream: boolean;
  /** Receives every body chunk instead of buffering the text */
  readonly onChunk?: ChunkCallback;
};

type HttpResponse = {
  statusCode: number;
  text?: string;
  json?: unknown;
  headers: Record<string, string>;
  stream?: Readable;
};

type SendOutcome =
  | { ok: true; response: HttpResponse }
  | { ok: false; error: ConnectionError };

/**
 * One network round trip. Implementations encode a request once in
 * `prepare` and may `send` the prepared value any number of times.
 */
interface Transport<Prepared = unknown> {
  readonly name: string;
  prepare(request: HttpRequest): Prepared;
  send(prepared: Prepared, timeoutMs: number): Promise<SendOutcome>;
  close(): Promise<void>;
}

export type {
  ChunkCallback,
  FilePart,
  FormFields,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  RequestBody,
  SendOutcome,
  Transport,
};
