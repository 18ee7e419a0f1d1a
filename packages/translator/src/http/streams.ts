import type { Readable } from 'node:stream';
import { ConnectionError } from '../errors.js';
import type { ChunkCallback } from './types.js';

export function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }

  return Buffer.from(String(chunk), 'utf8');
}

/**
 * Feeds a response body to the chunk callback. A failure part-way through is
 * not retryable: the callback has already consumed some of the body.
 */
export async function pipeChunks(
  stream: Readable,
  onChunk: ChunkCallback,
): Promise<ConnectionError | undefined> {
  try {
    for await (const chunk of stream) {
      await onChunk(toBytes(chunk));
    }
    return undefined;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return new ConnectionError(`Streaming response body failed: ${message}`, false, error);
  }
}

export async function readBytes(stream: Readable): Promise<Buffer> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) {
    chunks.push(toBytes(chunk));
  }

  return Buffer.concat(chunks);
}

export async function readText(stream: Readable): Promise<string> {
  return (await readBytes(stream)).toString('utf8');
}
