import type { RequestBody } from './types.js';

type EncodedBody = {
  data: string | FormData | undefined;
  /** Unset for multipart bodies; the HTTP library adds the boundary */
  contentType?: string;
};

/**
 * Encodes a request body into a value both transports can send repeatedly:
 * strings and FormData backed by in-memory blobs are re-readable.
 */
export function encodeBody(body: RequestBody): EncodedBody {
  switch (body.kind) {
    case 'none':
      return { data: undefined };

    case 'json':
      return { data: JSON.stringify(body.json), contentType: 'application/json' };

    case 'form':
      return {
        data: new URLSearchParams(body.fields).toString(),
        contentType: 'application/x-www-form-urlencoded',
      };

    case 'multipart': {
      const form = new FormData();
      for (const [key, value] of Object.entries(body.fields)) {
        form.append(key, value);
      }
      for (const [key, file] of Object.entries(body.files)) {
        const blob = new Blob([file.content], {
          type: file.contentType ?? 'application/octet-stream',
        });
        form.append(key, blob, file.filename);
      }
      return { data: form };
    }
  }
}

export type { EncodedBody };
