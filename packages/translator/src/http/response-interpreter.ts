import { STATUS_CODES } from 'node:http';
import { z } from 'zod';
import {
  ApiError,
  AuthorizationError,
  DocumentNotReadyError,
  GlossaryNotFoundError,
  QuotaExceededError,
  TooManyRequestsError,
} from '../errors.js';
import type { HttpResponse } from './types.js';

/** Vendor status code signalling the character quota has been used up. */
const HTTP_STATUS_QUOTA_EXCEEDED = 456;

const CONTENT_SNIPPET_LENGTH = 200;

const errorBodySchema = z.object({
  message: z.string().optional(),
  detail: z.string().optional(),
});

type InterpretContext = {
  glossaryContext?: boolean;
  downloadingDocument?: boolean;
};

function vendorMessage(response: HttpResponse): string {
  const parsed = errorBodySchema.safeParse(response.json);
  if (!parsed.success) {
    return '';
  }

  let message = '';
  if (parsed.data.message !== undefined) {
    message += `, message: ${parsed.data.message}`;
  }
  if (parsed.data.detail !== undefined) {
    message += `, detail: ${parsed.data.detail}`;
  }

  return message;
}

function contentSnippet(response: HttpResponse): string {
  if (response.text === undefined) {
    return '<stream>';
  }

  return response.text.length > CONTENT_SNIPPET_LENGTH
    ? `${response.text.slice(0, CONTENT_SNIPPET_LENGTH)}...`
    : response.text;
}

/**
 * Converts an error response into the matching typed error. Successful
 * (2xx and 3xx) responses return normally.
 */
export function raiseForStatus(response: HttpResponse, context: InterpretContext = {}): void {
  const httpStatusCode = response.statusCode;
  if (httpStatusCode >= 200 && httpStatusCode < 400) {
    return;
  }

  const message = vendorMessage(response);

  switch (httpStatusCode) {
    case 403:
      throw new AuthorizationError(`Authorization failure, check auth key${message}`, {
        httpStatusCode,
      });

    case HTTP_STATUS_QUOTA_EXCEEDED:
      throw new QuotaExceededError(`Quota for this billing period has been exceeded${message}`, {
        httpStatusCode,
      });

    case 404:
      if (context.glossaryContext) {
        throw new GlossaryNotFoundError(`Glossary not found${message}`, { httpStatusCode });
      }
      throw new ApiError(`Not found, check server URL${message}`, { httpStatusCode });

    case 400:
      throw new ApiError(`Bad request${message}`, { httpStatusCode });

    case 429:
      throw new TooManyRequestsError(
        `Too many requests, servers are currently experiencing high load${message}`,
        { httpStatusCode },
      );

    case 503:
      if (context.downloadingDocument) {
        throw new DocumentNotReadyError(`Document not ready${message}`, {
          httpStatusCode,
          shouldRetry: true,
        });
      }
      throw new ApiError(`Service unavailable${message}`, { httpStatusCode, shouldRetry: true });

    default: {
      const statusName = STATUS_CODES[httpStatusCode] ?? 'Unknown';
      throw new ApiError(
        `Unexpected status code: ${httpStatusCode} ${statusName}, content: ${contentSnippet(response)}.`,
        { httpStatusCode },
      );
    }
  }
}

export { HTTP_STATUS_QUOTA_EXCEEDED };
export type { InterpretContext };
