import { ok, err, type Result } from 'neverthrow';
import { createInvalidUtf8Error } from '../errors.js';
import type { HttpError } from '../types.js';
import type { HttpResponse, HttpResponseInit } from './types.js';

/**
 * Creates an immutable HttpResponse.
 * The body is decoded lazily on the first call to `text()`.
 *
 * @param init - Status, headers and body
 * @returns An HttpResponse instance
 */
export const createResponse = (init: HttpResponseInit): HttpResponse => {
  const { status, reason, httpVersion, headers, body } = init;
  let decoded: Result<string, HttpError> | undefined;

  const text = (): Result<string, HttpError> => {
    if (decoded === undefined) {
      try {
        decoded = ok(new TextDecoder('utf-8', { fatal: true }).decode(body));
      } catch (error) {
        decoded = err(createInvalidUtf8Error(error));
      }
    }
    return decoded;
  };

  return {
    status,
    reason,
    httpVersion,
    headers,
    body,
    ok: status >= 200 && status < 300,
    header: (name: string): string | undefined => headers.get(name),
    text,
  };
};
