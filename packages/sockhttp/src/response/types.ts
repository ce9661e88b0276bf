import type { Result } from 'neverthrow';
import type { HeaderMap } from '../headers/types.js';
import type { HttpError } from '../types.js';

/**
 * A fully read HTTP response. Immutable once created.
 */
export interface HttpResponse {
  /** Status code, e.g. 404 */
  readonly status: number;
  /** Reason phrase, e.g. "Not Found" */
  readonly reason: string;
  /** Protocol version from the status line, e.g. "1.1" */
  readonly httpVersion: string;
  /** Response headers (case-insensitive, last value wins) */
  readonly headers: HeaderMap;
  /** Raw body bytes after transfer decoding */
  readonly body: Uint8Array;
  /** Whether the status is 2xx */
  readonly ok: boolean;

  /**
   * Looks up a header value by name, case-insensitively.
   * @param name - Header name
   * @returns The value, or undefined if absent
   */
  readonly header: (name: string) => string | undefined;

  /**
   * Decodes the body as UTF-8.
   * @returns Result with the text, or INVALID_UTF8
   */
  readonly text: () => Result<string, HttpError>;
}

/**
 * Fields needed to create an HttpResponse.
 */
export interface HttpResponseInit {
  readonly status: number;
  readonly reason: string;
  readonly httpVersion: string;
  readonly headers: HeaderMap;
  readonly body: Uint8Array;
}

/**
 * Options for parsing a response.
 */
export interface ParseResponseOptions {
  /** Method of the request being answered; HEAD responses carry no body */
  readonly method?: string | undefined;
}
