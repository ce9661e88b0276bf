import type { Result } from 'neverthrow';
import type { HeaderInit, HeaderMap } from '../headers/types.js';
import type { HttpResponse } from '../response/types.js';
import type { Connector } from '../transport/types.js';
import type { HttpError } from '../types.js';
import type { ParsedUrl } from '../url/types.js';

/**
 * Immutable description of one outgoing request, consumed once by send.
 */
export interface RequestSpec {
  /** Request method, sent verbatim */
  readonly method: string;
  readonly url: ParsedUrl;
  readonly headers: HeaderMap;
  readonly body?: Uint8Array | undefined;
  /** HTTP proxy to tunnel through with CONNECT */
  readonly proxy?: ParsedUrl | undefined;
  /** Socket idle timeout in milliseconds */
  readonly timeoutMs: number;
  /** Verify the server certificate on https targets */
  readonly verifyTls: boolean;
}

/**
 * Options shared by the builder and the shortcut functions.
 */
export interface ClientOptions {
  /** Socket idle timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number;
  /** Verify server certificates on https targets (default: true) */
  readonly verifyTls?: boolean;
  /** Headers sent with every request, beneath request-specific headers */
  readonly baseHeaders?: HeaderInit;
  /** Opens transports; defaults to TCP/TLS sockets */
  readonly connector?: Connector;
}

/**
 * Immutable, fluent request builder. Every mutator returns a new builder.
 *
 * @example
 * ```typescript
 * const builder = createRequest('https://api.example.com/items');
 * if (builder.isOk()) {
 *   const result = await builder.value
 *     .post()
 *     .headers([['Content-Type', 'application/json']])
 *     .body(JSON.stringify({ name: 'widget' }))
 *     .send();
 * }
 * ```
 */
export interface RequestBuilder {
  readonly get: () => RequestBuilder;
  readonly post: () => RequestBuilder;
  readonly put: () => RequestBuilder;
  readonly patch: () => RequestBuilder;
  readonly delete: () => RequestBuilder;
  readonly head: () => RequestBuilder;
  readonly options: () => RequestBuilder;

  /**
   * Selects an arbitrary method token, sent verbatim.
   * @param name - The method, e.g. "PROPFIND"
   */
  readonly method: (name: string) => RequestBuilder;

  /**
   * Merges headers; later values override earlier ones case-insensitively.
   * Explicit headers win over the ones the client would synthesize.
   * @param headers - Name/value pairs or a record
   */
  readonly headers: (headers: HeaderInit) => RequestBuilder;

  /**
   * Sets the request body. Strings are UTF-8 encoded.
   * @param data - Body bytes or text
   */
  readonly body: (data: Uint8Array | string) => RequestBuilder;

  /**
   * Sets the socket idle timeout.
   * @param ms - Timeout in milliseconds
   */
  readonly timeout: (ms: number) => RequestBuilder;

  /**
   * Routes the request through an HTTP proxy using CONNECT.
   * @param url - Proxy URL, e.g. "http://127.0.0.1:3128"
   * @returns Result with the new builder or INVALID_URL
   */
  readonly proxy: (url: string) => Result<RequestBuilder, HttpError>;

  /**
   * Enables or disables certificate verification. Only valid for https URLs.
   * @param enabled - Whether to verify
   * @returns Result with the new builder or INVALID_REQUEST
   */
  readonly verify: (enabled: boolean) => Result<RequestBuilder, HttpError>;

  /**
   * Finalizes the request description.
   * @returns Result with the spec or INVALID_REQUEST
   */
  readonly build: () => Result<RequestSpec, HttpError>;

  /**
   * Builds and executes the request.
   * @returns Result with the response or the first error encountered
   */
  readonly send: () => Promise<Result<HttpResponse, HttpError>>;
}
