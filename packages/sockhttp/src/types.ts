/**
 * Error codes for every failure the client can report.
 */
export type HttpErrorCode =
  // Request construction
  | 'INVALID_URL'
  | 'INVALID_REQUEST'
  // Connection establishment
  | 'DNS_RESOLUTION_FAILED'
  | 'CONNECTION_REFUSED'
  | 'TLS_HANDSHAKE_FAILED'
  | 'PROXY_CONNECT_FAILED'
  // I/O on an open connection
  | 'TRANSPORT_ERROR'
  | 'TIMEOUT'
  // Response framing
  | 'MALFORMED_STATUS_LINE'
  | 'MALFORMED_HEADER'
  | 'MALFORMED_CHUNK'
  | 'UNEXPECTED_EOF'
  // Body decoding
  | 'INVALID_UTF8';

/**
 * Error codes whose variant carries no payload beyond the message.
 */
export type BasicHttpErrorCode = Exclude<
  HttpErrorCode,
  'PROXY_CONNECT_FAILED' | 'MALFORMED_STATUS_LINE' | 'MALFORMED_HEADER'
>;

/**
 * An error without a code-specific payload.
 */
export interface BasicHttpError {
  readonly code: BasicHttpErrorCode;
  /** Human-readable error message */
  readonly message: string;
  /** Underlying cause */
  readonly cause?: unknown;
}

/**
 * The proxy refused to open a CONNECT tunnel.
 */
export interface ProxyConnectError {
  readonly code: 'PROXY_CONNECT_FAILED';
  readonly message: string;
  /** The proxy's status line, or an empty string if it sent none */
  readonly statusLine: string;
  readonly cause?: unknown;
}

/**
 * A status line or header line could not be parsed.
 */
export interface MalformedLineError {
  readonly code: 'MALFORMED_STATUS_LINE' | 'MALFORMED_HEADER';
  readonly message: string;
  /** The offending line as received */
  readonly line: string;
  readonly cause?: unknown;
}

/**
 * Discriminated union of all client errors, keyed by `code`.
 *
 * @example
 * ```typescript
 * if (result.isErr()) {
 *   switch (result.error.code) {
 *     case 'PROXY_CONNECT_FAILED':
 *       console.error('Proxy said:', result.error.statusLine);
 *       break;
 *     default:
 *       console.error(result.error.message);
 *   }
 * }
 * ```
 */
export type HttpError = BasicHttpError | ProxyConnectError | MalformedLineError;

/**
 * Request methods with dedicated builder shortcuts.
 * Any other token may still be sent through `method(name)`.
 */
export type KnownHttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD' | 'OPTIONS' | 'PATCH';
