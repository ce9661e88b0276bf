import type {
  BasicHttpError,
  BasicHttpErrorCode,
  HttpError,
  MalformedLineError,
  ProxyConnectError,
} from './types.js';

/**
 * Creates an error for codes that carry no extra payload.
 */
const createError = (code: BasicHttpErrorCode, message: string, cause?: unknown): BasicHttpError => ({
  code,
  message,
  cause,
});

export const createInvalidUrlError = (input: string, reason: string): HttpError =>
  createError('INVALID_URL', `Invalid URL "${input}": ${reason}`);

export const createInvalidRequestError = (message: string): HttpError =>
  createError('INVALID_REQUEST', message);

export const createTransportError = (message: string, cause?: unknown): HttpError =>
  createError('TRANSPORT_ERROR', message, cause);

/**
 * Creates a TIMEOUT error.
 *
 * @param timeoutMs - The idle timeout that elapsed
 * @param activity - What the client was doing, e.g. "connecting to example.com:443"
 */
export const createTimeoutError = (timeoutMs: number, activity: string): HttpError =>
  createError('TIMEOUT', `Timed out after ${String(timeoutMs)}ms while ${activity}`);

/**
 * Creates a PROXY_CONNECT_FAILED error.
 *
 * @param statusLine - The proxy's status line, or '' if none was received
 * @param detail - Optional message override and underlying cause
 */
export const createProxyConnectError = (
  statusLine: string,
  detail: { readonly message?: string; readonly cause?: unknown } = {}
): ProxyConnectError => ({
  code: 'PROXY_CONNECT_FAILED',
  message:
    detail.message ??
    (statusLine.length > 0
      ? `Proxy refused CONNECT: ${statusLine}`
      : 'Proxy closed the connection without answering CONNECT'),
  statusLine,
  cause: detail.cause,
});

export const createMalformedStatusLineError = (line: string): MalformedLineError => ({
  code: 'MALFORMED_STATUS_LINE',
  message: `Malformed status line: ${JSON.stringify(line)}`,
  line,
});

export const createMalformedHeaderError = (line: string, reason?: string): MalformedLineError => ({
  code: 'MALFORMED_HEADER',
  message: `Malformed header${reason !== undefined ? ` (${reason})` : ''}: ${JSON.stringify(line)}`,
  line,
});

export const createMalformedChunkError = (message: string): HttpError =>
  createError('MALFORMED_CHUNK', message);

export const createUnexpectedEofError = (message: string): HttpError =>
  createError('UNEXPECTED_EOF', message);

export const createInvalidUtf8Error = (cause?: unknown): HttpError =>
  createError('INVALID_UTF8', 'Response body is not valid UTF-8', cause);

/**
 * Phase of the connection in which a socket error was raised.
 */
export type SocketPhase = 'connect' | 'tls' | 'io';

const DNS_ERROR_CODES: ReadonlySet<string> = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'EAI_NONAME',
  'EAI_FAIL',
  'EAI_NODATA',
]);

/**
 * Reads the `code` property Node attaches to system and TLS errors.
 */
const errnoCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

/**
 * Maps a Node socket error to an HttpError.
 *
 * @param error - The error emitted by the socket
 * @param phase - Where in the connection lifecycle it happened
 * @returns An HttpError object
 */
export const mapSocketError = (error: unknown, phase: SocketPhase): HttpError => {
  const code = errnoCode(error);
  const detail = error instanceof Error ? error.message : String(error);

  if (code === 'ECONNREFUSED') {
    return createError('CONNECTION_REFUSED', `Connection refused: ${detail}`, error);
  }

  if (code !== undefined && DNS_ERROR_CODES.has(code)) {
    return createError('DNS_RESOLUTION_FAILED', `DNS resolution failed: ${detail}`, error);
  }

  if (code === 'ETIMEDOUT') {
    return createError('TIMEOUT', `Connection timed out: ${detail}`, error);
  }

  if (phase === 'tls') {
    return createError('TLS_HANDSHAKE_FAILED', `TLS handshake failed: ${detail}`, error);
  }

  return createTransportError(
    phase === 'connect' ? `Failed to connect: ${detail}` : `Socket error: ${detail}`,
    error
  );
};
