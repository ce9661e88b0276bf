/**
 * Shared test fixtures and constants.
 */

// ============================================================================
// URL Constants
// ============================================================================

export const TEST_HOST = 'api.example.com';
export const TEST_HTTP_URL = `http://${TEST_HOST}/items?page=2`;
export const TEST_HTTPS_URL = `https://${TEST_HOST}/items`;
export const TEST_PROXY_URL = 'http://proxy.example.com:3128';

// ============================================================================
// Raw Responses
// ============================================================================

export const CRLF = '\r\n';

/** Joins response lines with CRLF and terminates the header block */
export const rawHead = (...lines: readonly string[]): string => `${lines.join(CRLF)}${CRLF}${CRLF}`;

export const OK_HELLO_RESPONSE = rawHead('HTTP/1.1 200 OK', 'Content-Length: 5') + 'hello';

export const CHUNKED_WIKIPEDIA_BODY = '4\r\nWiki\r\n5\r\npedia\r\n0\r\n\r\n';

export const CHUNKED_WIKIPEDIA_RESPONSE =
  rawHead('HTTP/1.1 200 OK', 'Transfer-Encoding: chunked') + CHUNKED_WIKIPEDIA_BODY;

export const PROXY_ESTABLISHED = 'HTTP/1.1 200 Connection Established\r\n\r\n';
export const PROXY_FORBIDDEN = 'HTTP/1.1 403 Forbidden\r\n\r\n';

// ============================================================================
// Helpers
// ============================================================================

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const bytes = (text: string): Uint8Array => encoder.encode(text);

export const textOf = (data: Uint8Array): string => decoder.decode(data);
