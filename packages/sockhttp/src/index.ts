/**
 * sockhttp - a minimal HTTP/1.1 client over raw sockets, with CONNECT proxy
 * tunnelling and Result-typed errors.
 *
 * @packageDocumentation
 */

// Public types
export type * from './types.js';

// ============================================================================
// CORE: Client
// ============================================================================

export { send, get, post, put, patch, del, head, options } from './client.js';
export type { RequestOptions } from './client.js';

export { createRequest, executeRequest, serializeRequest, writeRequest } from './request/index.js';
export type { RequestBuilder, RequestSpec, ClientOptions } from './request/index.js';

// ============================================================================
// CORE: Responses
// ============================================================================

export {
  parseResponse,
  createResponse,
  // Line-level parsing
  parseStatusLine,
  parseHeaderLine,
  readResponseHead,
} from './response/index.js';
export type {
  HttpResponse,
  HttpResponseInit,
  ParseResponseOptions,
  StatusLine,
  ResponseHead,
} from './response/index.js';

// ============================================================================
// Transport
// ============================================================================

export {
  connect,
  DEFAULT_TIMEOUT_MS,
  // CONNECT tunnelling
  establishTunnel,
  buildConnectRequest,
  // Socket plumbing
  createSocketTransport,
  openSocket,
  upgradeTls,
  createByteReader,
} from './transport/index.js';
export type {
  Transport,
  Connector,
  ConnectOptions,
  SocketTransport,
  SocketTransportOptions,
  UpgradeTlsOptions,
  Tunnel,
  TunnelTarget,
  ByteReader,
} from './transport/index.js';

// ============================================================================
// Utilities
// ============================================================================

export { parseUrl, formatAuthority, formatHostPort, DEFAULT_PORTS } from './url/index.js';
export type { ParsedUrl, Scheme } from './url/index.js';

export { createHeaderMap } from './headers/index.js';
export type { HeaderMap, HeaderInit, HeaderPair } from './headers/index.js';

export { mapSocketError } from './errors.js';
export type { SocketPhase } from './errors.js';

export { LOGGER_CATEGORY } from './logger.js';
