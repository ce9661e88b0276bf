import { Buffer } from 'node:buffer';
import { ok, err, type Result } from 'neverthrow';
import { createProxyConnectError } from '../errors.js';
import { proxyLogger } from '../logger.js';
import { parseStatusLine, readHeaderBlock } from '../response/head.js';
import type { HttpError } from '../types.js';
import { formatHostPort } from '../url/parse-url.js';
import { createByteReader } from './byte-reader.js';
import type { Transport } from './types.js';

/**
 * The endpoint the tunnel should reach.
 */
export interface TunnelTarget {
  readonly host: string;
  readonly port: number;
}

/**
 * Builds the CONNECT request for a target.
 *
 * @example
 * ```typescript
 * buildConnectRequest({ host: 'example.com', port: 443 });
 * // "CONNECT example.com:443 HTTP/1.1\r\nHost: example.com:443\r\n\r\n"
 * ```
 */
export const buildConnectRequest = (target: TunnelTarget): string => {
  const authority = formatHostPort(target.host, target.port);
  return `CONNECT ${authority} HTTP/1.1\r\nHost: ${authority}\r\n\r\n`;
};

/**
 * An open tunnel.
 */
export interface Tunnel {
  /** The proxy's 2xx status line */
  readonly statusLine: string;
  /** Bytes the proxy sent after its header block */
  readonly leftover: Uint8Array;
}

const isSuccess = (status: number): boolean => status >= 200 && status < 300;

/**
 * Performs an HTTP CONNECT handshake over a transport connected to a proxy.
 *
 * On success the transport is a raw byte pipe to the target. Any bytes the
 * proxy sent after its header block are returned with the status line so the
 * caller can replay them.
 *
 * @param transport - Transport connected to the proxy
 * @param target - Host and port to tunnel to
 * @returns Result with the tunnel, or PROXY_CONNECT_FAILED carrying the status line
 */
export const establishTunnel = async (
  transport: Transport,
  target: TunnelTarget
): Promise<Result<Tunnel, HttpError>> => {
  const request = buildConnectRequest(target);
  proxyLogger.debug('Requesting tunnel to {host}:{port}.', { host: target.host, port: target.port });

  const written = await transport.write(Buffer.from(request, 'latin1'));
  if (written.isErr()) {
    return err(written.error);
  }

  const reader = createByteReader(transport);
  const line = await reader.readLine();
  if (line.isErr()) {
    // A proxy that hangs up without answering refused the tunnel
    if (line.error.code === 'UNEXPECTED_EOF') {
      return err(createProxyConnectError('', { cause: line.error }));
    }
    return err(line.error);
  }

  const statusLine = parseStatusLine(line.value);
  if (statusLine.isErr()) {
    return err(createProxyConnectError(line.value, { cause: statusLine.error }));
  }

  if (!isSuccess(statusLine.value.status)) {
    proxyLogger.debug('Proxy refused tunnel: {statusLine}.', { statusLine: line.value });
    return err(createProxyConnectError(line.value));
  }

  const headers = await readHeaderBlock(reader);
  if (headers.isErr()) {
    return err(createProxyConnectError(line.value, { cause: headers.error }));
  }

  proxyLogger.debug('Tunnel established to {host}:{port}.', {
    host: target.host,
    port: target.port,
  });
  return ok({ statusLine: line.value, leftover: reader.drain() });
};
