import { Buffer } from 'node:buffer';
import { ok, err, type Result } from 'neverthrow';
import { createProxyConnectError } from '../errors.js';
import { transportLogger } from '../logger.js';
import type { HttpError } from '../types.js';
import type { ParsedUrl } from '../url/types.js';
import { establishTunnel } from './proxy-tunnel.js';
import { createSocketTransport, openSocket, upgradeTls } from './socket-transport.js';
import type { ConnectOptions, Transport } from './types.js';

/** Default socket idle timeout: 30 seconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Opens a transport to the target URL.
 *
 * - Without a proxy: TCP to the target, then TLS for https.
 * - With a proxy: TCP to the proxy, CONNECT to the target, then TLS inside
 *   the tunnel for https.
 *
 * The socket is destroyed on any failure; errors are terminal for the attempt.
 *
 * @param target - The URL being requested
 * @param options - Proxy, timeout and TLS verification settings
 * @returns Result with an open Transport or a connection error
 *
 * @example
 * ```typescript
 * const transport = await connect(url, { proxy: proxyUrl, timeoutMs: 5000 });
 * if (transport.isErr() && transport.error.code === 'PROXY_CONNECT_FAILED') {
 *   console.error(transport.error.statusLine);
 * }
 * ```
 */
export const connect = async (
  target: ParsedUrl,
  options: ConnectOptions = {}
): Promise<Result<Transport, HttpError>> => {
  const { proxy, timeoutMs = DEFAULT_TIMEOUT_MS, verifyTls = true } = options;
  const endpoint = proxy ?? target;

  const opened = await openSocket(endpoint.host, endpoint.port, timeoutMs);
  if (opened.isErr()) {
    transportLogger.debug('Connection to {host}:{port} failed: {code}.', {
      host: endpoint.host,
      port: endpoint.port,
      code: opened.error.code,
    });
    return err(opened.error);
  }

  let socket = opened.value;

  if (proxy !== undefined) {
    const tunnelTransport = createSocketTransport(socket, { timeoutMs, label: 'proxy' });
    const tunnel = await establishTunnel(tunnelTransport, target);
    if (tunnel.isErr()) {
      tunnelTransport.close();
      return err(tunnel.error);
    }

    socket = tunnelTransport.release();
    const { statusLine, leftover } = tunnel.value;

    if (leftover.length > 0) {
      if (target.scheme === 'https') {
        socket.destroy();
        return err(
          createProxyConnectError(statusLine, {
            message: 'Proxy sent data before the TLS handshake',
          })
        );
      }
      socket.unshift(Buffer.from(leftover));
    }
  }

  if (target.scheme === 'https') {
    const secured = await upgradeTls(socket, { host: target.host, verifyTls, timeoutMs });
    if (secured.isErr()) {
      socket.destroy();
      return err(secured.error);
    }
    return ok(createSocketTransport(secured.value, { timeoutMs, label: target.host }));
  }

  return ok(createSocketTransport(socket, { timeoutMs, label: target.host }));
};
