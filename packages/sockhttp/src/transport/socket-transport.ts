import { Buffer } from 'node:buffer';
import { connect as netConnect, isIP, type Socket } from 'node:net';
import { connect as tlsConnect, type ConnectionOptions, type TLSSocket } from 'node:tls';
import { ok, err, type Result } from 'neverthrow';
import { createTimeoutError, createTransportError, mapSocketError } from '../errors.js';
import { transportLogger } from '../logger.js';
import type { HttpError } from '../types.js';
import type { Transport } from './types.js';

/**
 * Transport over a Node socket that can hand the socket back,
 * e.g. to start TLS inside a proxy tunnel.
 */
export interface SocketTransport extends Transport {
  /**
   * Detaches the transport from its socket and returns the socket.
   * The transport must not be used afterwards.
   */
  readonly release: () => Socket;
}

/**
 * Options for wrapping a socket.
 */
export interface SocketTransportOptions {
  /** Idle timeout in milliseconds; 0 or undefined disables it */
  readonly timeoutMs?: number | undefined;
  /** Label used in timeout messages and logs */
  readonly label?: string | undefined;
}

type ReadResult = Result<Uint8Array | undefined, HttpError>;

/**
 * Wraps a connected socket in the pull-style Transport interface.
 *
 * Incoming data is buffered and the socket paused until the next read,
 * so the peer is throttled by how fast the parser consumes.
 *
 * @param socket - A connected net.Socket or tls.TLSSocket
 * @param options - Optional timeout and label
 * @returns A SocketTransport instance
 */
export const createSocketTransport = (
  socket: Socket,
  options: SocketTransportOptions = {}
): SocketTransport => {
  const { timeoutMs, label = 'socket' } = options;
  const chunks: Uint8Array[] = [];
  let ended = false;
  let failure: HttpError | undefined;
  let pending: ((result: ReadResult) => void) | undefined;

  const settle = (): void => {
    if (pending === undefined) {
      return;
    }

    const resolve = pending;
    const next = chunks.shift();

    if (next !== undefined) {
      pending = undefined;
      resolve(ok(next));
    } else if (failure !== undefined) {
      pending = undefined;
      resolve(err(failure));
    } else if (ended) {
      pending = undefined;
      resolve(ok(undefined));
    }
  };

  const onData = (chunk: Buffer): void => {
    chunks.push(chunk);
    socket.pause();
    settle();
  };

  const onEnd = (): void => {
    ended = true;
    settle();
  };

  const onError = (error: Error): void => {
    failure ??= mapSocketError(error, 'io');
    settle();
  };

  const onTimeout = (): void => {
    failure ??= createTimeoutError(timeoutMs ?? 0, `waiting on ${label}`);
    socket.destroy();
    settle();
  };

  socket.pause();
  socket.on('data', onData);
  socket.on('end', onEnd);
  socket.on('close', onEnd);
  socket.on('error', onError);
  if (timeoutMs !== undefined && timeoutMs > 0) {
    socket.setTimeout(timeoutMs);
    socket.on('timeout', onTimeout);
  }

  const read = (): Promise<ReadResult> =>
    new Promise<ReadResult>((resolve) => {
      if (pending !== undefined) {
        resolve(err(createTransportError('A read is already in progress')));
        return;
      }

      pending = resolve;
      settle();
      if (pending !== undefined) {
        socket.resume();
      }
    });

  const write = (data: Uint8Array): Promise<Result<void, HttpError>> =>
    new Promise<Result<void, HttpError>>((resolve) => {
      if (failure !== undefined) {
        resolve(err(failure));
        return;
      }
      if (socket.destroyed || !socket.writable) {
        resolve(err(createTransportError(`Cannot write to closed ${label}`)));
        return;
      }

      socket.write(data, (error?: Error | null) => {
        if (error !== undefined && error !== null) {
          resolve(err(failure ?? mapSocketError(error, 'io')));
          return;
        }
        resolve(ok(undefined));
      });
    });

  const detach = (): void => {
    socket.off('data', onData);
    socket.off('end', onEnd);
    socket.off('close', onEnd);
    socket.off('error', onError);
    socket.off('timeout', onTimeout);
    socket.setTimeout(0);
  };

  const close = (): void => {
    if (!socket.destroyed) {
      transportLogger.debug('Closing {label}.', { label });
      socket.destroy();
    }
  };

  const release = (): Socket => {
    detach();
    // Hand back anything received but not yet read
    if (chunks.length > 0) {
      socket.unshift(Buffer.concat(chunks.splice(0)));
    }
    return socket;
  };

  return {
    read,
    write,
    close,
    release,
  };
};

/**
 * Opens a TCP connection. DNS resolution happens inside the socket.
 *
 * @param host - Host name or IP address
 * @param port - TCP port
 * @param timeoutMs - Connect timeout in milliseconds
 * @returns Result with the connected socket or a connection error
 */
export const openSocket = (
  host: string,
  port: number,
  timeoutMs: number
): Promise<Result<Socket, HttpError>> =>
  new Promise<Result<Socket, HttpError>>((resolve) => {
    transportLogger.debug('Connecting to {host}:{port}.', { host, port });
    const socket = netConnect({ host, port });

    const cleanup = (): void => {
      socket.off('connect', onConnect);
      socket.off('error', onError);
      socket.off('timeout', onTimeout);
      socket.setTimeout(0);
    };

    const onConnect = (): void => {
      cleanup();
      transportLogger.debug('Connected to {host}:{port}.', { host, port });
      resolve(ok(socket));
    };

    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      resolve(err(mapSocketError(error, 'connect')));
    };

    const onTimeout = (): void => {
      cleanup();
      socket.destroy();
      resolve(err(createTimeoutError(timeoutMs, `connecting to ${host}:${String(port)}`)));
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);
    if (timeoutMs > 0) {
      socket.setTimeout(timeoutMs);
      socket.once('timeout', onTimeout);
    }
  });

/**
 * Options for a TLS handshake over an existing socket.
 */
export interface UpgradeTlsOptions {
  /** Target host, sent as SNI unless it is an IP address */
  readonly host: string;
  /** Reject certificates that fail verification */
  readonly verifyTls: boolean;
  /** Handshake timeout in milliseconds */
  readonly timeoutMs: number;
}

/**
 * Performs a TLS handshake over a connected socket (direct or tunnelled).
 *
 * @param socket - The plain socket to wrap
 * @param options - Host, verification and timeout settings
 * @returns Result with the secured socket or TLS_HANDSHAKE_FAILED
 */
export const upgradeTls = (
  socket: Socket,
  options: UpgradeTlsOptions
): Promise<Result<TLSSocket, HttpError>> =>
  new Promise<Result<TLSSocket, HttpError>>((resolve) => {
    const { host, verifyTls, timeoutMs } = options;
    const tlsOptions: ConnectionOptions = {
      socket,
      rejectUnauthorized: verifyTls,
      ...(isIP(host) === 0 ? { servername: host } : {}),
    };
    const tlsSocket = tlsConnect(tlsOptions);

    const cleanup = (): void => {
      socket.off('error', onError);
      tlsSocket.off('secureConnect', onSecure);
      tlsSocket.off('error', onError);
      tlsSocket.off('timeout', onTimeout);
      tlsSocket.setTimeout(0);
    };

    const onSecure = (): void => {
      cleanup();
      transportLogger.debug('TLS established with {host} ({protocol}).', {
        host,
        protocol: tlsSocket.getProtocol() ?? 'unknown',
      });
      resolve(ok(tlsSocket));
    };

    const onError = (error: Error): void => {
      cleanup();
      tlsSocket.destroy();
      resolve(err(mapSocketError(error, 'tls')));
    };

    const onTimeout = (): void => {
      cleanup();
      tlsSocket.destroy();
      resolve(err(createTimeoutError(timeoutMs, `negotiating TLS with ${host}`)));
    };

    socket.once('error', onError);
    tlsSocket.once('secureConnect', onSecure);
    tlsSocket.once('error', onError);
    if (timeoutMs > 0) {
      tlsSocket.setTimeout(timeoutMs);
      tlsSocket.once('timeout', onTimeout);
    }
  });
