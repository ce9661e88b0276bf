import type { Result } from 'neverthrow';
import type { HttpError } from '../types.js';
import type { ParsedUrl } from '../url/types.js';

/**
 * Duplex byte channel bound to one remote endpoint for one request.
 *
 * Request writing and response parsing depend only on this interface,
 * never on whether the bytes travel over plain TCP, TLS, or a proxy tunnel.
 */
export interface Transport {
  /**
   * Reads the next chunk of bytes.
   * @returns Result with the chunk, or undefined once the peer has closed
   */
  readonly read: () => Promise<Result<Uint8Array | undefined, HttpError>>;

  /**
   * Writes bytes to the peer.
   * @param data - The bytes to send
   * @returns Result that resolves once the bytes are handed to the OS
   */
  readonly write: (data: Uint8Array) => Promise<Result<void, HttpError>>;

  /**
   * Closes the channel. Safe to call more than once.
   */
  readonly close: () => void;
}

/**
 * Options for establishing a transport.
 */
export interface ConnectOptions {
  /** Tunnel through this HTTP proxy with CONNECT */
  readonly proxy?: ParsedUrl | undefined;
  /** Socket idle timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number | undefined;
  /** Verify the server certificate on https targets (default: true) */
  readonly verifyTls?: boolean | undefined;
}

/**
 * Opens a transport to a target URL.
 * Abstraction over sockets for dependency injection and testing.
 */
export type Connector = (
  target: ParsedUrl,
  options?: ConnectOptions
) => Promise<Result<Transport, HttpError>>;
