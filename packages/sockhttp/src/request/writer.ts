import { Buffer } from 'node:buffer';
import type { Result } from 'neverthrow';
import type { HeaderPair } from '../headers/types.js';
import type { Transport } from '../transport/types.js';
import type { HttpError } from '../types.js';
import { formatAuthority } from '../url/parse-url.js';
import type { RequestSpec } from './types.js';

const CRLF = '\r\n';

/**
 * Serializes a request into the bytes sent on the wire.
 *
 * Order: request line, Host, Connection, caller headers, Content-Length,
 * blank line, body. Host, Connection and Content-Length are synthesized
 * only when the caller did not supply them; a caller's Host keeps its spelling.
 *
 * @param spec - The request to serialize
 * @returns The encoded request
 */
export const serializeRequest = (spec: RequestSpec): Uint8Array => {
  const { method, url, headers, body } = spec;
  const entries = headers.entries();
  const isHost = ([name]: HeaderPair): boolean => name.toLowerCase() === 'host';
  const [hostName, hostValue]: HeaderPair = entries.find(isHost) ?? ['Host', formatAuthority(url)];
  const lines = [`${method} ${url.path} HTTP/1.1`, `${hostName}: ${hostValue}`];

  // One request per connection
  if (!headers.has('connection')) {
    lines.push('Connection: close');
  }

  for (const [name, value] of entries) {
    if (name.toLowerCase() !== 'host') {
      lines.push(`${name}: ${value}`);
    }
  }

  if (body !== undefined && !headers.has('content-length')) {
    lines.push(`Content-Length: ${String(body.length)}`);
  }

  const head = Buffer.from(`${lines.join(CRLF)}${CRLF}${CRLF}`, 'utf8');
  return body === undefined ? head : Buffer.concat([head, body]);
};

/**
 * Writes a serialized request to a transport. No partial-write recovery:
 * on failure the transport must be abandoned.
 *
 * @param spec - The request to send
 * @param transport - An open transport
 * @returns Result that is ok once all bytes are written
 */
export const writeRequest = (
  spec: RequestSpec,
  transport: Transport
): Promise<Result<void, HttpError>> => transport.write(serializeRequest(spec));
