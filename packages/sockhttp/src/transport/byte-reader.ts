import { Buffer } from 'node:buffer';
import { ok, err, type Result } from 'neverthrow';
import { createUnexpectedEofError } from '../errors.js';
import type { HttpError } from '../types.js';
import type { Transport } from './types.js';

const CR = 0x0d;
const LF = 0x0a;

/**
 * Buffered reader over a Transport.
 *
 * Pulls from the transport only when the buffer cannot satisfy a call, so a
 * fully framed message never waits on bytes the peer has not sent. Received
 * chunks are queued and joined once per call, so a body spread over many
 * reads is copied once.
 */
export interface ByteReader {
  /**
   * Reads one CRLF-terminated line, decoded as latin1, without the CRLF.
   */
  readonly readLine: () => Promise<Result<string, HttpError>>;

  /**
   * Reads exactly `count` bytes.
   */
  readonly readExact: (count: number) => Promise<Result<Uint8Array, HttpError>>;

  /**
   * Reads everything until the peer closes.
   */
  readonly readToEnd: () => Promise<Result<Uint8Array, HttpError>>;

  /**
   * Removes and returns bytes buffered but not yet consumed.
   */
  readonly drain: () => Uint8Array;
}

/**
 * Creates a ByteReader over a transport.
 *
 * @param transport - The transport to read from
 * @returns A ByteReader instance
 */
export const createByteReader = (transport: Transport): ByteReader => {
  let chunks: Buffer[] = [];
  let length = 0;
  let eof = false;

  /**
   * Queues the next chunk, or marks EOF.
   */
  const fill = async (): Promise<Result<void, HttpError>> => {
    const chunk = await transport.read();
    if (chunk.isErr()) {
      return err(chunk.error);
    }

    if (chunk.value === undefined) {
      eof = true;
    } else if (chunk.value.length > 0) {
      const { buffer, byteOffset, byteLength } = chunk.value;
      chunks.push(Buffer.from(buffer, byteOffset, byteLength));
      length += byteLength;
    }
    return ok(undefined);
  };

  /**
   * Removes `count` buffered bytes from the front. Copies only when the
   * bytes span more than one chunk.
   */
  const take = (count: number): Buffer => {
    if (count === length) {
      const only = chunks.length === 1 ? chunks[0] : undefined;
      const all = only ?? Buffer.concat(chunks, length);
      chunks = [];
      length = 0;
      return all;
    }

    const first = chunks[0];
    if (first !== undefined && first.length >= count) {
      if (first.length === count) {
        chunks.shift();
      } else {
        chunks[0] = first.subarray(count);
      }
      length -= count;
      return first.subarray(0, count);
    }

    const out = Buffer.allocUnsafe(count);
    let copied = 0;
    let used = 0;
    for (const chunk of chunks) {
      const needed = count - copied;
      if (needed === 0) {
        break;
      }
      if (chunk.length <= needed) {
        chunk.copy(out, copied);
        copied += chunk.length;
        used += 1;
      } else {
        chunk.copy(out, copied, 0, needed);
        chunks[used] = chunk.subarray(needed);
        copied += needed;
      }
    }
    chunks.splice(0, used);
    length -= count;
    return out;
  };

  /**
   * Offset of the LF of the first CRLF whose LF lies at or after `from`, or -1.
   */
  const indexOfLineEnd = (from: number): number => {
    let base = 0;
    let previous: number | undefined;

    for (const chunk of chunks) {
      let start = Math.max(0, from - base);
      while (start < chunk.length) {
        const lf = chunk.indexOf(LF, start);
        if (lf === -1) {
          break;
        }
        const before = lf > 0 ? chunk[lf - 1] : previous;
        if (before === CR) {
          return base + lf;
        }
        start = lf + 1;
      }
      previous = chunk[chunk.length - 1];
      base += chunk.length;
    }
    return -1;
  };

  const readLine = async (): Promise<Result<string, HttpError>> => {
    let scanFrom = 0;

    for (;;) {
      const lineEnd = indexOfLineEnd(scanFrom);
      if (lineEnd !== -1) {
        const line = take(lineEnd + 1);
        return ok(line.subarray(0, lineEnd - 1).toString('latin1'));
      }

      if (eof) {
        return err(createUnexpectedEofError('Connection closed before end of line'));
      }

      // Buffered bytes hold no line end; only new bytes need scanning
      scanFrom = length;
      const filled = await fill();
      if (filled.isErr()) {
        return err(filled.error);
      }
    }
  };

  const readExact = async (count: number): Promise<Result<Uint8Array, HttpError>> => {
    while (length < count && !eof) {
      const filled = await fill();
      if (filled.isErr()) {
        return err(filled.error);
      }
    }

    if (length < count) {
      return err(
        createUnexpectedEofError(
          `Connection closed after ${String(length)} of ${String(count)} bytes`
        )
      );
    }

    return ok(take(count));
  };

  const readToEnd = async (): Promise<Result<Uint8Array, HttpError>> => {
    while (!eof) {
      const filled = await fill();
      if (filled.isErr()) {
        return err(filled.error);
      }
    }
    return ok(take(length));
  };

  const drain = (): Uint8Array => take(length);

  return {
    readLine,
    readExact,
    readToEnd,
    drain,
  };
};
