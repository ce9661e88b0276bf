import { Buffer } from 'node:buffer';
import { ok, err, type Result } from 'neverthrow';
import { createMalformedChunkError, createMalformedHeaderError } from '../errors.js';
import { createByteReader, type ByteReader } from '../transport/byte-reader.js';
import type { Transport } from '../transport/types.js';
import type { HttpError } from '../types.js';
import { readHeaderBlock, readResponseHead, type ResponseHead } from './head.js';
import { createResponse } from './response.js';
import type { HttpResponse, ParseResponseOptions } from './types.js';

const CHUNK_SIZE_PATTERN = /^[0-9a-fA-F]+$/;
const CONTENT_LENGTH_PATTERN = /^\d+$/;

/**
 * 1xx responses other than 101 are interim; the final response follows.
 */
const isInterim = (status: number): boolean => status >= 100 && status < 200 && status !== 101;

/**
 * Statuses that never carry a body, regardless of framing headers.
 */
const hasNoBody = (status: number, method: string | undefined): boolean =>
  method?.toUpperCase() === 'HEAD' ||
  (status >= 100 && status < 200) ||
  status === 204 ||
  status === 304;

const isChunked = (transferEncoding: string): boolean =>
  transferEncoding
    .split(',')
    .map((coding) => coding.trim().toLowerCase())
    .includes('chunked');

/**
 * Decodes a chunked body. Trailer fields after the last chunk are discarded.
 */
const readChunkedBody = async (reader: ByteReader): Promise<Result<Uint8Array, HttpError>> => {
  const chunks: Uint8Array[] = [];

  for (;;) {
    const sizeLine = await reader.readLine();
    if (sizeLine.isErr()) {
      return err(sizeLine.error);
    }

    // Chunk extensions (";name=value") are ignored
    const sizeText = (sizeLine.value.split(';')[0] ?? '').trim();
    if (!CHUNK_SIZE_PATTERN.test(sizeText)) {
      return err(createMalformedChunkError(`Invalid chunk size line: ${JSON.stringify(sizeLine.value)}`));
    }

    const size = Number.parseInt(sizeText, 16);
    if (!Number.isSafeInteger(size)) {
      return err(createMalformedChunkError(`Chunk size out of range: ${sizeText}`));
    }
    if (size === 0) {
      break;
    }

    const data = await reader.readExact(size);
    if (data.isErr()) {
      return err(data.error);
    }
    chunks.push(data.value);

    const terminator = await reader.readExact(2);
    if (terminator.isErr()) {
      return err(terminator.error);
    }
    if (terminator.value[0] !== 0x0d || terminator.value[1] !== 0x0a) {
      return err(createMalformedChunkError(`Chunk of ${String(size)} bytes is not followed by CRLF`));
    }
  }

  const trailers = await readHeaderBlock(reader);
  if (trailers.isErr()) {
    return err(trailers.error);
  }

  return ok(Buffer.concat(chunks));
};

/**
 * Reads the body according to the response's framing headers:
 * chunked first, then Content-Length, then until the connection closes.
 */
const readBody = async (
  reader: ByteReader,
  head: ResponseHead,
  method: string | undefined
): Promise<Result<Uint8Array, HttpError>> => {
  if (hasNoBody(head.status, method)) {
    return ok(new Uint8Array(0));
  }

  const transferEncoding = head.headers.get('transfer-encoding');
  if (transferEncoding !== undefined && isChunked(transferEncoding)) {
    return readChunkedBody(reader);
  }

  const contentLength = head.headers.get('content-length');
  if (contentLength !== undefined) {
    if (!CONTENT_LENGTH_PATTERN.test(contentLength)) {
      return err(createMalformedHeaderError(`Content-Length: ${contentLength}`, 'invalid length'));
    }
    return reader.readExact(Number.parseInt(contentLength, 10));
  }

  return reader.readToEnd();
};

/**
 * Parses an HTTP/1.x response from a transport.
 *
 * Reads the status line and header block, skips interim 1xx responses, then
 * reads the body framed by chunked encoding, Content-Length, or connection
 * close. Nothing is returned on failure; a partially read response is dropped.
 *
 * @param transport - Transport positioned at the start of the response
 * @param options - The request method, so HEAD responses are read without a body
 * @returns Result with the response or a framing error
 *
 * @example
 * ```typescript
 * const response = await parseResponse(transport, { method: 'GET' });
 * if (response.isOk()) {
 *   console.log(response.value.status, response.value.reason);
 * }
 * ```
 */
export const parseResponse = async (
  transport: Transport,
  options: ParseResponseOptions = {}
): Promise<Result<HttpResponse, HttpError>> => {
  const reader = createByteReader(transport);

  let head = await readResponseHead(reader);
  while (head.isOk() && isInterim(head.value.status)) {
    head = await readResponseHead(reader);
  }
  if (head.isErr()) {
    return err(head.error);
  }

  const body = await readBody(reader, head.value, options.method);
  if (body.isErr()) {
    return err(body.error);
  }

  return ok(
    createResponse({
      status: head.value.status,
      reason: head.value.reason,
      httpVersion: head.value.httpVersion,
      headers: head.value.headers,
      body: body.value,
    })
  );
};
