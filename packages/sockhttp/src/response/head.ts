import { ok, err, type Result } from 'neverthrow';
import { createMalformedHeaderError, createMalformedStatusLineError } from '../errors.js';
import { createHeaderMap, type HeaderMap, type HeaderPair } from '../headers/index.js';
import type { ByteReader } from '../transport/byte-reader.js';
import type { HttpError } from '../types.js';

/**
 * The parts of an HTTP/1.x status line.
 */
export interface StatusLine {
  /** Protocol version without the "HTTP/" prefix, e.g. "1.1" */
  readonly httpVersion: string;
  /** Three-digit status code */
  readonly status: number;
  /** Reason phrase, possibly empty */
  readonly reason: string;
}

/**
 * Status line plus header block.
 */
export interface ResponseHead extends StatusLine {
  readonly headers: HeaderMap;
}

const STATUS_LINE_PATTERN = /^HTTP\/(\d+(?:\.\d+)?) (\d{3})(?: (.*))?$/;

/** RFC 9110 token characters */
const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Parses a status line such as "HTTP/1.1 404 Not Found".
 *
 * @param line - The line without its CRLF
 * @returns Result with the parsed line or MALFORMED_STATUS_LINE
 */
export const parseStatusLine = (line: string): Result<StatusLine, HttpError> => {
  const match = STATUS_LINE_PATTERN.exec(line);
  const version = match?.[1];
  const code = match?.[2];

  if (version === undefined || code === undefined) {
    return err(createMalformedStatusLineError(line));
  }

  return ok({
    httpVersion: version,
    status: Number.parseInt(code, 10),
    reason: match?.[3] ?? '',
  });
};

/**
 * Parses a "Name: value" header line. Whitespace around the value is trimmed.
 *
 * @param line - The line without its CRLF
 * @returns Result with the header pair or MALFORMED_HEADER
 */
export const parseHeaderLine = (line: string): Result<HeaderPair, HttpError> => {
  const colon = line.indexOf(':');
  if (colon === -1) {
    return err(createMalformedHeaderError(line, 'missing colon'));
  }

  const name = line.slice(0, colon);
  if (!HEADER_NAME_PATTERN.test(name)) {
    return err(createMalformedHeaderError(line, 'invalid header name'));
  }

  const pair: HeaderPair = [name, line.slice(colon + 1).trim()];
  return ok(pair);
};

/**
 * Reads header lines up to and including the empty line that ends the block.
 *
 * @param reader - Reader positioned at the first header line
 * @returns Result with the headers (last value wins per name)
 */
export const readHeaderBlock = async (reader: ByteReader): Promise<Result<HeaderMap, HttpError>> => {
  const pairs: HeaderPair[] = [];

  for (;;) {
    const line = await reader.readLine();
    if (line.isErr()) {
      return err(line.error);
    }
    if (line.value === '') {
      return ok(createHeaderMap(pairs));
    }

    const header = parseHeaderLine(line.value);
    if (header.isErr()) {
      return err(header.error);
    }
    pairs.push(header.value);
  }
};

/**
 * Reads a status line and its header block.
 *
 * @param reader - Reader positioned at the start of a response
 * @returns Result with the response head
 */
export const readResponseHead = async (
  reader: ByteReader
): Promise<Result<ResponseHead, HttpError>> => {
  const line = await reader.readLine();
  if (line.isErr()) {
    return err(line.error);
  }

  const statusLine = parseStatusLine(line.value);
  if (statusLine.isErr()) {
    return err(statusLine.error);
  }

  const headers = await readHeaderBlock(reader);
  if (headers.isErr()) {
    return err(headers.error);
  }

  return ok({ ...statusLine.value, headers: headers.value });
};
