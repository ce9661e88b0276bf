import { ok, err, type Result } from 'neverthrow';
import { createInvalidUrlError } from '../errors.js';
import type { HttpError } from '../types.js';
import type { ParsedUrl, Scheme } from './types.js';

/** Default port for each scheme */
export const DEFAULT_PORTS: Readonly<Record<Scheme, number>> = {
  http: 80,
  https: 443,
};

const SCHEME_PATTERN = /^(https?):\/\//i;
const PORT_PATTERN = /^\d+$/;
const MAX_PORT = 65_535;

/**
 * Index of the first character at or after `from` that is one of `delimiters`,
 * or `text.length` if there is none.
 */
const indexOfAny = (text: string, delimiters: string, from = 0): number => {
  for (let i = from; i < text.length; i++) {
    if (delimiters.includes(text.charAt(i))) {
      return i;
    }
  }
  return text.length;
};

/**
 * Formats a host and port for CONNECT targets and socket addresses,
 * bracketing IPv6 literals.
 */
export const formatHostPort = (host: string, port: number): string =>
  `${host.includes(':') ? `[${host}]` : host}:${String(port)}`;

/**
 * Formats the authority used in the Host header.
 * The port is omitted when it is the scheme default.
 *
 * @example
 * ```typescript
 * formatAuthority(parsed); // "example.com" or "example.com:8080"
 * ```
 */
export const formatAuthority = (url: Pick<ParsedUrl, 'scheme' | 'host' | 'port'>): string => {
  if (url.port === DEFAULT_PORTS[url.scheme]) {
    return url.host.includes(':') ? `[${url.host}]` : url.host;
  }
  return formatHostPort(url.host, url.port);
};

/**
 * Parses an absolute http(s) URL into its parts.
 *
 * The host ends at the first "/", ":" or "?". Digits after ":" form the port.
 * Everything from the first "/" is kept verbatim as the request path; a
 * fragment is dropped since it is never sent to the server.
 *
 * @param input - The URL to parse
 * @returns Result with the parsed URL or an INVALID_URL error
 *
 * @example
 * ```typescript
 * const result = parseUrl('https://example.com:8443/search?q=1');
 * if (result.isOk()) {
 *   result.value.port; // 8443
 *   result.value.path; // "/search?q=1"
 * }
 * ```
 */
export const parseUrl = (input: string): Result<ParsedUrl, HttpError> => {
  const match = SCHEME_PATTERN.exec(input);
  const schemeText = match?.[1]?.toLowerCase();
  if (match === null || schemeText === undefined) {
    return err(createInvalidUrlError(input, 'URL must start with http:// or https://'));
  }

  const scheme: Scheme = schemeText === 'https' ? 'https' : 'http';
  const afterScheme = input.slice(match[0].length);
  const hashIndex = afterScheme.indexOf('#');
  const rest = hashIndex === -1 ? afterScheme : afterScheme.slice(0, hashIndex);

  let host: string;
  let remainder: string;

  if (rest.startsWith('[')) {
    // IPv6 literal
    const closing = rest.indexOf(']');
    if (closing === -1) {
      return err(createInvalidUrlError(input, 'unterminated IPv6 address'));
    }
    host = rest.slice(1, closing);
    remainder = rest.slice(closing + 1);
    if (remainder.length > 0 && !'/:?'.includes(remainder.charAt(0))) {
      return err(createInvalidUrlError(input, 'unexpected characters after IPv6 address'));
    }
  } else {
    const hostEnd = indexOfAny(rest, '/:?');
    host = rest.slice(0, hostEnd);
    remainder = rest.slice(hostEnd);
  }

  if (host.length === 0) {
    return err(createInvalidUrlError(input, 'host is empty'));
  }

  let port = DEFAULT_PORTS[scheme];

  if (remainder.startsWith(':')) {
    const portEnd = indexOfAny(remainder, '/?', 1);
    const portText = remainder.slice(1, portEnd);
    remainder = remainder.slice(portEnd);

    // An empty port ("host:/") means the scheme default
    if (portText.length > 0) {
      if (!PORT_PATTERN.test(portText)) {
        return err(createInvalidUrlError(input, `port "${portText}" is not a number`));
      }
      port = Number.parseInt(portText, 10);
      if (port < 1 || port > MAX_PORT) {
        return err(createInvalidUrlError(input, `port ${portText} is out of range`));
      }
    }
  }

  const path = remainder.length === 0 ? '/' : remainder.startsWith('?') ? `/${remainder}` : remainder;
  const queryIndex = path.indexOf('?');
  const query = queryIndex === -1 ? undefined : path.slice(queryIndex + 1);
  const authority = formatAuthority({ scheme, host, port });

  return ok({
    scheme,
    host,
    port,
    path,
    query,
    href: `${scheme}://${authority}${path}`,
  });
};
