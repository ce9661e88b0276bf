import { ok, err, type Result } from 'neverthrow';
import { clientLogger } from '../logger.js';
import { parseResponse } from '../response/parser.js';
import type { HttpResponse } from '../response/types.js';
import { connect } from '../transport/connect.js';
import type { Connector } from '../transport/types.js';
import type { HttpError } from '../types.js';
import type { RequestSpec } from './types.js';
import { writeRequest } from './writer.js';

/**
 * Executes one request on a fresh connection: connect, write, read the
 * full response, close. The transport is closed on every path.
 *
 * @param spec - The request to send
 * @param connector - Opens the transport (default: TCP/TLS sockets)
 * @returns Result with the response, or the first error encountered
 */
export const executeRequest = async (
  spec: RequestSpec,
  connector: Connector = connect
): Promise<Result<HttpResponse, HttpError>> => {
  clientLogger.debug('{method} {url}', { method: spec.method, url: spec.url.href });

  const transport = await connector(spec.url, {
    proxy: spec.proxy,
    timeoutMs: spec.timeoutMs,
    verifyTls: spec.verifyTls,
  });
  if (transport.isErr()) {
    clientLogger.warn('{method} {url} failed to connect: {message}', {
      method: spec.method,
      url: spec.url.href,
      message: transport.error.message,
    });
    return err(transport.error);
  }

  try {
    const written = await writeRequest(spec, transport.value);
    if (written.isErr()) {
      return err(written.error);
    }

    const response = await parseResponse(transport.value, { method: spec.method });
    if (response.isErr()) {
      clientLogger.warn('{method} {url} returned an unreadable response: {message}', {
        method: spec.method,
        url: spec.url.href,
        message: response.error.message,
      });
      return err(response.error);
    }

    clientLogger.debug('{method} {url} -> {status} ({size} bytes)', {
      method: spec.method,
      url: spec.url.href,
      status: response.value.status,
      size: response.value.body.length,
    });
    return ok(response.value);
  } finally {
    transport.value.close();
  }
};
