import { ok, err, type Result } from 'neverthrow';
import type { HeaderInit } from './headers/types.js';
import { createRequest } from './request/builder.js';
import { executeRequest } from './request/execute.js';
import type { ClientOptions, RequestBuilder, RequestSpec } from './request/types.js';
import type { HttpResponse } from './response/types.js';
import type { Connector } from './transport/types.js';
import type { HttpError } from './types.js';

/**
 * Options accepted by the one-call shortcuts.
 */
export interface RequestOptions extends ClientOptions {
  /** Request headers, applied over `baseHeaders` */
  readonly headers?: HeaderInit;
  /** Request body; strings are UTF-8 encoded */
  readonly body?: Uint8Array | string;
  /** HTTP proxy URL to tunnel through */
  readonly proxy?: string;
}

type Shortcut = (url: string, options?: RequestOptions) => Promise<Result<HttpResponse, HttpError>>;

/**
 * Sends a built request on a fresh connection.
 *
 * @param spec - Request produced by `RequestBuilder.build()`
 * @param connector - Transport factory, for tests or custom sockets
 * @returns Result with the response, or the first error encountered
 */
export const send = (
  spec: RequestSpec,
  connector?: Connector
): Promise<Result<HttpResponse, HttpError>> => executeRequest(spec, connector);

const applyOptions = (
  builder: RequestBuilder,
  requestOptions: RequestOptions
): Result<RequestBuilder, HttpError> => {
  const { headers, body, proxy } = requestOptions;
  let next = builder;
  if (headers !== undefined) {
    next = next.headers(headers);
  }
  if (body !== undefined) {
    next = next.body(body);
  }
  return proxy === undefined ? ok(next) : next.proxy(proxy);
};

const shortcut =
  (select: (builder: RequestBuilder) => RequestBuilder): Shortcut =>
  async (url, requestOptions = {}) => {
    const builder = createRequest(url, requestOptions).andThen((created) =>
      applyOptions(select(created), requestOptions)
    );
    if (builder.isErr()) {
      return err(builder.error);
    }
    return builder.value.send();
  };

export const get: Shortcut = shortcut((builder) => builder.get());
export const post: Shortcut = shortcut((builder) => builder.post());
export const put: Shortcut = shortcut((builder) => builder.put());
export const patch: Shortcut = shortcut((builder) => builder.patch());
/** DELETE; `delete` is reserved */
export const del: Shortcut = shortcut((builder) => builder.delete());
export const head: Shortcut = shortcut((builder) => builder.head());
export const options: Shortcut = shortcut((builder) => builder.options());
