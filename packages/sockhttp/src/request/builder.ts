import { Buffer } from 'node:buffer';
import { ok, err, type Result } from 'neverthrow';
import { createInvalidRequestError } from '../errors.js';
import { createHeaderMap } from '../headers/header-map.js';
import type { HeaderMap } from '../headers/types.js';
import type { HttpResponse } from '../response/types.js';
import { DEFAULT_TIMEOUT_MS } from '../transport/connect.js';
import type { Connector } from '../transport/types.js';
import type { HttpError, KnownHttpMethod } from '../types.js';
import { parseUrl } from '../url/parse-url.js';
import type { ParsedUrl } from '../url/types.js';
import { executeRequest } from './execute.js';
import type { ClientOptions, RequestBuilder, RequestSpec } from './types.js';

const METHOD_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

/** Methods whose requests must not carry a body */
const BODYLESS_METHODS: ReadonlySet<string> = new Set<KnownHttpMethod>(['GET', 'HEAD', 'OPTIONS']);

/**
 * Accumulated builder state.
 */
interface BuilderState {
  readonly method: string;
  readonly url: ParsedUrl;
  readonly headers: HeaderMap;
  readonly body?: Uint8Array | undefined;
  readonly proxy?: ParsedUrl | undefined;
  readonly timeoutMs: number;
  readonly verifyTls: boolean;
  readonly connector?: Connector | undefined;
}

const validate = (state: BuilderState): Result<RequestSpec, HttpError> => {
  if (!METHOD_TOKEN.test(state.method)) {
    return err(createInvalidRequestError(`Invalid method token: ${JSON.stringify(state.method)}`));
  }

  if (state.body !== undefined && BODYLESS_METHODS.has(state.method.toUpperCase())) {
    return err(createInvalidRequestError(`A ${state.method} request cannot carry a body`));
  }

  if (!Number.isFinite(state.timeoutMs) || state.timeoutMs <= 0) {
    return err(createInvalidRequestError(`Timeout must be positive, got ${String(state.timeoutMs)}`));
  }

  return ok({
    method: state.method,
    url: state.url,
    headers: state.headers,
    body: state.body,
    proxy: state.proxy,
    timeoutMs: state.timeoutMs,
    verifyTls: state.verifyTls,
  });
};

const fromState = (state: BuilderState): RequestBuilder => {
  const update = (changes: Partial<BuilderState>): RequestBuilder =>
    fromState({ ...state, ...changes });

  const proxy = (url: string): Result<RequestBuilder, HttpError> =>
    parseUrl(url).map((parsed) => update({ proxy: parsed }));

  const verify = (enabled: boolean): Result<RequestBuilder, HttpError> => {
    if (state.url.scheme !== 'https') {
      return err(createInvalidRequestError('Certificate verification applies only to https URLs'));
    }
    return ok(update({ verifyTls: enabled }));
  };

  const build = (): Result<RequestSpec, HttpError> => validate(state);

  const send = async (): Promise<Result<HttpResponse, HttpError>> => {
    const spec = validate(state);
    if (spec.isErr()) {
      return err(spec.error);
    }
    return executeRequest(spec.value, state.connector);
  };

  return {
    get: () => update({ method: 'GET' }),
    post: () => update({ method: 'POST' }),
    put: () => update({ method: 'PUT' }),
    patch: () => update({ method: 'PATCH' }),
    delete: () => update({ method: 'DELETE' }),
    head: () => update({ method: 'HEAD' }),
    options: () => update({ method: 'OPTIONS' }),
    method: (name) => update({ method: name }),
    headers: (headers) => update({ headers: state.headers.with(headers) }),
    body: (data) => update({ body: typeof data === 'string' ? Buffer.from(data, 'utf8') : data }),
    timeout: (ms) => update({ timeoutMs: ms }),
    proxy,
    verify,
    build,
    send,
  };
};

/**
 * Starts building a request for a URL. The method defaults to GET.
 *
 * @param url - Absolute http or https URL
 * @param options - Client-wide defaults
 * @returns Result with a builder, or INVALID_URL
 *
 * @example
 * ```typescript
 * const builder = createRequest('http://localhost:8080/health', { timeoutMs: 5000 });
 * if (builder.isOk()) {
 *   const response = await builder.value.head().send();
 * }
 * ```
 */
export const createRequest = (
  url: string,
  options: ClientOptions = {}
): Result<RequestBuilder, HttpError> =>
  parseUrl(url).map((parsed) =>
    fromState({
      method: 'GET',
      url: parsed,
      headers: createHeaderMap(options.baseHeaders),
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      verifyTls: options.verifyTls ?? true,
      connector: options.connector,
    })
  );
