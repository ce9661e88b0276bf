import { ok, err, type Result } from 'neverthrow';
import { createRequest, type Connector, type HttpError, type HttpResponse } from 'sockhttp';
import type { ExampleConfig } from './config.js';

/**
 * Builds and sends the configured request.
 *
 * @param config - Validated example configuration
 * @param connector - Optional transport factory
 */
export async function sendConfiguredRequest(
  config: ExampleConfig,
  connector?: Connector
): Promise<Result<HttpResponse, HttpError>> {
  const builder = createRequest(config.url, {
    timeoutMs: config.timeoutMs,
    verifyTls: !config.insecure,
    baseHeaders: { 'User-Agent': 'sockhttp-example/0.1.0', Accept: '*/*' },
    ...(connector !== undefined ? { connector } : {}),
  }).andThen((created) => {
    const withMethod = created.method(config.method);
    const withBody = config.body === undefined ? withMethod : withMethod.body(config.body);
    return config.proxy === undefined ? ok(withBody) : withBody.proxy(config.proxy);
  });

  if (builder.isErr()) {
    return err(builder.error);
  }
  return builder.value.send();
}

/**
 * Formats a response as a status line, headers, blank line, then the body.
 * Bodies that are not UTF-8 are summarized by size.
 */
export function formatResponse(response: HttpResponse): string {
  const statusLine = `HTTP/${response.httpVersion} ${String(response.status)} ${response.reason}`.trimEnd();
  const headers = response.headers.entries().map(([name, value]) => `${name}: ${value}`);
  const body = response.text().match(
    (text) => text,
    () => `<${String(response.body.length)} bytes of binary data>`
  );
  return [statusLine, ...headers, '', body].join('\n');
}
