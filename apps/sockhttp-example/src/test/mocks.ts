/**
 * In-process stand-ins for the example's tests.
 */

import { ok, type Result } from 'neverthrow';
import type { Connector, HttpError, Transport } from 'sockhttp';
import type { ExampleConfig } from '../config.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const baseConfig: ExampleConfig = {
  url: 'http://api.example.com/items',
  method: 'GET',
  proxy: undefined,
  body: undefined,
  timeoutMs: 1000,
  insecure: false,
  logLevel: 'info',
};

/**
 * Connector that records its calls.
 */
export interface ReplyConnector {
  readonly connector: Connector;
  /** Text of every write */
  readonly written: string[];
  /** Proxy host passed to each connect, if any */
  readonly proxies: (string | undefined)[];
}

/**
 * Creates a connector whose transport answers every request with a fixed response.
 */
export const createReplyConnector = (reply: string): ReplyConnector => {
  const written: string[] = [];
  const proxies: (string | undefined)[] = [];

  const connector: Connector = (_target, options) => {
    proxies.push(options?.proxy?.host);
    let sent = false;
    const transport: Transport = {
      read: (): Promise<Result<Uint8Array | undefined, HttpError>> => {
        const chunk = sent ? undefined : encoder.encode(reply);
        sent = true;
        return Promise.resolve(ok(chunk));
      },
      write: (data) => {
        written.push(decoder.decode(data));
        return Promise.resolve(ok(undefined));
      },
      close: () => undefined,
    };
    return Promise.resolve(ok(transport));
  };

  return { connector, written, proxies };
};
