import { describe, it, expect } from 'vitest';
import { del, get, head, options, patch, post, put, send } from './client.js';
import { createRequest } from './request/builder.js';
import { createScriptedTransport, createMockConnector, writtenText } from './test/mocks.js';
import { OK_HELLO_RESPONSE, TEST_HTTP_URL, TEST_PROXY_URL, rawHead, textOf } from './test/fixtures.js';

describe('client shortcuts', () => {
  describe('get', () => {
    it('returns the parsed response', async () => {
      const transport = createScriptedTransport([OK_HELLO_RESPONSE]);
      const { connector } = createMockConnector(transport);

      const response = (await get(TEST_HTTP_URL, { connector }))._unsafeUnwrap();

      expect(response.status).toBe(200);
      expect(textOf(response.body)).toBe('hello');
      expect(transport.closed()).toBe(true);
    });

    it('returns INVALID_URL without connecting', async () => {
      const { connector, calls } = createMockConnector(createScriptedTransport([]));

      const result = await get('example.com/no-scheme', { connector });

      expect(result._unsafeUnwrapErr().code).toBe('INVALID_URL');
      expect(calls).toHaveLength(0);
    });
  });

  describe('post', () => {
    it('sends headers and body', async () => {
      const transport = createScriptedTransport([rawHead('HTTP/1.1 201 Created', 'Content-Length: 0')]);
      const { connector } = createMockConnector(transport);

      const response = await post(TEST_HTTP_URL, {
        connector,
        headers: [['Content-Type', 'text/plain']],
        body: 'hi',
      });

      expect(response._unsafeUnwrap().status).toBe(201);
      expect(writtenText(transport)).toBe(
        'POST /items?page=2 HTTP/1.1\r\n' +
          'Host: api.example.com\r\n' +
          'Connection: close\r\n' +
          'Content-Type: text/plain\r\n' +
          'Content-Length: 2\r\n' +
          '\r\n' +
          'hi'
      );
    });
  });

  describe.each([
    ['put', put, 'PUT'],
    ['patch', patch, 'PATCH'],
    ['del', del, 'DELETE'],
    ['head', head, 'HEAD'],
    ['options', options, 'OPTIONS'],
  ] as const)('%s', (_name, shortcut, method) => {
    it(`sends ${method}`, async () => {
      const transport = createScriptedTransport([rawHead('HTTP/1.1 204 No Content')]);
      const { connector } = createMockConnector(transport);

      await shortcut(TEST_HTTP_URL, { connector });

      expect(writtenText(transport).startsWith(`${method} /items?page=2 HTTP/1.1\r\n`)).toBe(true);
    });
  });

  describe('proxy option', () => {
    it('is handed to the connector', async () => {
      const { connector, calls } = createMockConnector(createScriptedTransport([OK_HELLO_RESPONSE]));

      await get(TEST_HTTP_URL, { connector, proxy: TEST_PROXY_URL });

      expect(calls[0]?.options?.proxy?.host).toBe('proxy.example.com');
    });

    it('returns INVALID_URL for a bad proxy without connecting', async () => {
      const { connector, calls } = createMockConnector(createScriptedTransport([]));

      const result = await get(TEST_HTTP_URL, { connector, proxy: 'socks5://proxy.example.com' });

      expect(result._unsafeUnwrapErr().code).toBe('INVALID_URL');
      expect(calls).toHaveLength(0);
    });
  });
});

describe('send', () => {
  it('executes a built request through the given connector', async () => {
    const { connector, calls } = createMockConnector(createScriptedTransport([OK_HELLO_RESPONSE]));
    const spec = createRequest(TEST_HTTP_URL)._unsafeUnwrap().head().build()._unsafeUnwrap();

    const response = (await send(spec, connector))._unsafeUnwrap();

    // Content-Length is ignored for HEAD
    expect(response.body.length).toBe(0);
    expect(calls).toHaveLength(1);
  });
});
