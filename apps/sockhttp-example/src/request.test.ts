import { describe, it, expect } from 'vitest';
import { createHeaderMap, createResponse } from 'sockhttp';
import { formatResponse, sendConfiguredRequest } from './request.js';
import { baseConfig, createReplyConnector } from './test/mocks.js';

const encoder = new TextEncoder();

describe('sendConfiguredRequest', () => {
  it('sends the configured method, headers and body', async () => {
    const { connector, written } = createReplyConnector('HTTP/1.1 201 Created\r\nContent-Length: 0\r\n\r\n');

    const response = await sendConfiguredRequest({ ...baseConfig, method: 'POST', body: 'hi' }, connector);

    expect(response._unsafeUnwrap().status).toBe(201);
    expect(written.join('')).toBe(
      'POST /items HTTP/1.1\r\n' +
        'Host: api.example.com\r\n' +
        'Connection: close\r\n' +
        'User-Agent: sockhttp-example/0.1.0\r\n' +
        'Accept: */*\r\n' +
        'Content-Length: 2\r\n' +
        '\r\n' +
        'hi'
    );
  });

  it('routes through the configured proxy', async () => {
    const { connector, proxies } = createReplyConnector('HTTP/1.1 204 No Content\r\n\r\n');

    await sendConfiguredRequest({ ...baseConfig, proxy: 'http://127.0.0.1:3128' }, connector);

    expect(proxies).toEqual(['127.0.0.1']);
  });

  it('returns INVALID_URL for a bad proxy', async () => {
    const { connector, proxies } = createReplyConnector('');

    const result = await sendConfiguredRequest({ ...baseConfig, proxy: 'proxy:3128' }, connector);

    expect(result._unsafeUnwrapErr().code).toBe('INVALID_URL');
    expect(proxies).toEqual([]);
  });
});

describe('formatResponse', () => {
  it('prints the status line, headers and body', () => {
    const response = createResponse({
      status: 404,
      reason: 'Not Found',
      httpVersion: '1.1',
      headers: createHeaderMap([['Content-Type', 'text/plain']]),
      body: encoder.encode('missing'),
    });

    expect(formatResponse(response)).toBe('HTTP/1.1 404 Not Found\nContent-Type: text/plain\n\nmissing');
  });

  it('summarizes binary bodies', () => {
    const response = createResponse({
      status: 200,
      reason: '',
      httpVersion: '1.1',
      headers: createHeaderMap(),
      body: new Uint8Array([0xff, 0xfe, 0xfd]),
    });

    expect(formatResponse(response)).toBe('HTTP/1.1 200\n\n<3 bytes of binary data>');
  });
});
