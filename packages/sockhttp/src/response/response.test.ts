import { describe, it, expect } from 'vitest';
import { createResponse } from './response.js';
import { createHeaderMap } from '../headers/header-map.js';
import { bytes } from '../test/fixtures.js';
import type { HttpResponseInit } from './types.js';

const init = (overrides: Partial<HttpResponseInit> = {}): HttpResponseInit => ({
  status: 200,
  reason: 'OK',
  httpVersion: '1.1',
  headers: createHeaderMap([['Content-Type', 'text/plain']]),
  body: bytes('ok'),
  ...overrides,
});

describe('createResponse', () => {
  describe('text', () => {
    it('decodes a UTF-8 body', () => {
      const response = createResponse(init({ body: bytes('héllo ✓') }));

      expect(response.text()._unsafeUnwrap()).toBe('héllo ✓');
    });

    it('returns INVALID_UTF8 for invalid bytes', () => {
      const response = createResponse(init({ body: new Uint8Array([0xff, 0xfe]) }));

      const error = response.text()._unsafeUnwrapErr();

      expect(error.code).toBe('INVALID_UTF8');
      expect(error.message).toBe('Response body is not valid UTF-8');
    });

    it('decodes once and returns the same result', () => {
      const response = createResponse(init());

      expect(response.text()).toBe(response.text());
    });
  });

  describe('header', () => {
    it('looks up names case-insensitively', () => {
      const response = createResponse(init());

      expect(response.header('content-type')).toBe('text/plain');
      expect(response.header('CONTENT-TYPE')).toBe('text/plain');
      expect(response.header('x-missing')).toBeUndefined();
    });
  });

  describe('ok', () => {
    it.each([
      [200, true],
      [299, true],
      [199, false],
      [301, false],
      [500, false],
    ])('for status %i is %s', (status, expected) => {
      expect(createResponse(init({ status })).ok).toBe(expected);
    });
  });
});
