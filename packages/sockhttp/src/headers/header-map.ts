import type { HeaderInit, HeaderMap, HeaderPair } from './types.js';

const isPairIterable = (headers: HeaderInit): headers is Iterable<HeaderPair> =>
  Symbol.iterator in headers;

const toPairs = (headers: HeaderInit): Iterable<HeaderPair> =>
  isPairIterable(headers) ? headers : Object.entries(headers);

/**
 * Wraps a lowercase-keyed store in the HeaderMap interface.
 */
const fromStore = (store: ReadonlyMap<string, HeaderPair>): HeaderMap => {
  const get = (name: string): string | undefined => store.get(name.toLowerCase())?.[1];

  const has = (name: string): boolean => store.has(name.toLowerCase());

  const entries = (): readonly HeaderPair[] => [...store.values()];

  const withHeaders = (headers: HeaderInit): HeaderMap => {
    const next = new Map(store);
    for (const [name, value] of toPairs(headers)) {
      next.set(name.toLowerCase(), [name, value]);
    }
    return fromStore(next);
  };

  const without = (name: string): HeaderMap => {
    const key = name.toLowerCase();
    if (!store.has(key)) {
      return fromStore(store);
    }
    const next = new Map(store);
    next.delete(key);
    return fromStore(next);
  };

  return {
    size: store.size,
    get,
    has,
    entries,
    with: withHeaders,
    without,
  };
};

/**
 * Creates an immutable, case-insensitive header map.
 *
 * @param headers - Optional initial headers; duplicates resolve to the last value
 * @returns A HeaderMap instance
 *
 * @example
 * ```typescript
 * const headers = createHeaderMap([
 *   ['X-Trace', 'a'],
 *   ['x-trace', 'B'],
 * ]);
 * headers.get('X-TRACE'); // 'B'
 * ```
 */
export const createHeaderMap = (headers?: HeaderInit): HeaderMap => {
  const empty = fromStore(new Map<string, HeaderPair>());
  return headers === undefined ? empty : empty.with(headers);
};
