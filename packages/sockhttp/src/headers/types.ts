/**
 * A single header as a name/value pair.
 */
export type HeaderPair = readonly [name: string, value: string];

/**
 * Accepted header inputs: a list of pairs, a Map, or a plain record.
 */
export type HeaderInit = Iterable<HeaderPair> | Readonly<Record<string, string>>;

/**
 * Immutable header mapping.
 *
 * Names are case-insensitive. Writing a name that is already present
 * replaces its value (last write wins) while keeping its position.
 */
export interface HeaderMap {
  /** Number of distinct header names */
  readonly size: number;

  /**
   * Looks up a header value.
   * @param name - Header name, any case
   * @returns The value, or undefined if absent
   */
  readonly get: (name: string) => string | undefined;

  /**
   * Checks whether a header is present.
   * @param name - Header name, any case
   */
  readonly has: (name: string) => boolean;

  /**
   * Lists headers in insertion order, spelled as last written.
   */
  readonly entries: () => readonly HeaderPair[];

  /**
   * Returns a new map with the given headers merged over this one.
   * @param headers - Headers to merge; later pairs win
   */
  readonly with: (headers: HeaderInit) => HeaderMap;

  /**
   * Returns a new map without the named header.
   * @param name - Header name, any case
   */
  readonly without: (name: string) => HeaderMap;
}
