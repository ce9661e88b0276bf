/**
 * URL schemes the client can speak.
 */
export type Scheme = 'http' | 'https';

/**
 * A decomposed target URL. Immutable once parsed.
 */
export interface ParsedUrl {
  readonly scheme: Scheme;
  /** Host name or IP literal, without IPv6 brackets */
  readonly host: string;
  /** Explicit port, or the scheme default (80/443) */
  readonly port: number;
  /** Path plus query, exactly as it goes on the request line (defaults to "/") */
  readonly path: string;
  /** Query string without the leading "?" */
  readonly query?: string | undefined;
  /** Normalized absolute form of the URL */
  readonly href: string;
}
