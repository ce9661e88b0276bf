export { parseUrl, formatAuthority, formatHostPort, DEFAULT_PORTS } from './parse-url.js';
export type { ParsedUrl, Scheme } from './types.js';
