export { createHeaderMap } from './header-map.js';
export type { HeaderMap, HeaderInit, HeaderPair } from './types.js';
