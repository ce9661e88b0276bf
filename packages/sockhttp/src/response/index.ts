export { parseResponse } from './parser.js';
export { createResponse } from './response.js';
export { parseStatusLine, parseHeaderLine, readResponseHead } from './head.js';
export type { HttpResponse, HttpResponseInit, ParseResponseOptions } from './types.js';
export type { StatusLine, ResponseHead } from './head.js';
