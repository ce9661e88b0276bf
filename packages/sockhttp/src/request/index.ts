export { createRequest } from './builder.js';
export { executeRequest } from './execute.js';
export { serializeRequest, writeRequest } from './writer.js';
export type { RequestBuilder, RequestSpec, ClientOptions } from './types.js';
