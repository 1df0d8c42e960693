export { HttpTransport, parseBody, type HttpTransportOptions } from './http-transport.js';
export { normalizeBaseUrl, parseRetryAfter } from './url.js';
export type { HttpMethod, RawResponse, RequestOptions, Transport } from './types.js';
