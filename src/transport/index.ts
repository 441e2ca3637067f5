/**
 * Transport module
 */

export { Tm1Response, toRestError } from './response.js';
export type { HttpMethod } from './response.js';
export { UndiciTransport, isRemoteDisconnect, selectProxy } from './http-transport.js';
export type { HttpRequest, HttpTransport, ProxySetting, UndiciTransportOptions } from './http-transport.js';
export { CookieJar, domainMatches, extractCookieValue, parseSetCookie } from './cookies.js';
export type { ParsedCookie } from './cookies.js';
export { decodeChunked, isEmbeddedResponse, parseEmbeddedResponse } from './embedded-response.js';
