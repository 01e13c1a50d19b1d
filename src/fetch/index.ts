/**
 * Fetch module barrel exports
 */
export { fetchPage, resolveProxy, isCrawlableContentType } from './page-fetch.js';
export { httpRequest, closeAllSessions } from './http-client.js';
export type { FetchResult, FetchError, RequestOptions } from './types.js';
export type { HttpResponse } from './http-client.js';
