/**
 * Request Context
 *
 * `AsyncLocalStorage` carrying the request id across the call chain, so a
 * report saved and published during a request logs with the same id.
 * The request-id middleware opens the scope; the logger reads it.
 */

import { AsyncLocalStorage } from 'async_hooks';

export interface RequestContext {
  /** Unique identifier for the HTTP request. */
  requestId: string;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

/**
 * Current request context, or `undefined` outside an HTTP request
 * (startup, shutdown).
 */
export function getRequestContext(): RequestContext | undefined {
  return requestContext.getStore();
}
