/**
 * Request ID Middleware
 *
 * Reuses an incoming `X-Request-ID` header or generates one, echoes it on
 * the response and opens a request context so every log line written while
 * handling the request carries it.
 */

import type { Request, Response, NextFunction } from 'express';
import { requestContext } from '../utils/requestContext';

export const REQUEST_ID_HEADER = 'X-Request-ID';

function generateRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const existingId = req.headers['x-request-id'];
  const requestId = typeof existingId === 'string' && existingId.trim()
    ? existingId.trim()
    : generateRequestId();

  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  requestContext.run({ requestId }, next);
}

export function getRequestId(req: Request): string {
  return req.requestId ?? 'unknown';
}
