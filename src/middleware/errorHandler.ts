/**
 * Global Error Handler Middleware
 *
 * Centralized error handling for all Express routes. AppError (and the
 * report errors derived from it) carry their own status codes; anything
 * else becomes a 500 with a generic message.
 */

import type { Request, Response, NextFunction } from 'express';
import { createLogger } from '../utils/logger';
import { AppError } from '../errors';
import { getRequestId, REQUEST_ID_HEADER } from './requestId';

const logger = createLogger('errorHandler');

// ─────────────────────────────────────────────────────────────────────────────
// Async Handler Wrapper
// ─────────────────────────────────────────────────────────────────────────────

type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => Promise<void> | void;

/**
 * Wraps async route handlers to forward rejections to the error handler.
 *
 * @example
 * router.post('/reports', asyncHandler(async (req, res) => {
 *   const submitted = await reportService.submit(req.body.content, { notify: true });
 *   res.status(201).json(submitted);
 * }));
 */
export function asyncHandler(fn: AsyncRequestHandler): AsyncRequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Response Format
// ─────────────────────────────────────────────────────────────────────────────

interface ErrorResponse {
  error: string;
  code?: string;
  requestId: string;
  details?: unknown;
}

function buildErrorResponse(
  err: Error,
  requestId: string,
  includeDetails: boolean,
): { statusCode: number; body: ErrorResponse } {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      body: {
        error: err.message,
        code: err.code,
        requestId,
        ...(includeDetails && err.details ? { details: err.details } : {}),
      },
    };
  }

  // Malformed JSON bodies rejected by express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return {
      statusCode: 400,
      body: {
        error: 'Malformed JSON body',
        code: 'BAD_REQUEST',
        requestId,
      },
    };
  }

  if (err.name === 'ZodError') {
    return {
      statusCode: 400,
      body: {
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        requestId,
        ...(includeDetails ? { details: err.message } : {}),
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Handler Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Must be registered after all routes.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const requestId = getRequestId(req);
  const isProduction = process.env.NODE_ENV === 'production';

  const { statusCode, body } = buildErrorResponse(err, requestId, !isProduction);

  const logPayload = {
    requestId,
    method: req.method,
    path: req.path,
    error: err.message,
    ...(err instanceof AppError ? { code: err.code, statusCode: err.statusCode } : {}),
    ...(!isProduction ? { stack: err.stack } : {}),
  };

  if (statusCode >= 500) {
    logger.error(logPayload, 'Request failed with server error');
  } else {
    logger.warn(logPayload, 'Request failed with client error');
  }

  if (res.headersSent) {
    res.end();
    return;
  }

  res.setHeader(REQUEST_ID_HEADER, requestId);
  res.status(statusCode).json(body);
}

// ─────────────────────────────────────────────────────────────────────────────
// 404 Handler
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Registered after all routes but before errorHandler.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.notFound(`Cannot ${req.method} ${req.path}`));
}
