/**
 * Middleware barrel export
 */
export { errorHandler, notFoundHandler, asyncHandler } from './errorHandler';
export { requestIdMiddleware, getRequestId, REQUEST_ID_HEADER } from './requestId';
export { validateBody, validateParams, formatZodErrors } from './validateRequest';
export { httpMetricsMiddleware } from './httpMetrics';
