/**
 * HTTP Metrics Middleware
 *
 * Records request count and latency for every HTTP request, labelled by
 * the matched route pattern. Data is exposed via the `/metrics` Prometheus
 * endpoint.
 */

import type { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDurationMs } from '../infrastructure/metrics';

/** Label for requests no route matched (404s, body-parser rejections). */
export const UNMATCHED_ROUTE = 'unmatched';

export function httpMetricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();

  res.on('finish', () => {
    const labels = {
      method: req.method,
      path: routeLabel(req),
      status: String(res.statusCode),
    };
    httpRequestsTotal.inc(labels);
    httpRequestDurationMs.observe(labels, Date.now() - start);
  });

  next();
}

function routeLabel(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return UNMATCHED_ROUTE;
}
