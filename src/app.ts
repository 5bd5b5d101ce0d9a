import express from 'express';
import cors, { type CorsOptions } from 'cors';
import type { ServerMode } from './config/env';
import { renderMetrics } from './infrastructure';
import {
  errorHandler,
  httpMetricsMiddleware,
  notFoundHandler,
  requestIdMiddleware,
} from './middleware';
import { createApiRouter } from './routes/api';
import { createMcpRouter } from './routes/mcp';
import type { ReportBroadcaster } from './services/notification/reportBroadcaster';
import type { SubscriberRegistry } from './services/notification/subscriberRegistry';
import type { ReportService } from './services/report/reportService';
import type { ReportStore } from './services/report/reportStore';
import type { ToolRegistry } from './services/tools/registry';

/** Everything the HTTP layer serves, constructed once at startup. */
export interface AppContext {
  mode: ServerMode;
  store: ReportStore;
  subscribers: SubscriberRegistry;
  broadcaster: ReportBroadcaster;
  reportService: ReportService;
  tools: ToolRegistry;
  heartbeatMs: number;
  corsAllowedOrigins?: string;
}

export function createApp(ctx: AppContext): express.Express {
  const app = express();

  app.use(cors(buildCorsOptions(ctx.corsAllowedOrigins)));
  app.use(requestIdMiddleware);
  app.use(httpMetricsMiddleware);
  app.use(express.json({ limit: '1mb' }));

  app.get('/metrics', (_req, res) => {
    res.type('text/plain; version=0.0.4').send(renderMetrics());
  });
  app.use('/api', createApiRouter(ctx));
  app.use('/mcp', createMcpRouter(ctx.tools));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

function buildCorsOptions(raw: string | undefined): CorsOptions {
  const allowedOrigins = resolveAllowedOrigins(raw);
  const allowAll = allowedOrigins.has('*');

  return {
    origin(origin, callback) {
      if (!origin) {
        callback(null, true);
        return;
      }
      if (allowAll || allowedOrigins.has(origin)) {
        callback(null, true);
        return;
      }
      callback(null, false);
    },
    credentials: !allowAll,
  };
}

function resolveAllowedOrigins(raw: string | undefined): Set<string> {
  if (raw && raw.trim().length) {
    return new Set(
      raw
        .split(',')
        .map((value) => value.trim())
        .filter((value) => value.length > 0),
    );
  }
  return new Set(['*']);
}
