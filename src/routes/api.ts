import express, { type Request, type Response } from 'express';
import { createReportController } from '../controllers/reportController';
import { createToolController } from '../controllers/toolController';
import { submitReportBody, toolNameParams } from '../controllers/schemas';
import { getHealthStatus } from '../infrastructure';
import { asyncHandler, validateBody, validateParams } from '../middleware';
import type { AppContext } from '../app';

export function createApiRouter(ctx: AppContext): express.Router {
  const router = express.Router();
  const reports = createReportController({
    reportService: ctx.reportService,
    broadcaster: ctx.broadcaster,
    subscribers: ctx.subscribers,
    mode: ctx.mode,
    heartbeatMs: ctx.heartbeatMs,
  });
  const tools = createToolController(ctx.tools);

  router.get('/health', asyncHandler(async (_req: Request, res: Response) => {
    const health = await getHealthStatus({
      reportsDir: ctx.store.dir,
      subscriberCount: () => ctx.subscribers.count(),
      isBroadcasterClosed: () => ctx.broadcaster.isClosed(),
    });
    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  }));

  // Reports
  router.post('/reports', validateBody(submitReportBody), asyncHandler(reports.submitReport));
  router.get('/reports/latest', reports.getLatestReport);

  // Live stream + census exist only when the server notifies subscribers
  if (ctx.mode === 'streaming') {
    router.get('/reports/stream', asyncHandler(reports.streamReports));
    router.get('/subscribers', reports.listSubscribers);
  }

  // Tools
  router.get('/tools', tools.listTools);
  router.post('/tools/:name', validateParams(toolNameParams), asyncHandler(tools.invokeTool));

  return router;
}
