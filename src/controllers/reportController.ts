import type { Request, Response } from 'express';
import type { ServerMode } from '../config/env';
import { AppError } from '../errors';
import { sessionsClosedTotal } from '../infrastructure/metrics';
import type { ReportBroadcaster } from '../services/notification/reportBroadcaster';
import { StreamSession } from '../services/notification/streamSession';
import type { SubscriberRegistry } from '../services/notification/subscriberRegistry';
import type { ReportService } from '../services/report/reportService';
import { createSseResponseSink } from '../utils/sseResponseSink';
import type { SubmitReportBody } from './schemas';

export interface ReportControllerDeps {
  reportService: ReportService;
  broadcaster: ReportBroadcaster;
  subscribers: SubscriberRegistry;
  mode: ServerMode;
  heartbeatMs: number;
}

export function createReportController(deps: ReportControllerDeps) {
  const { reportService, broadcaster, subscribers, mode, heartbeatMs } = deps;

  async function submitReport(req: Request, res: Response): Promise<void> {
    const body: SubmitReportBody = req.body;
    const { report, subscribersNotified, notified } = await reportService.submit(body.content, {
      notify: mode === 'streaming',
    });

    res.status(201).json({
      success: true,
      reportId: report.id,
      filename: report.filename,
      filepath: report.filepath,
      createdAt: report.createdAt.toISOString(),
      notified,
      subscribersNotified,
    });
  }

  function getLatestReport(_req: Request, res: Response): void {
    const latest = broadcaster.current();
    if (!latest) {
      throw AppError.notFound('No report has been published yet');
    }
    res.json({
      generation: latest.generation,
      reportId: latest.value.reportId,
      content: latest.value.content,
    });
  }

  async function streamReports(_req: Request, res: Response): Promise<void> {
    const session = new StreamSession({
      broadcaster,
      sink: createSseResponseSink(res),
      heartbeatMs,
    });
    const reason = await session.run();
    sessionsClosedTotal.inc({ reason });
  }

  function listSubscribers(_req: Request, res: Response): void {
    res.json({
      count: subscribers.count(),
      subscribers: subscribers.list().map((s) => ({
        id: s.id,
        joinedAt: s.joinedAt.toISOString(),
      })),
    });
  }

  return { submitReport, getLatestReport, streamReports, listSubscribers };
}
