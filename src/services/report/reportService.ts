/**
 * Report Service
 *
 * Entry point for report submissions: persist through the ReportStore, then
 * (in streaming mode) publish the new report to live subscribers.
 */

import { AppError, EmptyContentError, StorageError } from '../../errors';
import { createLogger } from '../../utils/logger';
import {
  reportsPublishedTotal,
  reportsSavedTotal,
  subscribersWokenTotal,
} from '../../infrastructure/metrics';
import type { PublishReportResult, Report } from '../../types/report';
import type { ReportBroadcaster } from '../notification/reportBroadcaster';
import type { ReportStore } from './reportStore';

const logger = createLogger('reportService');

export interface SubmittedReport {
  report: Report;
  /** Subscribers connected when the report was published; 0 when not notifying. */
  subscribersNotified: number;
  notified: boolean;
}

export interface SubmitOptions {
  notify: boolean;
}

export class ReportService {
  constructor(
    private readonly store: ReportStore,
    private readonly broadcaster: ReportBroadcaster,
  ) {}

  /**
   * Save a report and optionally announce it. Throws EmptyContentError or
   * StorageError; an empty submission never reaches the broadcaster.
   */
  async submit(content: string | null | undefined, options: SubmitOptions): Promise<SubmittedReport> {
    let report: Report;
    try {
      report = await this.store.save(content);
      reportsSavedTotal.inc({ outcome: 'saved' });
    } catch (err) {
      reportsSavedTotal.inc({ outcome: AppError.isAppError(err) && err.code ? err.code.toLowerCase() : 'error' });
      throw err;
    }

    if (!options.notify) {
      return { report, subscribersNotified: 0, notified: false };
    }

    const subscribersNotified = this.broadcaster.subscriberCount();
    const woken = this.broadcaster.publish({ reportId: report.id, content: report.content });
    reportsPublishedTotal.inc();
    subscribersWokenTotal.inc({}, woken);

    logger.info(
      { reportId: report.id, subscribersNotified, woken },
      `Notified ${subscribersNotified} connected clients about new report`,
    );
    return { report, subscribersNotified, notified: true };
  }

  /** Save and notify, reporting failure as data instead of throwing. */
  async publishReport(content: string | null | undefined): Promise<PublishReportResult> {
    return this.toResult(this.submit(content, { notify: true }));
  }

  /** Save without notifying anyone (plain mode). */
  async writeReport(content: string | null | undefined): Promise<PublishReportResult> {
    return this.toResult(this.submit(content, { notify: false }));
  }

  subscriberCount(): number {
    return this.broadcaster.subscriberCount();
  }

  private async toResult(pending: Promise<SubmittedReport>): Promise<PublishReportResult> {
    try {
      const { report, subscribersNotified } = await pending;
      return {
        success: true,
        reportId: report.id,
        filename: report.filename,
        filepath: report.filepath,
        subscribersNotified,
      };
    } catch (err) {
      if (err instanceof EmptyContentError || err instanceof StorageError) {
        return { success: false, error: err.message, code: err.code ?? 'ERROR' };
      }
      throw err;
    }
  }
}
