/**
 * Report domain types.
 */

/** A persisted report. Immutable once stored. */
export interface Report {
  /** File stem, e.g. `weekly_report_20240330_101500`. */
  id: string;
  filename: string;
  filepath: string;
  content: string;
  createdAt: Date;
}

/** The value carried by the broadcaster: what subscribers are told about. */
export interface NotificationPayload {
  reportId: string;
  content: string;
}

/** Events written to a subscriber's stream. */
export type StreamEvent =
  | { eventType: 'connected'; subscriberId: string; message: string }
  | { eventType: 'report'; reportId: string; content: string };

export type PublishReportResult =
  | {
      success: true;
      reportId: string;
      filename: string;
      filepath: string;
      subscribersNotified: number;
    }
  | {
      success: false;
      error: string;
      code: string;
    };
