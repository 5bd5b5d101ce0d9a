import { AppError, EmptyContentError } from '../../errors';
import type { NotificationPayload } from '../../types/report';
import { LatestValueBroadcaster } from './latestValueBroadcaster';
import type { SubscriberRegistry } from './subscriberRegistry';

export type ReportBroadcaster = LatestValueBroadcaster<NotificationPayload>;

/** Rejects payloads that would announce nothing. */
export function assertPublishablePayload(payload: NotificationPayload): void {
  if (!payload.content) {
    throw new EmptyContentError();
  }
  if (!payload.reportId) {
    throw AppError.badRequest('reportId is required');
  }
}

export function createReportBroadcaster(registry: SubscriberRegistry): ReportBroadcaster {
  return new LatestValueBroadcaster<NotificationPayload>({
    registry,
    validate: assertPublishablePayload,
  });
}
