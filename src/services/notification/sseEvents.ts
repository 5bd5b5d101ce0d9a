/**
 * Server-Sent Events framing.
 *
 * Events are sent as unnamed `data:` frames so a browser `EventSource`
 * receives them through `onmessage`; the `eventType` field inside the JSON
 * tells them apart.
 */

import type { NotificationPayload, StreamEvent } from '../../types/report';

export const CONNECTED_MESSAGE = 'Connected to Weekly Report SSE';

export const HEARTBEAT_FRAME = ': heartbeat\n\n';

export function formatSseEvent(event: StreamEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

export function connectedEvent(subscriberId: string): StreamEvent {
  return { eventType: 'connected', subscriberId, message: CONNECTED_MESSAGE };
}

export function reportEvent(payload: NotificationPayload): StreamEvent {
  return { eventType: 'report', reportId: payload.reportId, content: payload.content };
}
