/**
 * StreamSession: one subscriber's connection lifecycle.
 *
 *   connecting ──(connected event written)──▶ streaming ──▶ closed
 *        └───────────────(cancel / write failure)───────────────┘
 *
 * The session owns its subscription: reaching `closed` cancels it exactly
 * once, whichever of cancellation, transport failure or broadcaster shutdown
 * gets there first. A failing transport only ever closes its own session.
 */

import { TransportError } from '../../errors';
import { createLogger } from '../../utils/logger';
import type { NotificationPayload } from '../../types/report';
import type { Subscription } from './latestValueBroadcaster';
import type { ReportBroadcaster } from './reportBroadcaster';
import { HEARTBEAT_FRAME, connectedEvent, formatSseEvent, reportEvent } from './sseEvents';

const logger = createLogger('streamSession');

export const DEFAULT_HEARTBEAT_MS = 30_000;

export type SessionState = 'connecting' | 'streaming' | 'closed';

export type CloseReason = 'cancelled' | 'transport_error' | 'shutdown';

/** The transport end of a session: accepts serialized text, reports closure. */
export interface EventSink {
  write(chunk: string): Promise<void>;
  end(): void;
  onClose(listener: () => void): void;
}

export interface StreamSessionOptions {
  broadcaster: ReportBroadcaster;
  sink: EventSink;
  /** Interval between heartbeat comments; 0 disables them. */
  heartbeatMs?: number;
}

export class StreamSession {
  private state: SessionState = 'connecting';
  private subscription: Subscription<NotificationPayload> | undefined;
  private heartbeat: NodeJS.Timeout | undefined;
  private reason: CloseReason | undefined;
  private readonly broadcaster: ReportBroadcaster;
  private readonly sink: EventSink;
  private readonly heartbeatMs: number;

  constructor(options: StreamSessionOptions) {
    this.broadcaster = options.broadcaster;
    this.sink = options.sink;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
  }

  getState(): SessionState {
    return this.state;
  }

  get subscriberId(): string | undefined {
    return this.subscription?.id;
  }

  get closeReason(): CloseReason | undefined {
    return this.reason;
  }

  /**
   * Join, stream until the session closes, and report why it closed.
   * Never rejects: transport failures resolve with `transport_error`.
   */
  async run(): Promise<CloseReason> {
    if (this.subscription || this.isClosed()) {
      return this.reason ?? 'cancelled';
    }
    if (this.broadcaster.isClosed()) {
      this.close('shutdown');
      return 'shutdown';
    }

    const subscription = this.broadcaster.subscribe();
    this.subscription = subscription;
    this.sink.onClose(() => this.cancel());
    logger.info(
      { subscriberId: subscription.id, subscribers: this.broadcaster.subscriberCount() },
      'Subscriber connected',
    );

    try {
      await this.send(formatSseEvent(connectedEvent(subscription.id)));
      if (this.isClosed()) {
        return this.reason ?? 'cancelled';
      }

      this.state = 'streaming';
      this.startHeartbeat();

      for await (const payload of subscription) {
        await this.send(formatSseEvent(reportEvent(payload)));
      }
      this.close(this.broadcaster.isClosed() ? 'shutdown' : 'cancelled');
    } catch (err) {
      this.fail(err);
    }

    return this.reason ?? 'cancelled';
  }

  /** Idempotent; safe to call from any state. */
  cancel(): void {
    this.close('cancelled');
  }

  private isClosed(): boolean {
    return this.state === 'closed';
  }

  private async send(chunk: string): Promise<void> {
    try {
      await this.sink.write(chunk);
    } catch (err) {
      throw new TransportError(this.subscription?.id ?? 'unknown', err);
    }
  }

  private startHeartbeat(): void {
    if (this.heartbeatMs <= 0) return;
    this.heartbeat = setInterval(() => {
      if (this.isClosed()) return;
      this.send(HEARTBEAT_FRAME).catch((err: unknown) => this.fail(err));
    }, this.heartbeatMs);
    this.heartbeat.unref();
  }

  private fail(err: unknown): void {
    if (this.isClosed()) return;
    const error = err instanceof TransportError ? err : new TransportError(this.subscription?.id ?? 'unknown', err);
    logger.warn({ subscriberId: error.subscriberId, error: error.message }, 'Subscriber transport failed');
    this.close('transport_error');
  }

  private close(reason: CloseReason): void {
    if (this.isClosed()) return;
    this.state = 'closed';
    this.reason = reason;

    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = undefined;
    }
    this.subscription?.cancel();
    this.sink.end();

    logger.info(
      { subscriberId: this.subscription?.id, reason, subscribers: this.broadcaster.subscriberCount() },
      'Subscriber disconnected',
    );
  }
}
