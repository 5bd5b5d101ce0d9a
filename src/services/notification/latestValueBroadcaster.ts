/**
 * LatestValueBroadcaster: single-slot, multi-reader notification primitive.
 *
 * Holds exactly one latest value stamped with a generation number. `publish`
 * replaces it and wakes every parked subscription; each subscription then
 * re-reads the slot and yields the value if its generation is newer than the
 * last one it delivered. Publishes that land between two reads collapse into
 * the most recent one: subscribers learn "state is now X", not "N events
 * happened".
 *
 * Every method runs to completion on the event loop, which stands in for the
 * monitor lock: the compare-then-park step in `Subscription.next` cannot
 * interleave with `publish`, so a wakeup is never lost.
 */

import { randomUUID } from 'crypto';
import { AppError } from '../../errors';
import { createLogger } from '../../utils/logger';
import type { Subscriber, SubscriberRegistry } from './subscriberRegistry';

const logger = createLogger('latestValueBroadcaster');

export interface Stamped<T> {
  generation: number;
  value: T;
}

export interface BroadcasterOptions<T> {
  registry: SubscriberRegistry;
  /** Runs before any state changes; throwing rejects the publish. */
  validate?: (value: T) => void;
  idFactory?: () => string;
  clock?: () => Date;
}

/** What a subscription needs from its broadcaster. */
interface SubscriptionChannel<T> {
  current(): Stamped<T> | undefined;
  isClosed(): boolean;
  park(subscription: Subscription<T>): void;
  release(subscription: Subscription<T>): void;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export class LatestValueBroadcaster<T> {
  private latest: Stamped<T> | undefined;
  private generation = 0;
  private closed = false;
  private readonly waiters = new Set<Subscription<T>>();
  private readonly registry: SubscriberRegistry;
  private readonly validate?: (value: T) => void;
  private readonly idFactory: () => string;
  private readonly clock: () => Date;

  private readonly channel: SubscriptionChannel<T> = {
    current: () => this.latest,
    isClosed: () => this.closed,
    park: (subscription) => {
      this.waiters.add(subscription);
    },
    release: (subscription) => {
      this.waiters.delete(subscription);
      this.registry.remove(subscription.id);
    },
  };

  constructor(options: BroadcasterOptions<T>) {
    this.registry = options.registry;
    this.validate = options.validate;
    this.idFactory = options.idFactory ?? randomUUID;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Replace the latest value and wake every parked subscription.
   * Never waits on subscribers.
   *
   * @returns the number of subscriptions woken
   */
  publish(value: T): number {
    if (this.closed) {
      throw AppError.unavailable('Broadcaster is closed');
    }
    this.validate?.(value);

    this.generation += 1;
    this.latest = { generation: this.generation, value };

    const woken = Array.from(this.waiters);
    this.waiters.clear();
    for (const subscription of woken) {
      subscription.wake();
    }

    logger.debug({ generation: this.generation, woken: woken.length }, 'Published latest value');
    return woken.length;
  }

  /**
   * Register a new subscriber. If a value already exists, the subscription's
   * first element is that value, delivered without waiting for a publish.
   */
  subscribe(): Subscription<T> {
    if (this.closed) {
      throw AppError.unavailable('Broadcaster is closed');
    }
    const subscriber: Subscriber = { id: this.idFactory(), joinedAt: this.clock() };
    this.registry.add(subscriber);
    return new Subscription(this.channel, subscriber);
  }

  current(): Stamped<T> | undefined {
    return this.latest;
  }

  generationCount(): number {
    return this.generation;
  }

  /** Subscriptions currently parked waiting for a newer generation. */
  waitingCount(): number {
    return this.waiters.size;
  }

  subscriberCount(): number {
    return this.registry.count();
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stop accepting publishes and subscribers. Parked subscriptions wake,
   * unregister and end their iteration.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const parked = Array.from(this.waiters);
    this.waiters.clear();
    for (const subscription of parked) {
      subscription.wake();
    }
    logger.info({ woken: parked.length }, 'Broadcaster closed');
  }
}

/**
 * One subscriber's view of the broadcaster: an unbounded async iterable of
 * values, one per newer generation observed. Single consumer.
 */
export class Subscription<T> implements AsyncIterableIterator<T> {
  readonly id: string;
  readonly joinedAt: Date;
  private lastSeenGeneration = 0;
  private resume: (() => void) | undefined;
  private cancelled = false;

  constructor(
    private readonly channel: SubscriptionChannel<T>,
    subscriber: Subscriber,
  ) {
    this.id = subscriber.id;
    this.joinedAt = subscriber.joinedAt;
  }

  get lastSeen(): number {
    return this.lastSeenGeneration;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    for (;;) {
      if (this.cancelled) return DONE;
      if (this.channel.isClosed()) {
        this.cancel();
        return DONE;
      }

      const latest = this.channel.current();
      if (latest && latest.generation > this.lastSeenGeneration) {
        this.lastSeenGeneration = latest.generation;
        return { done: false, value: latest.value };
      }

      await new Promise<void>((resolve) => {
        this.resume = resolve;
        this.channel.park(this);
      });
    }
  }

  /** @internal Resolves the pending wait, if any. */
  wake(): void {
    const resume = this.resume;
    this.resume = undefined;
    resume?.();
  }

  /**
   * Unregister and end the iteration. Only this subscription's own wait is
   * released; other subscribers are not touched.
   *
   * @returns false if the subscription was already cancelled
   */
  cancel(): boolean {
    if (this.cancelled) return false;
    this.cancelled = true;
    this.channel.release(this);
    this.wake();
    return true;
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    this.cancel();
    return DONE;
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}
