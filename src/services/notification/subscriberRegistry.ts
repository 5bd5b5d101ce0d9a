/**
 * SubscriberRegistry: census of the subscribers currently attached to a
 * broadcaster.
 *
 * Entries are added when a subscription is created and removed exactly once
 * when it terminates, so `count()` equals the number of live subscriptions.
 */

export interface Subscriber {
  id: string;
  joinedAt: Date;
}

export class SubscriberRegistry {
  private subscribers = new Map<string, Subscriber>();

  /**
   * @throws {Error} if a subscriber with the same id is already registered
   */
  add(subscriber: Subscriber): void {
    if (this.subscribers.has(subscriber.id)) {
      throw new Error(`SubscriberRegistry: subscriber "${subscriber.id}" is already registered`);
    }
    this.subscribers.set(subscriber.id, subscriber);
  }

  /**
   * @returns true if the subscriber was registered and has been removed
   */
  remove(id: string): boolean {
    return this.subscribers.delete(id);
  }

  has(id: string): boolean {
    return this.subscribers.has(id);
  }

  count(): number {
    return this.subscribers.size;
  }

  /** Snapshot in join order. */
  list(): Subscriber[] {
    return Array.from(this.subscribers.values());
  }
}
