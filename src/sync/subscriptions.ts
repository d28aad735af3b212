/**
 * Subscription Registry
 *
 * Maps a subject (an absolute mso path like `/volume`, or the reserved
 * `#connection` lifecycle subject) to its observers in registration order.
 * Observers are awaited one after another, so a slow observer delays the
 * ones behind it and the next frame read.
 */

import type { JsonValue } from '../shared/mso-types';
import { logger } from '../utils/logger';

/** Reserved subject fired when the connection becomes ready or is lost */
export const CONNECTION_SUBJECT = '#connection';

export type Subscriber = (value: JsonValue | undefined) => void | Promise<void>;

export class SubscriptionRegistry {
  private subscriptions = new Map<string, Subscriber[]>();

  /**
   * Register a callback for a subject.
   * @returns A function that removes this registration
   */
  subscribe(subject: string, callback: Subscriber): () => void {
    logger.debug(`subscribe: subject=${subject}`);
    const subscribers = this.subscriptions.get(subject) ?? [];
    subscribers.push(callback);
    this.subscriptions.set(subject, subscribers);

    return () => {
      const current = this.subscriptions.get(subject);
      if (!current) return;
      const index = current.indexOf(callback);
      if (index !== -1) current.splice(index, 1);
      if (current.length === 0) this.subscriptions.delete(subject);
    };
  }

  /**
   * Call every subscriber for the subject in order. A subscriber that throws
   * is logged and does not stop the ones after it.
   */
  async notify(subject: string, value?: JsonValue): Promise<void> {
    const subscribers = this.subscriptions.get(subject);
    if (!subscribers || subscribers.length === 0) return;

    logger.debug(`notify: subject=${subject}, subscribers=${subscribers.length}`);
    // Snapshot so a subscriber that unsubscribes mid-notify doesn't shift the list
    for (const subscriber of [...subscribers]) {
      try {
        await subscriber(value);
      } catch (err) {
        logger.error(`notify: subscriber for ${subject} threw`, err);
      }
    }
  }

  subscriberCount(subject: string): number {
    return this.subscriptions.get(subject)?.length ?? 0;
  }
}
