import { createLogger, errorMessage, type SafeLogger } from '@parley/shared';
import { pushFrame, type PublishOptions, type PushFrame, type TopicPublisher } from '@parley/proto';

export interface Subscriber {
  id: string;
  push(frame: PushFrame): void;
}

/**
 * In-process fan-out. Publishing delivers synchronously to the subscribers
 * present at that moment, so each topic sees pushes in publish order.
 */
export class BroadcastRouter implements TopicPublisher {
  private readonly topics = new Map<string, Map<string, Subscriber>>();

  constructor(private readonly logger: SafeLogger = createLogger({ name: 'gateway:router' })) {}

  subscribe(topic: string, subscriber: Subscriber): void {
    let subscribers = this.topics.get(topic);
    if (!subscribers) {
      subscribers = new Map();
      this.topics.set(topic, subscribers);
    }
    subscribers.set(subscriber.id, subscriber);
  }

  unsubscribe(topic: string, subscriberId: string): void {
    const subscribers = this.topics.get(topic);
    if (!subscribers) return;
    subscribers.delete(subscriberId);
    if (subscribers.size === 0) this.topics.delete(topic);
  }

  publish(topic: string, event: string, payload: Record<string, unknown>, opts: PublishOptions = {}): void {
    const subscribers = this.topics.get(topic);
    if (!subscribers) return;

    const frame = pushFrame(topic, event, payload);
    for (const subscriber of [...subscribers.values()]) {
      if (subscriber.id === opts.exceptSubscriberId) continue;
      try {
        subscriber.push(frame);
      } catch (err) {
        this.logger.debug({ topic, event, subscriberId: subscriber.id, err: errorMessage(err) }, 'Push failed');
      }
    }
  }

  subscriberCount(topic: string): number {
    return this.topics.get(topic)?.size ?? 0;
  }
}
