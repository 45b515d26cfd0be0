import { type MessageBroadcastPort, type MessageEventName, type MessageView } from '@parley/domain';
import { topicForTarget } from './topics';
import { serializeMessage } from './serialize';

export interface PublishOptions {
  /** Subscriber that must not receive the push, typically the sender. */
  exceptSubscriberId?: string;
}

/** Anything that fans a push out to the subscribers of a topic. */
export interface TopicPublisher {
  publish(topic: string, event: string, payload: Record<string, unknown>, opts?: PublishOptions): void;
}

/** Sends committed message changes to the topic of the message's channel or conversation. */
export class MessageEventPublisher implements MessageBroadcastPort {
  constructor(private readonly topics: TopicPublisher) {}

  publish(event: MessageEventName, message: MessageView): void {
    this.topics.publish(topicForTarget(message.target), event, serializeMessage(message));
  }
}
