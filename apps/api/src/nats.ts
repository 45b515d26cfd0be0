import { connect, StringCodec, type NatsConnection } from 'nats';
import { RelaySubjects, type RelayFrame, type TopicPublisher } from '@parley/proto';
import { createLogger, errorMessage } from '@parley/shared';

const logger = createLogger({ name: 'api:nats' });
const sc = StringCodec();

let nc: NatsConnection | null = null;

export async function initNats(url: string): Promise<NatsConnection> {
  nc = await connect({ servers: url });
  logger.info({}, 'Connected to NATS');
  return nc;
}

export async function closeNats(): Promise<void> {
  if (nc) {
    await nc.drain();
    nc = null;
    logger.info({}, 'NATS connection closed');
  }
}

/**
 * Publish-only side of the gateway relay: the API has no sockets of its own,
 * so every broadcast goes to NATS for the gateways to deliver.
 */
export class NatsTopicPublisher implements TopicPublisher {
  constructor(
    private readonly conn: Pick<NatsConnection, 'publish'>,
    private readonly origin: string,
  ) {}

  publish(topic: string, event: string, payload: Record<string, unknown>): void {
    const frame: RelayFrame = { origin: this.origin, topic, event, payload };
    try {
      this.conn.publish(RelaySubjects.topic(topic), sc.encode(JSON.stringify(frame)));
    } catch (err) {
      logger.error({ topic, event, err: errorMessage(err) }, 'Failed to publish broadcast');
    }
  }
}

/** Without NATS there is nobody to deliver to. */
export const unrelayedPublisher: TopicPublisher = {
  publish(topic, event) {
    logger.debug({ topic, event }, 'No relay configured, broadcast dropped');
  },
};
