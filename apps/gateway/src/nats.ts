import { connect, StringCodec, type NatsConnection } from 'nats';
import {
  RelayFrameSchema,
  RelaySubjects,
  type PublishOptions,
  type RelayFrame,
  type TopicPublisher,
} from '@parley/proto';
import { createLogger, errorMessage, type SafeLogger } from '@parley/shared';

const sc = StringCodec();

export interface RelayMessage {
  data: Uint8Array;
}

export interface RelaySubscription extends AsyncIterable<RelayMessage> {
  unsubscribe(): void;
}

/** The slice of a NATS connection the relay needs. */
export interface RelayConnection {
  publish(subject: string, data: Uint8Array): void;
  subscribe(subject: string): RelaySubscription;
  drain(): Promise<void>;
}

export async function connectNats(url: string): Promise<NatsConnection> {
  return connect({ servers: url });
}

/**
 * Topic fan-out across gateway processes. Publishing delivers to local
 * subscribers right away and forwards the frame over NATS; frames coming
 * back from NATS with this relay's own origin are skipped.
 */
export class NatsBroadcastRelay implements TopicPublisher {
  private subscription: RelaySubscription | null = null;
  private pump: Promise<void> | null = null;

  constructor(
    private readonly nc: RelayConnection,
    private readonly local: TopicPublisher,
    readonly origin: string,
    private readonly logger: SafeLogger = createLogger({ name: 'gateway:nats' }),
  ) {}

  publish(topic: string, event: string, payload: Record<string, unknown>, opts: PublishOptions = {}): void {
    this.local.publish(topic, event, payload, opts);

    const frame: RelayFrame = { origin: this.origin, topic, event, payload };
    try {
      this.nc.publish(RelaySubjects.topic(topic), sc.encode(JSON.stringify(frame)));
    } catch (err) {
      this.logger.error({ topic, event, err: errorMessage(err) }, 'Relay publish failed');
    }
  }

  start(): void {
    if (this.subscription) return;
    const sub = this.nc.subscribe(RelaySubjects.allTopics);
    this.subscription = sub;

    this.pump = (async () => {
      for await (const msg of sub) {
        this.deliver(msg.data);
      }
    })().catch((err: unknown) => {
      this.logger.error({ err: errorMessage(err) }, 'Relay subscription failed');
    });

    this.logger.info({ subject: RelaySubjects.allTopics, origin: this.origin }, 'Relaying topics over NATS');
  }

  async close(): Promise<void> {
    this.subscription?.unsubscribe();
    this.subscription = null;
    await this.pump;
    this.pump = null;
    await this.nc.drain();
  }

  private deliver(data: Uint8Array): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(sc.decode(data));
    } catch {
      this.logger.warn({}, 'Dropping undecodable relay frame');
      return;
    }

    const result = RelayFrameSchema.safeParse(decoded);
    if (!result.success) {
      this.logger.warn({}, 'Dropping malformed relay frame');
      return;
    }

    const frame = result.data;
    if (frame.origin === this.origin) return;
    this.local.publish(frame.topic, frame.event, frame.payload);
  }
}
