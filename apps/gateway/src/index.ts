import {
  loadConfig,
  GatewayConfigSchema,
  createLogger,
  errorMessage,
  SnowflakeGenerator,
  OpaqueTokenService,
  Argon2PasswordHasher,
  InMemoryMessageRateLimiter,
  WindowRateLimiter,
  generateInviteCode,
} from '@parley/shared';
import { MessageEventPublisher, type TopicPublisher } from '@parley/proto';
import { createServices } from '@parley/domain';
import { initPool, closePool, createPgRepositories } from '@parley/db';
import { createGateway } from './server';
import { BroadcastRouter } from './broadcast-router';
import { PresenceTracker } from './presence-tracker';
import { NatsBroadcastRelay, connectNats } from './nats';

const logger = createLogger({ name: 'gateway' });

async function main() {
  const config = loadConfig(GatewayConfigSchema);
  const idGen = new SnowflakeGenerator(config.NODE_ID);

  initPool({ connectionString: config.DATABASE_URL });

  const router = new BroadcastRouter();
  let relay: NatsBroadcastRelay | null = null;
  if (config.NATS_URL) {
    const nc = await connectNats(config.NATS_URL);
    relay = new NatsBroadcastRelay(nc, router, `gateway-${config.NODE_ID}-${idGen.generate()}`);
    relay.start();
  }
  const publisher: TopicPublisher = relay ?? router;

  const services = createServices(createPgRepositories(), {
    generateId: () => idGen.generate(),
    generateInviteCode: () => generateInviteCode(),
    tokenService: new OpaqueTokenService(),
    passwordHasher: new Argon2PasswordHasher(),
    broadcaster: new MessageEventPublisher(publisher),
    rateLimiter: new InMemoryMessageRateLimiter(),
    accessTokenTtlSeconds: config.ACCESS_TOKEN_TTL_SECONDS,
    refreshTokenTtlSeconds: config.REFRESH_TOKEN_TTL_SECONDS,
    logger: createLogger({ name: 'gateway:domain' }),
  });

  const presence = new PresenceTracker();
  presence.start();

  const rateLimiter = new WindowRateLimiter(config.RATE_LIMIT_PER_SECOND, 1000);
  const prune = setInterval(() => rateLimiter.prune(), 60_000);

  const { start, stop } = createGateway({
    port: config.GATEWAY_PORT,
    host: config.GATEWAY_HOST,
    maxPayloadBytes: config.MAX_PAYLOAD_BYTES,
    idGen,
    tokens: services.tokens,
    connectionDeps: {
      services,
      presence,
      router,
      publisher,
      rateLimiter,
      backlogSize: config.BACKLOG_SIZE,
      loadMoreSize: config.LOAD_MORE_SIZE,
      logger: createLogger({ name: 'gateway:session' }),
    },
  });

  start();

  const shutdown = async () => {
    logger.info({}, 'Shutting down gateway');
    clearInterval(prune);
    await stop();
    presence.stop();
    await relay?.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.fatal({ err: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err: unknown) => {
  logger.fatal({ err: errorMessage(err) }, 'Failed to start gateway');
  process.exit(1);
});
