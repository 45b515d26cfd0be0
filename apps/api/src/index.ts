import {
  loadConfig,
  ApiConfigSchema,
  createLogger,
  errorMessage,
  SnowflakeGenerator,
  OpaqueTokenService,
  Argon2PasswordHasher,
  InMemoryMessageRateLimiter,
  generateInviteCode,
} from '@parley/shared';
import { createServices } from '@parley/domain';
import { MessageEventPublisher } from '@parley/proto';
import { initPool, closePool, createPgRepositories } from '@parley/db';
import { buildServer } from './server';
import { initNats, closeNats, NatsTopicPublisher, unrelayedPublisher } from './nats';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);
  const idGen = new SnowflakeGenerator(config.NODE_ID);

  initPool({ connectionString: config.DATABASE_URL });

  const publisher = config.NATS_URL
    ? new NatsTopicPublisher(await initNats(config.NATS_URL), `api-${config.NODE_ID}-${idGen.generate()}`)
    : unrelayedPublisher;

  const services = createServices(createPgRepositories(), {
    generateId: () => idGen.generate(),
    generateInviteCode: () => generateInviteCode(),
    tokenService: new OpaqueTokenService(),
    passwordHasher: new Argon2PasswordHasher(),
    broadcaster: new MessageEventPublisher(publisher),
    rateLimiter: new InMemoryMessageRateLimiter(),
    accessTokenTtlSeconds: config.ACCESS_TOKEN_TTL_SECONDS,
    refreshTokenTtlSeconds: config.REFRESH_TOKEN_TTL_SECONDS,
    logger: createLogger({ name: 'api:domain' }),
  });

  const app = await buildServer({ services });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
    await closeNats();
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
  logger.fatal({ err: errorMessage(err) }, 'Failed to start API');
  process.exit(1);
});
