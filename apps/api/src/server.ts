import Fastify from 'fastify';
import { createLogger } from '@parley/shared';
import { type Services } from '@parley/domain';
import { registerErrorHandler } from './plugins/error-handler';
import { createAuthMiddleware } from './plugins/auth';
import { createRateLimiter } from './plugins/rate-limit';
import { registerAuthRoutes } from './routes/auth';
import { registerChannelRoutes } from './routes/channels';
import { registerConversationRoutes } from './routes/conversations';
import { registerMessageRoutes } from './routes/messages';
import { registerUserRoutes } from './routes/users';

const logger = createLogger({ name: 'api' });

export interface ServerOptions {
  services: Services;
  authRateLimit?: { windowMs: number; maxRequests: number };
}

export async function buildServer(options: ServerOptions) {
  const { services } = options;

  const app = Fastify({
    logger: false,
    bodyLimit: 1_048_576,
  });

  registerErrorHandler(app);

  const authenticate = createAuthMiddleware(services.tokens);
  const authRateLimit = createRateLimiter(options.authRateLimit ?? { windowMs: 60_000, maxRequests: 20 });

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerAuthRoutes(app, { authService: services.auth, authenticate, authRateLimit });
  registerChannelRoutes(app, {
    membershipService: services.membership,
    messageService: services.messages,
    readReceiptService: services.receipts,
    authenticate,
  });
  registerConversationRoutes(app, {
    conversationService: services.conversations,
    messageService: services.messages,
    readReceiptService: services.receipts,
    authenticate,
  });
  registerMessageRoutes(app, {
    membershipService: services.membership,
    conversationService: services.conversations,
    messageService: services.messages,
    authenticate,
  });
  registerUserRoutes(app, { userService: services.users, authenticate });

  app.addHook('onRequest', (request, _reply, done) => {
    logger.info({ method: request.method, url: request.url, requestId: request.id }, 'Incoming request');
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, requestId: request.id },
      'Request completed',
    );
    done();
  });

  return app;
}
