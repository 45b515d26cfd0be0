import { type FastifyInstance, type FastifyRequest } from 'fastify';
import { type AuthService, type DeviceContext, type TokenPair } from '@parley/domain';
import {
  RegisterRequestSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  LogoutRequestSchema,
  serializeCurrentUser,
} from '@parley/proto';
import { authenticated, type createAuthMiddleware } from '../plugins/auth';
import { type createRateLimiter } from '../plugins/rate-limit';
import { parseInput } from '../validation';

interface AuthRouteDeps {
  authService: AuthService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
  authRateLimit: ReturnType<typeof createRateLimiter>;
}

function deviceContext(request: FastifyRequest): DeviceContext {
  return {
    ipAddress: request.ip,
    deviceInfo: { userAgent: request.headers['user-agent'] ?? null },
  };
}

function serializeTokens(pair: TokenPair) {
  return {
    accessToken: pair.accessToken,
    refreshToken: pair.refreshToken,
    accessTokenExpiresAt: pair.accessTokenExpiresAt.toISOString(),
    refreshTokenExpiresAt: pair.refreshTokenExpiresAt.toISOString(),
  };
}

export function registerAuthRoutes(app: FastifyInstance, deps: AuthRouteDeps): void {
  const { authService, authenticate, authRateLimit } = deps;

  app.post('/auth/register', { preHandler: [authRateLimit] }, async (request, reply) => {
    const input = parseInput(RegisterRequestSchema, request.body, 'Invalid registration data');
    const result = await authService.register(input, deviceContext(request));
    return reply.status(201).send({ ...serializeTokens(result), user: serializeCurrentUser(result.user) });
  });

  app.post('/auth/login', { preHandler: [authRateLimit] }, async (request, reply) => {
    const input = parseInput(LoginRequestSchema, request.body, 'Invalid login data');
    const result = await authService.login(input, deviceContext(request));
    return reply.status(200).send({ ...serializeTokens(result), user: serializeCurrentUser(result.user) });
  });

  app.post('/auth/refresh', { preHandler: [authRateLimit] }, async (request, reply) => {
    const { refreshToken } = parseInput(RefreshRequestSchema, request.body, 'Invalid refresh request');
    const result = await authService.refresh(refreshToken, deviceContext(request));
    return reply.status(200).send(serializeTokens(result));
  });

  app.post('/auth/logout', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId, accessToken } = authenticated(request);
    const { refreshToken } = parseInput(LogoutRequestSchema, request.body ?? {}, 'Invalid logout request');
    await authService.logout(userId, accessToken, refreshToken);
    return reply.status(204).send();
  });

  app.post('/auth/logout-all', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    await authService.logoutAll(userId);
    return reply.status(204).send();
  });

  app.get('/auth/me', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const user = await authService.getMe(userId);
    return reply.status(200).send(serializeCurrentUser(user));
  });
}
