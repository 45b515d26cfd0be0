import { type FastifyInstance } from 'fastify';
import { type UserService } from '@parley/domain';
import { ListUsersQuerySchema, SearchUsersQuerySchema, serializeUserSummary } from '@parley/proto';
import { type createAuthMiddleware } from '../plugins/auth';
import { parseInput } from '../validation';

interface UserRouteDeps {
  userService: UserService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function registerUserRoutes(app: FastifyInstance, deps: UserRouteDeps): void {
  const { userService, authenticate } = deps;

  app.get('/users', { preHandler: [authenticate] }, async (request, reply) => {
    const { limit, offset } = parseInput(ListUsersQuerySchema, request.query, 'Invalid query');
    const users = await userService.list({ limit, offset });
    return reply.status(200).send({ users: users.map(serializeUserSummary) });
  });

  app.get('/users/search', { preHandler: [authenticate] }, async (request, reply) => {
    const { q, limit } = parseInput(SearchUsersQuerySchema, request.query, 'Invalid search');
    const users = await userService.search(q, limit);
    return reply.status(200).send({ users: users.map(serializeUserSummary) });
  });
}
