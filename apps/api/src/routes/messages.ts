import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@parley/shared';
import {
  type ConversationService,
  type MembershipService,
  type MessageService,
  type MessageTarget,
} from '@parley/domain';
import { SearchMessagesQuerySchema, serializePage } from '@parley/proto';
import { authenticated, type createAuthMiddleware } from '../plugins/auth';
import { parseInput } from '../validation';

interface MessageRouteDeps {
  membershipService: MembershipService;
  conversationService: ConversationService;
  messageService: MessageService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function registerMessageRoutes(app: FastifyInstance, deps: MessageRouteDeps): void {
  const { membershipService, conversationService, messageService, authenticate } = deps;

  async function requireTarget(target: MessageTarget, userId: string): Promise<void> {
    const allowed =
      target.kind === 'channel'
        ? await membershipService.canAccessChannel(target.channelId, userId)
        : await conversationService.canAccessConversation(target.conversationId, userId);
    if (!allowed) {
      throw new AppError(ErrorCode.FORBIDDEN, 'Cannot search this history');
    }
  }

  app.get('/messages/search', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const query = parseInput(SearchMessagesQuerySchema, request.query, 'Invalid search');

    let target: MessageTarget | undefined;
    if (query.channelId) target = { kind: 'channel', channelId: query.channelId };
    else if (query.conversationId) target = { kind: 'conversation', conversationId: query.conversationId };
    if (target) await requireTarget(target, userId);

    const page = await messageService.search(userId, {
      query: query.q,
      target,
      authorId: query.userId,
      beforeId: query.before,
      limit: query.limit,
    });
    return reply.status(200).send(serializePage(page));
  });
}
