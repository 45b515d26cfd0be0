import { type FastifyInstance } from 'fastify';
import { type ConversationService, type MessageService, type ReadReceiptService } from '@parley/domain';
import {
  ArchiveRequestSchema,
  ConversationParamsSchema,
  CreateConversationRequestSchema,
  ListMessagesQuerySchema,
  serializeConversation,
  serializePage,
} from '@parley/proto';
import { authenticated, type createAuthMiddleware } from '../plugins/auth';
import { parseInput } from '../validation';

interface ConversationRouteDeps {
  conversationService: ConversationService;
  messageService: MessageService;
  readReceiptService: ReadReceiptService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function registerConversationRoutes(app: FastifyInstance, deps: ConversationRouteDeps): void {
  const { conversationService, messageService, readReceiptService, authenticate } = deps;

  app.post('/conversations', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const input = parseInput(CreateConversationRequestSchema, request.body, 'Invalid conversation request');
    const conversation = await conversationService.findOrCreate(userId, input.userId);
    return reply.status(200).send({ conversation: serializeConversation(conversation, userId) });
  });

  app.get('/conversations', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const conversations = await conversationService.listForUser(userId);
    return reply.status(200).send({
      conversations: conversations.map((c) => serializeConversation(c, userId)),
    });
  });

  app.post('/conversations/:conversationId/archive', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { conversationId } = parseInput(ConversationParamsSchema, request.params, 'Invalid conversation id');
    const { archived } = parseInput(ArchiveRequestSchema, request.body, 'Invalid archive request');
    const conversation = await conversationService.archiveFor(conversationId, userId, archived);
    return reply.status(200).send({ conversation: serializeConversation(conversation, userId) });
  });

  app.get('/conversations/:conversationId/messages', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { conversationId } = parseInput(ConversationParamsSchema, request.params, 'Invalid conversation id');
    const query = parseInput(ListMessagesQuerySchema, request.query, 'Invalid query');
    await conversationService.get(conversationId, userId);

    const page = await messageService.list(
      { kind: 'conversation', conversationId },
      { limit: query.limit, beforeId: query.before },
    );
    return reply.status(200).send(serializePage(page));
  });

  app.get('/conversations/:conversationId/unread', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { conversationId } = parseInput(ConversationParamsSchema, request.params, 'Invalid conversation id');
    await conversationService.get(conversationId, userId);

    const count = await readReceiptService.unreadCount({ kind: 'conversation', conversationId }, userId);
    return reply.status(200).send({ count });
  });
}
