import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode } from '@parley/shared';
import {
  canManageChannel,
  type MembershipService,
  type MessageService,
  type ReadReceiptService,
} from '@parley/domain';
import {
  ArchiveRequestSchema,
  ChannelParamsSchema,
  CreateChannelRequestSchema,
  InviteCodeParamsSchema,
  JoinChannelRequestSchema,
  ListMessagesQuerySchema,
  MemberParamsSchema,
  UpdateChannelRequestSchema,
  UpdateMemberRoleRequestSchema,
  serializeChannel,
  serializeMembership,
  serializePage,
} from '@parley/proto';
import { authenticated, type createAuthMiddleware } from '../plugins/auth';
import { parseInput } from '../validation';

interface ChannelRouteDeps {
  membershipService: MembershipService;
  messageService: MessageService;
  readReceiptService: ReadReceiptService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function registerChannelRoutes(app: FastifyInstance, deps: ChannelRouteDeps): void {
  const { membershipService, messageService, readReceiptService, authenticate } = deps;

  async function requireAccess(channelId: string, userId: string): Promise<void> {
    if (!(await membershipService.canAccessChannel(channelId, userId))) {
      throw new AppError(ErrorCode.FORBIDDEN, 'Cannot access this channel');
    }
  }

  app.get('/channels', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const [publicChannels, joined] = await Promise.all([
      membershipService.listPublicChannels(),
      membershipService.listUserChannels(userId),
    ]);
    return reply.status(200).send({
      channels: publicChannels.map((ch) => serializeChannel(ch)),
      joined: joined.map((ch) => serializeChannel(ch)),
    });
  });

  app.post('/channels', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const input = parseInput(CreateChannelRequestSchema, request.body, 'Invalid channel data');
    const channel = await membershipService.createChannel(userId, input);
    return reply.status(201).send({ channel: serializeChannel(channel, { includeInviteCode: true }) });
  });

  app.get('/channels/:channelId', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    const { channel, membership } = await membershipService.getChannel(channelId, userId);
    return reply.status(200).send({
      channel: serializeChannel(channel, { includeInviteCode: canManageChannel(membership?.role ?? null) }),
      membership: membership ? serializeMembership(membership) : null,
    });
  });

  app.put('/channels/:channelId', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    const input = parseInput(UpdateChannelRequestSchema, request.body, 'Invalid channel data');
    const channel = await membershipService.updateChannel(userId, channelId, input);
    return reply.status(200).send({ channel: serializeChannel(channel, { includeInviteCode: true }) });
  });

  // Channels are archived, never dropped, so their history stays readable.
  app.delete('/channels/:channelId', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    await membershipService.archiveChannel(userId, channelId, true);
    return reply.status(204).send();
  });

  app.post('/channels/join/:inviteCode', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { inviteCode } = parseInput(InviteCodeParamsSchema, request.params, 'Invalid invite code');
    const membership = await membershipService.joinByInvite(inviteCode, userId);
    return reply.status(201).send({ membership: serializeMembership(membership) });
  });

  app.post('/channels/:channelId/join', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    const { inviteCode } = parseInput(JoinChannelRequestSchema, request.body ?? {}, 'Invalid join request');
    const membership = await membershipService.join(channelId, userId, { inviteCode });
    return reply.status(201).send({ membership: serializeMembership(membership) });
  });

  app.delete('/channels/:channelId/members/me', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    await membershipService.leave(channelId, userId);
    return reply.status(204).send();
  });

  app.get('/channels/:channelId/members', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    const members = await membershipService.listMembers(channelId, userId);
    return reply.status(200).send({ members: members.map(serializeMembership) });
  });

  app.put('/channels/:channelId/members/:userId', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const params = parseInput(MemberParamsSchema, request.params, 'Invalid member');
    const { role } = parseInput(UpdateMemberRoleRequestSchema, request.body, 'Invalid role');
    const membership = await membershipService.updateMemberRole(userId, params.channelId, params.userId, role);
    return reply.status(200).send({ membership: serializeMembership(membership) });
  });

  app.post('/channels/:channelId/archive', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    const { archived } = parseInput(ArchiveRequestSchema, request.body, 'Invalid archive request');
    const channel = await membershipService.archiveChannel(userId, channelId, archived);
    return reply.status(200).send({ channel: serializeChannel(channel) });
  });

  app.post('/channels/:channelId/invite-code', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    const channel = await membershipService.regenerateInviteCode(userId, channelId);
    return reply.status(200).send({ channel: serializeChannel(channel, { includeInviteCode: true }) });
  });

  app.get('/channels/:channelId/messages', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    const query = parseInput(ListMessagesQuerySchema, request.query, 'Invalid query');
    await requireAccess(channelId, userId);

    const page = await messageService.list({ kind: 'channel', channelId }, { limit: query.limit, beforeId: query.before });
    return reply.status(200).send(serializePage(page));
  });

  app.get('/channels/:channelId/unread', { preHandler: [authenticate] }, async (request, reply) => {
    const { userId } = authenticated(request);
    const { channelId } = parseInput(ChannelParamsSchema, request.params, 'Invalid channel id');
    await requireAccess(channelId, userId);

    const count = await readReceiptService.unreadCount({ kind: 'channel', channelId }, userId);
    return reply.status(200).send({ count });
  });
}
