import {
  type Channel,
  type ChannelMembership,
  type DirectConversation,
  type MessagePage,
  type MessageView,
  type User,
  type UserSummary,
  displayName,
  isArchivedFor,
  otherParticipant,
  sideOf,
} from '@parley/domain';
import { type MessagePayload, type UserPayload } from './events';

export function serializeUserSummary(user: UserSummary): UserPayload {
  return {
    id: user.id,
    username: user.username,
    displayName: user.displayName,
    avatarUrl: user.avatarUrl,
  };
}

export function serializeMessage(message: MessageView): MessagePayload {
  return {
    id: message.id,
    kind: message.kind,
    channelId: message.target.kind === 'channel' ? message.target.channelId : null,
    directConversationId:
      message.target.kind === 'conversation' ? message.target.conversationId : null,
    content: message.content,
    messageType: message.type,
    parentMessageId: message.parentMessageId,
    editedAt: message.editedAt?.toISOString() ?? null,
    isDeleted: message.isDeleted,
    metadata: message.metadata,
    attachments: message.attachments,
    createdAt: message.createdAt.toISOString(),
    updatedAt: message.updatedAt.toISOString(),
    author: message.author ? serializeUserSummary(message.author) : null,
    replyCount: message.replyCount,
  };
}

export function serializeMessages(messages: MessageView[]): MessagePayload[] {
  return messages.map(serializeMessage);
}

export function serializePage(page: MessagePage) {
  return {
    messages: serializeMessages(page.messages),
    hasMore: page.hasMore,
    nextCursor: page.nextCursor,
    prevCursor: page.prevCursor,
  };
}

/** The caller's own account; the only payload that carries the email. */
export function serializeCurrentUser(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    displayName: displayName(user),
    avatarUrl: user.avatarUrl,
    status: user.status,
    createdAt: user.createdAt.toISOString(),
  };
}

/** Invite codes are shown only to callers allowed to share them. */
export function serializeChannel(channel: Channel, opts: { includeInviteCode?: boolean } = {}) {
  return {
    id: channel.id,
    name: channel.name,
    description: channel.description,
    topic: channel.topic,
    isPrivate: channel.isPrivate,
    isArchived: channel.isArchived,
    createdBy: channel.createdBy,
    maxMembers: channel.maxMembers,
    inviteCode: opts.includeInviteCode ? channel.inviteCode : null,
    createdAt: channel.createdAt.toISOString(),
  };
}

export function serializeMembership(membership: ChannelMembership) {
  return {
    channelId: membership.channelId,
    userId: membership.userId,
    role: membership.role,
    joinedAt: membership.joinedAt.toISOString(),
  };
}

/** Conversation as seen by one participant. */
export function serializeConversation(conversation: DirectConversation, viewerId: string) {
  const side = sideOf(conversation, viewerId);
  return {
    id: conversation.id,
    otherUserId: otherParticipant(conversation, viewerId),
    lastMessageAt: conversation.lastMessageAt?.toISOString() ?? null,
    isArchived: side ? isArchivedFor(conversation, side) : false,
    createdAt: conversation.createdAt.toISOString(),
  };
}
