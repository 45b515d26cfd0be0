import {
  type Attachment,
  type Message,
  type MessageTarget,
  type MessageView,
  type UserMessageType,
  MAX_ATTACHMENTS,
  MESSAGE_CONTENT_MAX,
  isUserMessageType,
  sameTarget,
  targetKey,
  tombstone,
} from './message';
import { toUserSummary, type UserSummary } from './user';
import { sideOf } from './conversation';
import { canDelete, canEdit } from './permissions';
import {
  type MessageRepository,
  type ChannelRepository,
  type MembershipRepository,
  type ConversationRepository,
  type UserRepository,
  type MessageBroadcastPort,
  type MessageRateLimiterPort,
  type SystemMessagePort,
  type WithTransaction,
} from './ports';
import { type FieldIssue } from './validation';

export const MAX_PAGE_SIZE = 100;
export const SEARCH_QUERY_MAX = 100;

export interface MessageServiceDeps {
  messageRepo: MessageRepository;
  channelRepo: ChannelRepository;
  membershipRepo: MembershipRepository;
  conversationRepo: ConversationRepository;
  userRepo: UserRepository;
  broadcaster: MessageBroadcastPort;
  rateLimiter?: MessageRateLimiterPort;
  generateId: () => string;
  withTransaction: WithTransaction;
  now?: () => Date;
}

export interface CreateMessageInput {
  content: string;
  channelId?: string | null;
  directConversationId?: string | null;
  messageType?: string;
  parentMessageId?: string | null;
  attachments?: Attachment[];
  metadata?: Record<string, unknown>;
}

export interface MessagePage {
  messages: MessageView[];
  hasMore: boolean;
  /** Id of the last message on the page, when another page follows. */
  nextCursor: string | null;
  /** Id of the first message on the page. */
  prevCursor: string | null;
}

export interface SearchMessagesInput {
  query: string;
  target?: MessageTarget;
  authorId?: string;
  beforeId?: string;
  limit: number;
}

export interface ThreadPage extends MessagePage {
  parent: MessageView;
}

interface ValidatedInput {
  target: MessageTarget;
  content: string;
  type: UserMessageType;
}

export class MessageService implements SystemMessagePort {
  private readonly now: () => Date;

  constructor(private readonly deps: MessageServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async create(authorId: string, input: CreateMessageInput): Promise<MessageView> {
    const { messageRepo, conversationRepo, userRepo, rateLimiter, broadcaster, generateId } = this.deps;
    const { target, content, type } = validateCreateInput(input);

    if (rateLimiter && !(await rateLimiter.checkSendRate(authorId, targetKey(target)))) {
      throw new MessageError('RATE_LIMITED', 'Too many messages, slow down');
    }

    const view = await this.deps.withTransaction(async (tx) => {
      await this.requireWritableTarget(tx, target, authorId);

      const parentMessageId = input.parentMessageId ?? null;
      if (parentMessageId) {
        const parent = await messageRepo.findById(tx, parentMessageId);
        if (!parent || parent.isDeleted || !sameTarget(parent.target, target)) {
          throw new MessageError('VALIDATION', 'Invalid message', [
            { path: 'parentMessageId', message: 'must reference a message in the same channel or conversation' },
          ]);
        }
      }

      const message = await messageRepo.create(tx, {
        kind: 'user',
        id: generateId(),
        target,
        authorId,
        type,
        content,
        parentMessageId,
        attachments: input.attachments ?? [],
        metadata: input.metadata ?? {},
      });

      if (target.kind === 'conversation') {
        await conversationRepo.touchLastMessage(tx, target.conversationId, message.createdAt);
      }

      const author = await userRepo.findById(tx, authorId);
      return toView(message, author ? toUserSummary(author) : null, 0);
    });

    broadcaster.publish('new_message', view);
    return view;
  }

  /** Posts an authorless notice (joins, leaves) and broadcasts it. */
  async createSystem(
    target: MessageTarget,
    content: string,
    metadata: Record<string, unknown>,
  ): Promise<MessageView> {
    const { messageRepo, channelRepo, conversationRepo, broadcaster, generateId } = this.deps;

    const view = await this.deps.withTransaction(async (tx) => {
      if (target.kind === 'channel') {
        const channel = await channelRepo.findById(tx, target.channelId);
        if (!channel) {
          throw new MessageError('NOT_FOUND', 'Channel not found');
        }
        if (channel.isArchived) {
          throw new MessageError('ARCHIVED', 'Channel is archived');
        }
      }
      const message = await messageRepo.create(tx, {
        kind: 'system',
        id: generateId(),
        target,
        content,
        metadata,
      });
      if (target.kind === 'conversation') {
        await conversationRepo.touchLastMessage(tx, target.conversationId, message.createdAt);
      }
      return toView(message, null, 0);
    });

    broadcaster.publish('new_message', view);
    return view;
  }

  async edit(messageId: string, editorId: string, content: string): Promise<MessageView> {
    const { messageRepo } = this.deps;
    const trimmed = content.trim();
    const issues = validateContent(trimmed);
    if (issues.length > 0) {
      throw new MessageError('VALIDATION', 'Invalid message', issues);
    }

    const view = await this.deps.withTransaction(async (tx) => {
      const message = await messageRepo.findById(tx, messageId);
      if (!message || message.isDeleted) {
        throw new MessageError('NOT_FOUND', 'Message not found');
      }
      if (!canEdit(message, editorId)) {
        throw new MessageError('FORBIDDEN', 'Only the author can edit this message');
      }

      const updated = await messageRepo.updateContent(tx, messageId, trimmed, this.now());
      if (!updated) {
        throw new MessageError('NOT_FOUND', 'Message not found');
      }
      const [hydrated] = await this.hydrate(tx, [updated]);
      return hydrated;
    });

    this.deps.broadcaster.publish('message_updated', view);
    return view;
  }

  async delete(messageId: string, requesterId: string): Promise<MessageView> {
    const { messageRepo, membershipRepo } = this.deps;

    const view = await this.deps.withTransaction(async (tx) => {
      const message = await messageRepo.findById(tx, messageId);
      if (!message || message.isDeleted) {
        throw new MessageError('NOT_FOUND', 'Message not found');
      }

      const membership =
        message.target.kind === 'channel'
          ? await membershipRepo.find(tx, message.target.channelId, requesterId)
          : null;
      if (!canDelete(message, requesterId, membership?.role ?? null)) {
        throw new MessageError('FORBIDDEN', 'Cannot delete this message');
      }

      const deleted = await messageRepo.markDeleted(tx, messageId, this.now());
      if (!deleted) {
        throw new MessageError('NOT_FOUND', 'Message not found');
      }
      const [hydrated] = await this.hydrate(tx, [tombstone(deleted)]);
      return hydrated;
    });

    this.deps.broadcaster.publish('message_deleted', view);
    return view;
  }

  /** A page of history, newest first; `beforeId` is an exclusive upper bound. */
  async list(target: MessageTarget, opts: { limit: number; beforeId?: string }): Promise<MessagePage> {
    const limit = clampLimit(opts.limit);

    return this.deps.withTransaction(async (tx) => {
      const rows = await this.deps.messageRepo.listByTarget(tx, target, {
        beforeId: opts.beforeId,
        limit: limit + 1,
      });
      return this.page(tx, rows, limit);
    });
  }

  /**
   * Replies to `parentId` in insertion order; `afterId` is an exclusive lower bound.
   * A deleted parent still anchors its thread and comes back as a tombstone.
   */
  async thread(parentId: string, opts: { limit: number; afterId?: string }): Promise<ThreadPage> {
    const limit = clampLimit(opts.limit);

    return this.deps.withTransaction(async (tx) => {
      const parent = await this.deps.messageRepo.findById(tx, parentId);
      if (!parent) {
        throw new MessageError('NOT_FOUND', 'Message not found');
      }
      const rows = await this.deps.messageRepo.listReplies(tx, parentId, {
        afterId: opts.afterId,
        limit: limit + 1,
      });
      const [parentView] = await this.hydrate(tx, [parent.isDeleted ? tombstone(parent) : parent]);
      return { parent: parentView, ...(await this.page(tx, rows, limit)) };
    });
  }

  /**
   * Content search over every channel and conversation the viewer can read,
   * newest first; `beforeId` pages like history does.
   */
  async search(viewerId: string, input: SearchMessagesInput): Promise<MessagePage> {
    const query = input.query.trim();
    if (query.length === 0 || query.length > SEARCH_QUERY_MAX) {
      throw new MessageError('VALIDATION', 'Invalid search', [
        { path: 'query', message: `must be 1-${SEARCH_QUERY_MAX} characters` },
      ]);
    }
    const limit = clampLimit(input.limit);

    return this.deps.withTransaction(async (tx) => {
      const rows = await this.deps.messageRepo.search(tx, {
        viewerId,
        query,
        target: input.target,
        authorId: input.authorId,
        beforeId: input.beforeId,
        limit: limit + 1,
      });
      return this.page(tx, rows, limit);
    });
  }

  /** Deleted messages are NOT_FOUND unless `includeDeleted`, which returns their tombstone. */
  async get(messageId: string, opts: { includeDeleted?: boolean } = {}): Promise<MessageView> {
    return this.deps.withTransaction(async (tx) => {
      const message = await this.deps.messageRepo.findById(tx, messageId);
      if (!message || (message.isDeleted && !opts.includeDeleted)) {
        throw new MessageError('NOT_FOUND', 'Message not found');
      }
      const [view] = await this.hydrate(tx, [message.isDeleted ? tombstone(message) : message]);
      return view;
    });
  }

  private async page(tx: unknown, rows: Message[], limit: number): Promise<MessagePage> {
    const hasMore = rows.length > limit;
    const pageRows = hasMore ? rows.slice(0, limit) : rows;
    const messages = await this.hydrate(tx, pageRows);
    return {
      messages,
      hasMore,
      nextCursor: hasMore && pageRows.length > 0 ? pageRows[pageRows.length - 1].id : null,
      prevCursor: pageRows.length > 0 ? pageRows[0].id : null,
    };
  }

  private async hydrate(tx: unknown, messages: Message[]): Promise<MessageView[]> {
    if (messages.length === 0) return [];
    const { userRepo, messageRepo } = this.deps;

    const authorIds = [
      ...new Set(messages.flatMap((m) => (m.authorId === null ? [] : [m.authorId]))),
    ];
    const authors = new Map(
      (authorIds.length > 0 ? await userRepo.findByIds(tx, authorIds) : []).map((u) => [
        u.id,
        toUserSummary(u),
      ]),
    );
    const replyCounts = await messageRepo.countReplies(
      tx,
      messages.map((m) => m.id),
    );

    return messages.map((m) =>
      toView(m, m.authorId === null ? null : authors.get(m.authorId) ?? null, replyCounts.get(m.id) ?? 0),
    );
  }

  private async requireWritableTarget(tx: unknown, target: MessageTarget, authorId: string): Promise<void> {
    const { channelRepo, membershipRepo, conversationRepo } = this.deps;

    if (target.kind === 'channel') {
      const channel = await channelRepo.findById(tx, target.channelId);
      if (!channel) {
        throw new MessageError('NOT_FOUND', 'Channel not found');
      }
      if (channel.isArchived) {
        throw new MessageError('ARCHIVED', 'Channel is archived');
      }
      if (channel.isPrivate && !(await membershipRepo.find(tx, channel.id, authorId))) {
        throw new MessageError('FORBIDDEN', 'Not a member of this channel');
      }
      return;
    }

    const conversation = await conversationRepo.findById(tx, target.conversationId);
    if (!conversation) {
      throw new MessageError('NOT_FOUND', 'Conversation not found');
    }
    if (!sideOf(conversation, authorId)) {
      throw new MessageError('FORBIDDEN', 'Not a participant of this conversation');
    }
  }
}

function toView(message: Message, author: UserSummary | null, replyCount: number): MessageView {
  return { ...message, author, replyCount };
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return MAX_PAGE_SIZE;
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_PAGE_SIZE);
}

function validateContent(content: string): FieldIssue[] {
  if (content.length === 0) return [{ path: 'content', message: "can't be blank" }];
  if (content.length > MESSAGE_CONTENT_MAX) {
    return [{ path: 'content', message: `must be at most ${MESSAGE_CONTENT_MAX} characters` }];
  }
  return [];
}

export function validateCreateInput(input: CreateMessageInput): ValidatedInput {
  const issues: FieldIssue[] = [];
  const channelId = input.channelId ?? null;
  const conversationId = input.directConversationId ?? null;

  let target: MessageTarget | null = null;
  if (channelId !== null && conversationId !== null) {
    issues.push({ path: 'target', message: 'must set only one of channelId or directConversationId' });
  } else if (channelId !== null) {
    target = { kind: 'channel', channelId };
  } else if (conversationId !== null) {
    target = { kind: 'conversation', conversationId };
  } else {
    issues.push({ path: 'target', message: 'must set channelId or directConversationId' });
  }

  const content = input.content.trim();
  issues.push(...validateContent(content));

  const type = input.messageType ?? 'text';
  if (!isUserMessageType(type)) {
    issues.push({ path: 'messageType', message: 'is invalid' });
  }

  const attachments = input.attachments ?? [];
  if (attachments.length > MAX_ATTACHMENTS) {
    issues.push({ path: 'attachments', message: `must contain at most ${MAX_ATTACHMENTS} items` });
  }
  attachments.forEach((a, i) => {
    if (a.url.trim().length === 0) issues.push({ path: `attachments.${i}.url`, message: "can't be blank" });
    if (!Number.isInteger(a.size) || a.size < 0) {
      issues.push({ path: `attachments.${i}.size`, message: 'must be a non-negative integer' });
    }
  });

  if (issues.length > 0 || target === null || !isUserMessageType(type)) {
    throw new MessageError('VALIDATION', 'Invalid message', issues);
  }
  return { target, content, type };
}

export type MessageErrorKind = 'VALIDATION' | 'NOT_FOUND' | 'FORBIDDEN' | 'ARCHIVED' | 'RATE_LIMITED';

export class MessageError extends Error {
  constructor(
    public readonly kind: MessageErrorKind,
    message: string,
    public readonly issues: FieldIssue[] = [],
  ) {
    super(message);
    this.name = 'MessageError';
  }
}
