import {
  ConversationError,
  MembershipError,
  MessageError,
  ReadReceiptError,
  sameTarget,
  type MessageTarget,
  type Services,
  type UserStatus,
  type UserSummary,
} from '@parley/domain';
import {
  ARCHIVE,
  ArchivePayload,
  DELETE_MESSAGE,
  DeleteMessagePayload,
  EDIT_MESSAGE,
  EditMessagePayload,
  GET_THREAD,
  GetThreadPayload,
  LOAD_MORE,
  LoadMorePayload,
  MARK_AS_READ,
  MESSAGES_LOADED,
  MarkAsReadPayload,
  PRESENCE_DIFF,
  PRESENCE_STATE,
  SEND_MESSAGE,
  SendMessagePayload,
  TYPING,
  TypingPayload,
  USER_TYPING,
  parseTopic,
  replyFrame,
  serializeChannel,
  serializeConversation,
  serializeMessage,
  serializePage,
  serializeUserSummary,
  type CommandFrame,
  type PresenceDiff,
  type ReplyFrame,
  type TopicPublisher,
} from '@parley/proto';
import { errorMessage, toValidationIssues, type SafeLogger } from '@parley/shared';
import { type z } from 'zod';
import { type BroadcastRouter, type Subscriber } from './broadcast-router';
import { isEmptyDiff, type PresenceTracker } from './presence-tracker';

export type SessionState = 'connecting' | 'joined' | 'active' | 'terminated';

export interface SessionUser {
  summary: UserSummary;
  status: UserStatus;
}

/** The connection side of a session: where replies and pushes go. */
export interface SessionPeer extends Subscriber {
  user: SessionUser;
  reply(frame: ReplyFrame): void;
}

export interface SessionDeps {
  services: Pick<Services, 'membership' | 'conversations' | 'messages' | 'receipts'>;
  presence: PresenceTracker;
  router: BroadcastRouter;
  /** Fan-out that also reaches other gateway processes. */
  publisher: TopicPublisher;
  backlogSize: number;
  loadMoreSize: number;
  logger: SafeLogger;
}

type ReplyPayload = Record<string, unknown>;

class CommandRejected extends Error {
  constructor(readonly payload: ReplyPayload) {
    super(String(payload.reason));
  }
}

/**
 * One connection's membership of one topic:
 * connecting → joined → active → terminated.
 */
export class TopicSession {
  private current: SessionState = 'connecting';
  private readonly target: MessageTarget | null;

  constructor(
    readonly topic: string,
    private readonly peer: SessionPeer,
    private readonly deps: SessionDeps,
  ) {
    this.target = parseTopic(topic);
  }

  get state(): SessionState {
    return this.current;
  }

  /** Authorizes and enters the topic. Resolves false when the join was refused. */
  async join(ref: string): Promise<boolean> {
    const target = this.target;
    if (!target) {
      return this.refuse(ref, { reason: 'unknown_topic' });
    }

    let allowed: boolean;
    try {
      allowed = await this.canAccess(target);
    } catch (err) {
      this.deps.logger.error({ topic: this.topic, err: errorMessage(err) }, 'Join authorization failed');
      return this.refuse(ref, { reason: 'internal_error' });
    }
    if (this.state === 'terminated') return false;
    if (!allowed) {
      return this.refuse(ref, { reason: 'unauthorized' });
    }

    const { presence, router, publisher, services, backlogSize } = this.deps;
    const { user } = this.peer;

    this.current = 'joined';
    this.peer.reply(replyFrame(ref, this.topic, 'ok'));

    const diff = presence.track(this.topic, user.summary.id, this.peer.id, {
      username: user.summary.username,
      displayName: user.summary.displayName,
      avatarUrl: user.summary.avatarUrl,
      status: user.status,
    });
    router.subscribe(this.topic, this.peer);

    try {
      const page = await services.messages.list(target, { limit: backlogSize });
      this.push(MESSAGES_LOADED, serializePage(page));
    } catch (err) {
      this.deps.logger.error({ topic: this.topic, err: errorMessage(err) }, 'Backlog load failed');
      this.push(MESSAGES_LOADED, { messages: [], hasMore: false, nextCursor: null, prevCursor: null });
    }
    if (this.state !== 'joined') return true;

    this.push(PRESENCE_STATE, presence.list(this.topic));
    publisher.publish(this.topic, PRESENCE_DIFF, diff, { exceptSubscriberId: this.peer.id });

    this.current = 'active';
    return true;
  }

  async leave(ref: string): Promise<void> {
    this.terminate();
    this.peer.reply(replyFrame(ref, this.topic, 'ok'));
  }

  /** Ends the session: unsubscribes, untracks presence and tells the others. */
  terminate(): void {
    if (this.current === 'terminated') return;
    const wasPresent = this.current !== 'connecting';
    this.current = 'terminated';
    if (!wasPresent) return;

    this.deps.router.unsubscribe(this.topic, this.peer.id);
    this.announce(this.deps.presence.untrack(this.topic, this.peer.id));
  }

  /** Marks the session over when the whole connection goes; presence is swept by the caller. */
  detach(): void {
    if (this.current === 'terminated') return;
    this.current = 'terminated';
    this.deps.router.unsubscribe(this.topic, this.peer.id);
  }

  announce(diff: PresenceDiff): void {
    if (isEmptyDiff(diff)) return;
    this.deps.publisher.publish(this.topic, PRESENCE_DIFF, diff, { exceptSubscriberId: this.peer.id });
  }

  async handleCommand(frame: CommandFrame): Promise<void> {
    const target = this.target;
    if (this.current !== 'active' || !target) {
      this.peer.reply(replyFrame(frame.ref, this.topic, 'error', { reason: 'not_joined' }));
      return;
    }

    try {
      const payload = await this.dispatch(target, frame);
      this.peer.reply(replyFrame(frame.ref, this.topic, 'ok', payload));
    } catch (err) {
      this.peer.reply(replyFrame(frame.ref, this.topic, 'error', this.errorPayload(err, frame.command)));
    }
  }

  private async dispatch(target: MessageTarget, frame: CommandFrame): Promise<ReplyPayload> {
    const { services, publisher, loadMoreSize } = this.deps;
    const userId = this.peer.user.summary.id;

    switch (frame.command) {
      case SEND_MESSAGE: {
        const input = parsePayload(SendMessagePayload, frame.payload);
        const message = await services.messages.create(userId, {
          content: input.content,
          channelId: target.kind === 'channel' ? target.channelId : null,
          directConversationId: target.kind === 'conversation' ? target.conversationId : null,
          messageType: input.messageType,
          parentMessageId: input.parentMessageId,
          metadata: input.metadata,
          attachments: input.attachments,
        });
        return { message: serializeMessage(message) };
      }

      case EDIT_MESSAGE: {
        const input = parsePayload(EditMessagePayload, frame.payload);
        await this.requireMessageOnTopic(target, input.messageId);
        const message = await services.messages.edit(input.messageId, userId, input.content);
        return { message: serializeMessage(message) };
      }

      case DELETE_MESSAGE: {
        const input = parsePayload(DeleteMessagePayload, frame.payload);
        await this.requireMessageOnTopic(target, input.messageId);
        const message = await services.messages.delete(input.messageId, userId);
        return { message: serializeMessage(message) };
      }

      case TYPING: {
        const input = parsePayload(TypingPayload, frame.payload);
        publisher.publish(
          this.topic,
          USER_TYPING,
          {
            user: serializeUserSummary(this.peer.user.summary),
            typing: input.typing,
            timestamp: new Date().toISOString(),
          },
          { exceptSubscriberId: this.peer.id },
        );
        return {};
      }

      case LOAD_MORE: {
        const input = parsePayload(LoadMorePayload, frame.payload);
        const page = await services.messages.list(target, {
          limit: input.limit ?? loadMoreSize,
          beforeId: input.beforeMessageId,
        });
        return serializePage(page);
      }

      case GET_THREAD: {
        const input = parsePayload(GetThreadPayload, frame.payload);
        await this.requireMessageOnTopic(target, input.messageId, { includeDeleted: true });
        const thread = await services.messages.thread(input.messageId, {
          limit: input.limit ?? loadMoreSize,
          afterId: input.afterId,
        });
        return { parent: serializeMessage(thread.parent), ...serializePage(thread) };
      }

      case ARCHIVE: {
        const input = parsePayload(ArchivePayload, frame.payload);
        if (target.kind === 'conversation') {
          const conversation = await services.conversations.archiveFor(
            target.conversationId,
            userId,
            input.archived,
          );
          return { conversation: serializeConversation(conversation, userId) };
        }
        const channel = await services.membership.archiveChannel(userId, target.channelId, input.archived);
        return { channel: serializeChannel(channel) };
      }

      case MARK_AS_READ: {
        const input = parsePayload(MarkAsReadPayload, frame.payload);
        const receipt = await services.receipts.markRead(target, userId, input.messageId);
        return { lastReadMessageId: receipt.lastReadMessageId };
      }

      default:
        throw new CommandRejected({ reason: 'unknown_command' });
    }
  }

  private async canAccess(target: MessageTarget): Promise<boolean> {
    const { services } = this.deps;
    const userId = this.peer.user.summary.id;
    return target.kind === 'channel'
      ? services.membership.canAccessChannel(target.channelId, userId)
      : services.conversations.canAccessConversation(target.conversationId, userId);
  }

  // A message id from another topic is reported exactly like a missing one.
  private async requireMessageOnTopic(
    target: MessageTarget,
    messageId: string,
    opts: { includeDeleted?: boolean } = {},
  ): Promise<void> {
    const message = await this.deps.services.messages.get(messageId, opts);
    if (!sameTarget(message.target, target)) {
      throw new CommandRejected({ reason: 'message_not_found' });
    }
  }

  private refuse(ref: string, payload: ReplyPayload): false {
    this.current = 'terminated';
    this.peer.reply(replyFrame(ref, this.topic, 'error', payload));
    return false;
  }

  private push(event: string, payload: Record<string, unknown>): void {
    this.peer.push({ type: 'push', topic: this.topic, event, payload });
  }

  private errorPayload(err: unknown, command: string): ReplyPayload {
    if (err instanceof CommandRejected) return err.payload;

    if (
      err instanceof MessageError ||
      err instanceof MembershipError ||
      err instanceof ConversationError ||
      err instanceof ReadReceiptError
    ) {
      switch (err.kind) {
        case 'VALIDATION':
          return { reason: 'validation_failed', issues: 'issues' in err ? err.issues : [] };
        case 'FORBIDDEN':
          return { reason: 'unauthorized' };
        case 'NOT_FOUND':
          return { reason: this.notFoundReason(command) };
        case 'ARCHIVED':
          return { reason: 'archived' };
        case 'RATE_LIMITED':
          return { reason: 'rate_limited' };
        default:
          return { reason: err.kind.toLowerCase() };
      }
    }

    this.deps.logger.error({ topic: this.topic, command, err: errorMessage(err) }, 'Command failed');
    return { reason: 'internal_error' };
  }

  private notFoundReason(command: string): string {
    if (command === SEND_MESSAGE || command === LOAD_MORE || command === ARCHIVE) {
      return this.target?.kind === 'conversation' ? 'conversation_not_found' : 'channel_not_found';
    }
    return 'message_not_found';
  }
}

function parsePayload<T extends z.ZodTypeAny>(schema: T, payload: Record<string, unknown>): z.infer<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new CommandRejected({
      reason: 'validation_failed',
      issues: toValidationIssues(result.error.issues),
    });
  }
  return result.data;
}
