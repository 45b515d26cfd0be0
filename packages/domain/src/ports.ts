import { type User } from './user';
import { type AuthToken, type BlacklistedToken, type TokenType } from './token';
import { type Channel, type ChannelMembership, type MemberRole } from './channel';
import { type DirectConversation, type ConversationSide } from './conversation';
import {
  type Message,
  type MessageTarget,
  type MessageView,
  type NewMessage,
} from './message';

/**
 * Repositories receive the opaque handle of the surrounding transaction.
 * Every service method runs inside exactly one `withTransaction` call.
 */
export type WithTransaction = <T>(fn: (tx: unknown) => Promise<T>) => Promise<T>;

export interface UserRepository {
  /** Returns null when the username or email is already taken. */
  create(
    tx: unknown,
    user: {
      id: string;
      username: string;
      email: string;
      passwordHash: string;
      firstName: string | null;
      lastName: string | null;
    },
  ): Promise<User | null>;
  findById(tx: unknown, id: string): Promise<User | null>;
  findByIds(tx: unknown, ids: string[]): Promise<User[]>;
  findByEmail(tx: unknown, email: string): Promise<User | null>;
  findByUsername(tx: unknown, username: string): Promise<User | null>;
  /** Returns the new version, or null for an unknown user. */
  incrementTokenVersion(tx: unknown, userId: string): Promise<number | null>;
  /** Ordered by username. */
  list(tx: unknown, opts: { limit: number; offset: number }): Promise<User[]>;
  /** Case-insensitive substring match on username or email, ordered by username. */
  search(tx: unknown, query: string, limit: number): Promise<User[]>;
}

export interface AuthTokenRepository {
  create(
    tx: unknown,
    token: {
      id: string;
      userId: string;
      tokenHash: string;
      type: TokenType;
      version: number;
      expiresAt: Date;
      deviceInfo: Record<string, unknown> | null;
      ipAddress: string | null;
    },
  ): Promise<AuthToken>;
  findByHash(tx: unknown, tokenHash: string): Promise<AuthToken | null>;
  touchLastUsed(tx: unknown, id: string, at: Date): Promise<void>;
}

export interface TokenBlacklistRepository {
  /** Returns false when the hash is already blacklisted. */
  add(
    tx: unknown,
    entry: { id: string; tokenHash: string; userId: string; reason: string; expiresAt: Date },
  ): Promise<boolean>;
  findActive(tx: unknown, tokenHash: string, now: Date): Promise<BlacklistedToken | null>;
}

export interface ChannelRepository {
  /** Returns null when the name is taken. */
  create(
    tx: unknown,
    channel: {
      id: string;
      name: string;
      description: string | null;
      topic: string | null;
      isPrivate: boolean;
      createdBy: string;
      maxMembers: number | null;
      inviteCode: string | null;
    },
  ): Promise<Channel | null>;
  findById(tx: unknown, id: string): Promise<Channel | null>;
  /** Same as findById, holding a row lock until the transaction ends. */
  findByIdForUpdate(tx: unknown, id: string): Promise<Channel | null>;
  findByInviteCode(tx: unknown, inviteCode: string): Promise<Channel | null>;
  listPublic(tx: unknown): Promise<Channel[]>;
  listForUser(tx: unknown, userId: string): Promise<Channel[]>;
  setArchived(tx: unknown, id: string, archived: boolean): Promise<Channel | null>;
  setInviteCode(tx: unknown, id: string, inviteCode: string): Promise<Channel | null>;
  /** Returns null for an unknown channel or when the new name is taken. */
  update(tx: unknown, id: string, patch: ChannelPatch): Promise<Channel | null>;
}

/** Undefined fields keep their stored value. */
export interface ChannelPatch {
  name?: string;
  description?: string | null;
  topic?: string | null;
  maxMembers?: number | null;
}

export interface MembershipRepository {
  /** Returns null when the user is already a member. */
  add(
    tx: unknown,
    membership: { channelId: string; userId: string; role: MemberRole },
  ): Promise<ChannelMembership | null>;
  remove(tx: unknown, channelId: string, userId: string): Promise<boolean>;
  find(tx: unknown, channelId: string, userId: string): Promise<ChannelMembership | null>;
  count(tx: unknown, channelId: string): Promise<number>;
  listByChannel(tx: unknown, channelId: string): Promise<ChannelMembership[]>;
  setRole(tx: unknown, channelId: string, userId: string, role: MemberRole): Promise<ChannelMembership | null>;
}

export interface ConversationRepository {
  findByPair(tx: unknown, user1Id: string, user2Id: string): Promise<DirectConversation | null>;
  /** Inserts the canonical pair; null when a row for the pair already exists. */
  insertIfAbsent(
    tx: unknown,
    conversation: { id: string; user1Id: string; user2Id: string },
  ): Promise<DirectConversation | null>;
  findById(tx: unknown, id: string): Promise<DirectConversation | null>;
  setArchived(
    tx: unknown,
    id: string,
    side: ConversationSide,
    archived: boolean,
  ): Promise<DirectConversation | null>;
  touchLastMessage(tx: unknown, id: string, at: Date): Promise<void>;
  listForUser(tx: unknown, userId: string): Promise<DirectConversation[]>;
}

export interface MessageRepository {
  create(tx: unknown, message: NewMessage): Promise<Message>;
  findById(tx: unknown, id: string): Promise<Message | null>;
  /** Newest first, deleted excluded, ids strictly below `beforeId`. */
  listByTarget(
    tx: unknown,
    target: MessageTarget,
    opts: { beforeId?: string; limit: number },
  ): Promise<Message[]>;
  /** Oldest first, deleted excluded, ids strictly above `afterId`. */
  listReplies(
    tx: unknown,
    parentId: string,
    opts: { afterId?: string; limit: number },
  ): Promise<Message[]>;
  countReplies(tx: unknown, parentIds: string[]): Promise<Map<string, number>>;
  updateContent(tx: unknown, id: string, content: string, editedAt: Date): Promise<Message | null>;
  markDeleted(tx: unknown, id: string, at: Date): Promise<Message | null>;
  countUnread(
    tx: unknown,
    target: MessageTarget,
    opts: { afterId: string | null; excludeAuthorId: string },
  ): Promise<number>;
  /**
   * Newest first, deleted excluded, case-insensitive substring match on the
   * content. Only channels and conversations `viewerId` may read are searched.
   */
  search(tx: unknown, opts: MessageSearch): Promise<Message[]>;
}

export interface MessageSearch {
  viewerId: string;
  query: string;
  target?: MessageTarget;
  authorId?: string;
  beforeId?: string;
  limit: number;
}

export interface ReadReceipt {
  userId: string;
  target: MessageTarget;
  lastReadMessageId: string;
  updatedAt: Date;
}

export interface ReadReceiptRepository {
  find(tx: unknown, userId: string, target: MessageTarget): Promise<ReadReceipt | null>;
  /** Never moves a stored receipt backwards. */
  advance(
    tx: unknown,
    receipt: { userId: string; target: MessageTarget; lastReadMessageId: string },
  ): Promise<ReadReceipt>;
}

/** Every repository the services need, sharing one transaction helper. */
export interface RepositorySet {
  users: UserRepository;
  authTokens: AuthTokenRepository;
  blacklist: TokenBlacklistRepository;
  channels: ChannelRepository;
  memberships: MembershipRepository;
  conversations: ConversationRepository;
  messages: MessageRepository;
  readReceipts: ReadReceiptRepository;
  withTransaction: WithTransaction;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface TokenService {
  generateToken(): string;
  hashToken(token: string): string;
}

export interface MessageRateLimiterPort {
  checkSendRate(userId: string, targetKey: string): Promise<boolean>;
}

export type MessageEventName = 'new_message' | 'message_updated' | 'message_deleted';

/** Fan-out of committed message changes to the target's topic. */
export interface MessageBroadcastPort {
  publish(event: MessageEventName, message: MessageView): void;
}

export interface SystemMessagePort {
  createSystem(
    target: MessageTarget,
    content: string,
    metadata: Record<string, unknown>,
  ): Promise<MessageView>;
}

export interface DomainLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
}
