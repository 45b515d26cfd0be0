import {
  compareIds,
  sameTarget,
  type AuthToken,
  type AuthTokenRepository,
  type BlacklistedToken,
  type Channel,
  type ChannelMembership,
  type ChannelPatch,
  type ChannelRepository,
  type ConversationRepository,
  type ConversationSide,
  type DirectConversation,
  type MemberRole,
  type MembershipRepository,
  type Message,
  type MessageRepository,
  type MessageSearch,
  type MessageTarget,
  type NewMessage,
  type ReadReceipt,
  type ReadReceiptRepository,
  type RepositorySet,
  type TokenBlacklistRepository,
  type TokenType,
  type User,
  type UserRepository,
  type WithTransaction,
} from '@parley/domain';

interface MemoryState {
  users: Map<string, User>;
  authTokens: Map<string, AuthToken>;
  blacklist: Map<string, BlacklistedToken>;
  channels: Map<string, Channel>;
  memberships: Map<string, ChannelMembership>;
  conversations: Map<string, DirectConversation>;
  messages: Map<string, Message>;
  receipts: Map<string, ReadReceipt>;
}

function emptyState(): MemoryState {
  return {
    users: new Map(),
    authTokens: new Map(),
    blacklist: new Map(),
    channels: new Map(),
    memberships: new Map(),
    conversations: new Map(),
    messages: new Map(),
    receipts: new Map(),
  };
}

function byId<T extends { id: string }>(a: T, b: T): number {
  return compareIds(a.id, b.id);
}

function membershipKey(channelId: string, userId: string): string {
  return `${channelId}/${userId}`;
}

function byUsername(a: User, b: User): number {
  return a.username.localeCompare(b.username);
}

function contains(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

function receiptKey(userId: string, target: MessageTarget): string {
  return target.kind === 'channel'
    ? `${userId}/channel:${target.channelId}`
    : `${userId}/conversation:${target.conversationId}`;
}

/**
 * Process-local stand-in for the Postgres schema. Transactions run one at a
 * time and roll back to a snapshot on error, so row locks and unique
 * constraints behave as they do against the real database.
 */
export class MemoryDatabase implements RepositorySet {
  private state: MemoryState = emptyState();
  private queue: Promise<unknown> = Promise.resolve();

  readonly users: UserRepository;
  readonly authTokens: AuthTokenRepository;
  readonly blacklist: TokenBlacklistRepository;
  readonly channels: ChannelRepository;
  readonly memberships: MembershipRepository;
  readonly conversations: ConversationRepository;
  readonly messages: MessageRepository;
  readonly readReceipts: ReadReceiptRepository;

  constructor(now: () => Date = () => new Date()) {
    const db = (): MemoryState => this.state;
    this.users = new MemoryUserRepository(db, now);
    this.authTokens = new MemoryAuthTokenRepository(db, now);
    this.blacklist = new MemoryTokenBlacklistRepository(db, now);
    this.channels = new MemoryChannelRepository(db, now);
    this.memberships = new MemoryMembershipRepository(db, now);
    this.conversations = new MemoryConversationRepository(db, now);
    this.messages = new MemoryMessageRepository(db, now);
    this.readReceipts = new MemoryReadReceiptRepository(db, now);
  }

  readonly withTransaction: WithTransaction = <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => {
    const run = async (): Promise<T> => {
      const snapshot = structuredClone(this.state);
      try {
        return await fn(this);
      } catch (err) {
        this.state = snapshot;
        throw err;
      }
    };
    const result = this.queue.then(run, run);
    this.queue = result.catch(() => undefined);
    return result;
  };
}

type StateRef = () => MemoryState;

class MemoryUserRepository implements UserRepository {
  constructor(
    private readonly db: StateRef,
    private readonly now: () => Date,
  ) {}

  async create(
    _tx: unknown,
    user: {
      id: string;
      username: string;
      email: string;
      passwordHash: string;
      firstName: string | null;
      lastName: string | null;
    },
  ): Promise<User | null> {
    const { users } = this.db();
    for (const existing of users.values()) {
      if (existing.username === user.username || existing.email === user.email) return null;
    }
    const at = this.now();
    const row: User = {
      ...user,
      avatarUrl: null,
      status: 'offline',
      tokenVersion: 1,
      createdAt: at,
      updatedAt: at,
    };
    users.set(row.id, row);
    return { ...row };
  }

  async findById(_tx: unknown, id: string): Promise<User | null> {
    const row = this.db().users.get(id);
    return row ? { ...row } : null;
  }

  async findByIds(_tx: unknown, ids: string[]): Promise<User[]> {
    const { users } = this.db();
    return ids.flatMap((id) => {
      const row = users.get(id);
      return row ? [{ ...row }] : [];
    });
  }

  async findByEmail(_tx: unknown, email: string): Promise<User | null> {
    for (const row of this.db().users.values()) {
      if (row.email === email) return { ...row };
    }
    return null;
  }

  async findByUsername(_tx: unknown, username: string): Promise<User | null> {
    for (const row of this.db().users.values()) {
      if (row.username === username) return { ...row };
    }
    return null;
  }

  async incrementTokenVersion(_tx: unknown, userId: string): Promise<number | null> {
    const row = this.db().users.get(userId);
    if (!row) return null;
    row.tokenVersion += 1;
    row.updatedAt = this.now();
    return row.tokenVersion;
  }

  async list(_tx: unknown, opts: { limit: number; offset: number }): Promise<User[]> {
    return [...this.db().users.values()]
      .sort(byUsername)
      .slice(opts.offset, opts.offset + opts.limit)
      .map((u) => ({ ...u }));
  }

  async search(_tx: unknown, query: string, limit: number): Promise<User[]> {
    return [...this.db().users.values()]
      .filter((u) => contains(u.username, query) || contains(u.email, query))
      .sort(byUsername)
      .slice(0, limit)
      .map((u) => ({ ...u }));
  }
}

class MemoryAuthTokenRepository implements AuthTokenRepository {
  constructor(
    private readonly db: StateRef,
    private readonly now: () => Date,
  ) {}

  async create(
    _tx: unknown,
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
  ): Promise<AuthToken> {
    const { authTokens } = this.db();
    for (const existing of authTokens.values()) {
      if (existing.tokenHash === token.tokenHash) {
        throw new Error('duplicate key value violates unique constraint "auth_tokens_token_hash_key"');
      }
    }
    const row: AuthToken = { ...token, lastUsedAt: null, createdAt: this.now() };
    authTokens.set(row.id, row);
    return { ...row };
  }

  async findByHash(_tx: unknown, tokenHash: string): Promise<AuthToken | null> {
    for (const row of this.db().authTokens.values()) {
      if (row.tokenHash === tokenHash) return { ...row };
    }
    return null;
  }

  async touchLastUsed(_tx: unknown, id: string, at: Date): Promise<void> {
    const row = this.db().authTokens.get(id);
    if (row) row.lastUsedAt = at;
  }
}

class MemoryTokenBlacklistRepository implements TokenBlacklistRepository {
  constructor(
    private readonly db: StateRef,
    private readonly now: () => Date,
  ) {}

  async add(
    _tx: unknown,
    entry: { id: string; tokenHash: string; userId: string; reason: string; expiresAt: Date },
  ): Promise<boolean> {
    const { blacklist } = this.db();
    for (const existing of blacklist.values()) {
      if (existing.tokenHash === entry.tokenHash) return false;
    }
    blacklist.set(entry.id, { ...entry, createdAt: this.now() });
    return true;
  }

  async findActive(_tx: unknown, tokenHash: string, now: Date): Promise<BlacklistedToken | null> {
    for (const row of this.db().blacklist.values()) {
      if (row.tokenHash === tokenHash && row.expiresAt > now) return { ...row };
    }
    return null;
  }
}

class MemoryChannelRepository implements ChannelRepository {
  constructor(
    private readonly db: StateRef,
    private readonly now: () => Date,
  ) {}

  async create(
    _tx: unknown,
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
  ): Promise<Channel | null> {
    const { channels } = this.db();
    for (const existing of channels.values()) {
      if (existing.name === channel.name) return null;
      if (channel.inviteCode !== null && existing.inviteCode === channel.inviteCode) return null;
    }
    const at = this.now();
    const row: Channel = { ...channel, isArchived: false, createdAt: at, updatedAt: at };
    channels.set(row.id, row);
    return { ...row };
  }

  async findById(_tx: unknown, id: string): Promise<Channel | null> {
    const row = this.db().channels.get(id);
    return row ? { ...row } : null;
  }

  async findByIdForUpdate(tx: unknown, id: string): Promise<Channel | null> {
    // Transactions are already serialized.
    return this.findById(tx, id);
  }

  async findByInviteCode(_tx: unknown, inviteCode: string): Promise<Channel | null> {
    for (const row of this.db().channels.values()) {
      if (row.inviteCode === inviteCode) return { ...row };
    }
    return null;
  }

  async listPublic(_tx: unknown): Promise<Channel[]> {
    return [...this.db().channels.values()]
      .filter((c) => !c.isPrivate && !c.isArchived)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((c) => ({ ...c }));
  }

  async listForUser(_tx: unknown, userId: string): Promise<Channel[]> {
    const { channels, memberships } = this.db();
    return [...memberships.values()]
      .filter((m) => m.userId === userId)
      .flatMap((m) => {
        const channel = channels.get(m.channelId);
        return channel ? [{ ...channel }] : [];
      })
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async setArchived(_tx: unknown, id: string, archived: boolean): Promise<Channel | null> {
    const row = this.db().channels.get(id);
    if (!row) return null;
    row.isArchived = archived;
    row.updatedAt = this.now();
    return { ...row };
  }

  async setInviteCode(_tx: unknown, id: string, inviteCode: string): Promise<Channel | null> {
    const row = this.db().channels.get(id);
    if (!row) return null;
    row.inviteCode = inviteCode;
    row.updatedAt = this.now();
    return { ...row };
  }

  async update(_tx: unknown, id: string, patch: ChannelPatch): Promise<Channel | null> {
    const { channels } = this.db();
    const row = channels.get(id);
    if (!row) return null;
    if (patch.name !== undefined) {
      for (const other of channels.values()) {
        if (other.id !== id && other.name === patch.name) return null;
      }
      row.name = patch.name;
    }
    if (patch.description !== undefined) row.description = patch.description;
    if (patch.topic !== undefined) row.topic = patch.topic;
    if (patch.maxMembers !== undefined) row.maxMembers = patch.maxMembers;
    row.updatedAt = this.now();
    return { ...row };
  }
}

class MemoryMembershipRepository implements MembershipRepository {
  constructor(
    private readonly db: StateRef,
    private readonly now: () => Date,
  ) {}

  async add(
    _tx: unknown,
    membership: { channelId: string; userId: string; role: MemberRole },
  ): Promise<ChannelMembership | null> {
    const { memberships } = this.db();
    const key = membershipKey(membership.channelId, membership.userId);
    if (memberships.has(key)) return null;
    const row: ChannelMembership = { ...membership, joinedAt: this.now() };
    memberships.set(key, row);
    return { ...row };
  }

  async remove(_tx: unknown, channelId: string, userId: string): Promise<boolean> {
    return this.db().memberships.delete(membershipKey(channelId, userId));
  }

  async find(_tx: unknown, channelId: string, userId: string): Promise<ChannelMembership | null> {
    const row = this.db().memberships.get(membershipKey(channelId, userId));
    return row ? { ...row } : null;
  }

  async count(_tx: unknown, channelId: string): Promise<number> {
    let total = 0;
    for (const row of this.db().memberships.values()) {
      if (row.channelId === channelId) total += 1;
    }
    return total;
  }

  async listByChannel(_tx: unknown, channelId: string): Promise<ChannelMembership[]> {
    return [...this.db().memberships.values()]
      .filter((m) => m.channelId === channelId)
      .sort((a, b) => a.joinedAt.getTime() - b.joinedAt.getTime())
      .map((m) => ({ ...m }));
  }

  async setRole(
    _tx: unknown,
    channelId: string,
    userId: string,
    role: MemberRole,
  ): Promise<ChannelMembership | null> {
    const row = this.db().memberships.get(membershipKey(channelId, userId));
    if (!row) return null;
    row.role = role;
    return { ...row };
  }
}

class MemoryConversationRepository implements ConversationRepository {
  constructor(
    private readonly db: StateRef,
    private readonly now: () => Date,
  ) {}

  async findByPair(_tx: unknown, user1Id: string, user2Id: string): Promise<DirectConversation | null> {
    for (const row of this.db().conversations.values()) {
      if (row.user1Id === user1Id && row.user2Id === user2Id) return { ...row };
    }
    return null;
  }

  async insertIfAbsent(
    tx: unknown,
    conversation: { id: string; user1Id: string; user2Id: string },
  ): Promise<DirectConversation | null> {
    if (compareIds(conversation.user1Id, conversation.user2Id) >= 0) {
      throw new Error('new row violates check constraint "direct_conversations_check"');
    }
    if (await this.findByPair(tx, conversation.user1Id, conversation.user2Id)) return null;
    const row: DirectConversation = {
      ...conversation,
      lastMessageAt: null,
      isArchivedByUser1: false,
      isArchivedByUser2: false,
      createdAt: this.now(),
    };
    this.db().conversations.set(row.id, row);
    return { ...row };
  }

  async findById(_tx: unknown, id: string): Promise<DirectConversation | null> {
    const row = this.db().conversations.get(id);
    return row ? { ...row } : null;
  }

  async setArchived(
    _tx: unknown,
    id: string,
    side: ConversationSide,
    archived: boolean,
  ): Promise<DirectConversation | null> {
    const row = this.db().conversations.get(id);
    if (!row) return null;
    if (side === 'user1') row.isArchivedByUser1 = archived;
    else row.isArchivedByUser2 = archived;
    return { ...row };
  }

  async touchLastMessage(_tx: unknown, id: string, at: Date): Promise<void> {
    const row = this.db().conversations.get(id);
    if (row && (row.lastMessageAt === null || row.lastMessageAt < at)) {
      row.lastMessageAt = at;
    }
  }

  async listForUser(_tx: unknown, userId: string): Promise<DirectConversation[]> {
    return [...this.db().conversations.values()]
      .filter(
        (c) =>
          (c.user1Id === userId && !c.isArchivedByUser1) ||
          (c.user2Id === userId && !c.isArchivedByUser2),
      )
      .map((c) => ({ ...c }));
  }
}

class MemoryMessageRepository implements MessageRepository {
  constructor(
    private readonly db: StateRef,
    private readonly now: () => Date,
  ) {}

  async create(_tx: unknown, message: NewMessage): Promise<Message> {
    const at = this.now();
    const common = {
      id: message.id,
      target: message.target,
      content: message.content,
      editedAt: null,
      isDeleted: false,
      metadata: message.metadata,
      createdAt: at,
      updatedAt: at,
    };
    const row: Message =
      message.kind === 'user'
        ? {
            ...common,
            kind: 'user',
            type: message.type,
            authorId: message.authorId,
            parentMessageId: message.parentMessageId,
            attachments: message.attachments,
          }
        : {
            ...common,
            kind: 'system',
            type: 'system',
            authorId: null,
            parentMessageId: null,
            attachments: [],
          };
    this.db().messages.set(row.id, row);
    return { ...row };
  }

  async findById(_tx: unknown, id: string): Promise<Message | null> {
    const row = this.db().messages.get(id);
    return row ? { ...row } : null;
  }

  async listByTarget(
    _tx: unknown,
    target: MessageTarget,
    opts: { beforeId?: string; limit: number },
  ): Promise<Message[]> {
    const { beforeId } = opts;
    return [...this.db().messages.values()]
      .filter(
        (m) =>
          !m.isDeleted &&
          sameTarget(m.target, target) &&
          (beforeId === undefined || compareIds(m.id, beforeId) < 0),
      )
      .sort((a, b) => byId(b, a))
      .slice(0, opts.limit)
      .map((m) => ({ ...m }));
  }

  async listReplies(
    _tx: unknown,
    parentId: string,
    opts: { afterId?: string; limit: number },
  ): Promise<Message[]> {
    const { afterId } = opts;
    return [...this.db().messages.values()]
      .filter(
        (m) =>
          !m.isDeleted &&
          m.parentMessageId === parentId &&
          (afterId === undefined || compareIds(m.id, afterId) > 0),
      )
      .sort(byId)
      .slice(0, opts.limit)
      .map((m) => ({ ...m }));
  }

  async countReplies(_tx: unknown, parentIds: string[]): Promise<Map<string, number>> {
    const wanted = new Set(parentIds);
    const counts = new Map<string, number>();
    for (const m of this.db().messages.values()) {
      if (m.isDeleted || m.parentMessageId === null || !wanted.has(m.parentMessageId)) continue;
      counts.set(m.parentMessageId, (counts.get(m.parentMessageId) ?? 0) + 1);
    }
    return counts;
  }

  async updateContent(
    _tx: unknown,
    id: string,
    content: string,
    editedAt: Date,
  ): Promise<Message | null> {
    const row = this.db().messages.get(id);
    if (!row || row.isDeleted) return null;
    row.content = content;
    row.editedAt = editedAt;
    row.updatedAt = editedAt;
    return { ...row };
  }

  async markDeleted(_tx: unknown, id: string, at: Date): Promise<Message | null> {
    const row = this.db().messages.get(id);
    if (!row || row.isDeleted) return null;
    row.isDeleted = true;
    row.updatedAt = at;
    return { ...row };
  }

  async countUnread(
    _tx: unknown,
    target: MessageTarget,
    opts: { afterId: string | null; excludeAuthorId: string },
  ): Promise<number> {
    const { afterId, excludeAuthorId } = opts;
    let total = 0;
    for (const m of this.db().messages.values()) {
      if (m.isDeleted || !sameTarget(m.target, target) || m.authorId === excludeAuthorId) continue;
      if (afterId !== null && compareIds(m.id, afterId) <= 0) continue;
      total += 1;
    }
    return total;
  }

  async search(_tx: unknown, opts: MessageSearch): Promise<Message[]> {
    const { beforeId, target, authorId } = opts;
    return [...this.db().messages.values()]
      .filter(
        (m) =>
          !m.isDeleted &&
          contains(m.content, opts.query) &&
          (target === undefined || sameTarget(m.target, target)) &&
          (authorId === undefined || m.authorId === authorId) &&
          (beforeId === undefined || compareIds(m.id, beforeId) < 0) &&
          this.readable(m.target, opts.viewerId),
      )
      .sort((a, b) => byId(b, a))
      .slice(0, opts.limit)
      .map((m) => ({ ...m }));
  }

  private readable(target: MessageTarget, userId: string): boolean {
    const { channels, memberships, conversations } = this.db();
    if (target.kind === 'channel') {
      const channel = channels.get(target.channelId);
      if (!channel) return false;
      return !channel.isPrivate || memberships.has(membershipKey(channel.id, userId));
    }
    const conversation = conversations.get(target.conversationId);
    return conversation !== undefined && (conversation.user1Id === userId || conversation.user2Id === userId);
  }
}

class MemoryReadReceiptRepository implements ReadReceiptRepository {
  constructor(
    private readonly db: StateRef,
    private readonly now: () => Date,
  ) {}

  async find(_tx: unknown, userId: string, target: MessageTarget): Promise<ReadReceipt | null> {
    const row = this.db().receipts.get(receiptKey(userId, target));
    return row ? { ...row } : null;
  }

  async advance(
    _tx: unknown,
    receipt: { userId: string; target: MessageTarget; lastReadMessageId: string },
  ): Promise<ReadReceipt> {
    const { receipts } = this.db();
    const key = receiptKey(receipt.userId, receipt.target);
    const existing = receipts.get(key);
    const lastReadMessageId =
      existing && compareIds(existing.lastReadMessageId, receipt.lastReadMessageId) > 0
        ? existing.lastReadMessageId
        : receipt.lastReadMessageId;
    const row: ReadReceipt = { ...receipt, lastReadMessageId, updatedAt: this.now() };
    receipts.set(key, row);
    return { ...row };
  }
}
