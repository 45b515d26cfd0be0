import { type DirectConversation, canonicalPair, sideOf, isArchivedFor } from './conversation';
import { compareIds } from './ids';
import {
  type ConversationRepository,
  type UserRepository,
  type WithTransaction,
} from './ports';

export interface ConversationServiceDeps {
  conversationRepo: ConversationRepository;
  userRepo: UserRepository;
  generateId: () => string;
  withTransaction: WithTransaction;
}

export class ConversationService {
  constructor(private readonly deps: ConversationServiceDeps) {}

  /**
   * Returns the single conversation for the unordered pair, creating it on
   * first use. A concurrent creator winning the insert is not an error: the
   * row it wrote is returned.
   */
  async findOrCreate(userA: string, userB: string): Promise<DirectConversation> {
    if (userA === userB) {
      throw new ConversationError('VALIDATION', 'Cannot start a conversation with yourself');
    }
    const { conversationRepo, userRepo, generateId } = this.deps;
    const [user1Id, user2Id] = canonicalPair(userA, userB);

    return this.deps.withTransaction(async (tx) => {
      const existing = await conversationRepo.findByPair(tx, user1Id, user2Id);
      if (existing) return existing;

      const users = await userRepo.findByIds(tx, [user1Id, user2Id]);
      if (users.length < 2) {
        throw new ConversationError('NOT_FOUND', 'User not found');
      }

      const inserted = await conversationRepo.insertIfAbsent(tx, { id: generateId(), user1Id, user2Id });
      if (inserted) return inserted;

      const winner = await conversationRepo.findByPair(tx, user1Id, user2Id);
      if (!winner) {
        throw new Error(`Conversation for ${user1Id}/${user2Id} vanished after insert conflict`);
      }
      return winner;
    });
  }

  async get(conversationId: string, userId: string): Promise<DirectConversation> {
    const conversation = await this.deps.withTransaction((tx) =>
      this.deps.conversationRepo.findById(tx, conversationId),
    );
    if (!conversation) {
      throw new ConversationError('NOT_FOUND', 'Conversation not found');
    }
    if (!sideOf(conversation, userId)) {
      throw new ConversationError('FORBIDDEN', 'Not a participant of this conversation');
    }
    return conversation;
  }

  async canAccessConversation(conversationId: string, userId: string): Promise<boolean> {
    const conversation = await this.deps.withTransaction((tx) =>
      this.deps.conversationRepo.findById(tx, conversationId),
    );
    return conversation !== null && sideOf(conversation, userId) !== null;
  }

  /** Archives (or restores) the conversation for the caller's side only. */
  async archiveFor(conversationId: string, userId: string, archived: boolean): Promise<DirectConversation> {
    const { conversationRepo } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const conversation = await conversationRepo.findById(tx, conversationId);
      if (!conversation) {
        throw new ConversationError('NOT_FOUND', 'Conversation not found');
      }
      const side = sideOf(conversation, userId);
      if (!side) {
        throw new ConversationError('FORBIDDEN', 'Not a participant of this conversation');
      }
      const updated = await conversationRepo.setArchived(tx, conversationId, side, archived);
      if (!updated) {
        throw new ConversationError('NOT_FOUND', 'Conversation not found');
      }
      return updated;
    });
  }

  /** Conversations the user has not archived, most recent activity first. */
  async listForUser(userId: string): Promise<DirectConversation[]> {
    const all = await this.deps.withTransaction((tx) =>
      this.deps.conversationRepo.listForUser(tx, userId),
    );
    return all
      .filter((c) => {
        const side = sideOf(c, userId);
        return side !== null && !isArchivedFor(c, side);
      })
      .sort(byRecentActivity);
  }
}

function byRecentActivity(a: DirectConversation, b: DirectConversation): number {
  const at = (a.lastMessageAt ?? a.createdAt).getTime();
  const bt = (b.lastMessageAt ?? b.createdAt).getTime();
  if (at !== bt) return bt - at;
  return compareIds(b.id, a.id);
}

export class ConversationError extends Error {
  constructor(
    public readonly kind: 'VALIDATION' | 'NOT_FOUND' | 'FORBIDDEN',
    message: string,
  ) {
    super(message);
    this.name = 'ConversationError';
  }
}
