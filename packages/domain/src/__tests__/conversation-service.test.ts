import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConversationService, ConversationError, type ConversationServiceDeps } from '../conversation-service';
import { type ConversationRepository } from '../ports';
import { inTx, makeConversation, makeUser } from './helpers';

type NewConversation = Parameters<ConversationRepository['insertIfAbsent']>[1];

function createMockDeps(): ConversationServiceDeps {
  return {
    conversationRepo: {
      findByPair: vi.fn(async () => null),
      insertIfAbsent: vi.fn(async (_tx: unknown, c: NewConversation) => makeConversation({ ...c })),
      findById: vi.fn(async () => makeConversation()),
      setArchived: vi.fn(async () => makeConversation({ isArchivedByUser2: true })),
      touchLastMessage: vi.fn(async () => {}),
      listForUser: vi.fn(async () => []),
    },
    userRepo: {
      create: vi.fn(async () => null),
      findById: vi.fn(async () => null),
      findByIds: vi.fn(async (_tx: unknown, ids: string[]) => ids.map((id) => makeUser({ id }))),
      findByEmail: vi.fn(async () => null),
      findByUsername: vi.fn(async () => null),
      incrementTokenVersion: vi.fn(async () => null),
      list: vi.fn(async () => []),
      search: vi.fn(async () => []),
    },
    generateId: vi.fn(() => '7000'),
    withTransaction: inTx,
  };
}

describe('ConversationService', () => {
  let deps: ConversationServiceDeps;
  let service: ConversationService;

  beforeEach(() => {
    deps = createMockDeps();
    service = new ConversationService(deps);
  });

  describe('findOrCreate', () => {
    it('stores the pair lower id first whichever side starts it', async () => {
      const conversation = await service.findOrCreate('1000', '999');

      expect(deps.conversationRepo.findByPair).toHaveBeenCalledWith({}, '999', '1000');
      expect(deps.conversationRepo.insertIfAbsent).toHaveBeenCalledWith({}, {
        id: '7000',
        user1Id: '999',
        user2Id: '1000',
      });
      expect(conversation).toMatchObject({ user1Id: '999', user2Id: '1000' });
    });

    it('returns the existing conversation', async () => {
      const existing = makeConversation({ id: '701' });
      vi.mocked(deps.conversationRepo.findByPair).mockResolvedValueOnce(existing);

      await expect(service.findOrCreate('200', '100')).resolves.toBe(existing);
      expect(deps.conversationRepo.insertIfAbsent).not.toHaveBeenCalled();
    });

    it('returns the row of a concurrent creator that won the insert', async () => {
      const winner = makeConversation({ id: '702' });
      vi.mocked(deps.conversationRepo.findByPair).mockResolvedValueOnce(null).mockResolvedValueOnce(winner);
      vi.mocked(deps.conversationRepo.insertIfAbsent).mockResolvedValueOnce(null);

      await expect(service.findOrCreate('100', '200')).resolves.toBe(winner);
    });

    it('refuses a conversation with yourself', async () => {
      await expect(service.findOrCreate('100', '100')).rejects.toMatchObject({ kind: 'VALIDATION' });
    });

    it('refuses an unknown participant', async () => {
      vi.mocked(deps.userRepo.findByIds).mockResolvedValueOnce([makeUser({ id: '100' })]);
      await expect(service.findOrCreate('100', '404')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });
  });

  describe('get', () => {
    it('returns the conversation to a participant', async () => {
      await expect(service.get('700', '200')).resolves.toMatchObject({ id: '700' });
    });

    it('forbids outsiders and reports missing conversations', async () => {
      await expect(service.get('700', '300')).rejects.toBeInstanceOf(ConversationError);
      await expect(service.get('700', '300')).rejects.toMatchObject({ kind: 'FORBIDDEN' });

      vi.mocked(deps.conversationRepo.findById).mockResolvedValueOnce(null);
      await expect(service.get('404', '100')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });
  });

  it('grants access to participants only', async () => {
    await expect(service.canAccessConversation('700', '100')).resolves.toBe(true);
    await expect(service.canAccessConversation('700', '300')).resolves.toBe(false);
  });

  it('archives only the caller’s side', async () => {
    await service.archiveFor('700', '200', true);
    expect(deps.conversationRepo.setArchived).toHaveBeenCalledWith({}, '700', 'user2', true);

    await expect(service.archiveFor('700', '300', true)).rejects.toMatchObject({ kind: 'FORBIDDEN' });
  });

  it('lists unarchived conversations by latest activity', async () => {
    vi.mocked(deps.conversationRepo.listForUser).mockResolvedValueOnce([
      makeConversation({ id: '701', createdAt: new Date('2026-01-01T00:00:00Z') }),
      makeConversation({ id: '702', lastMessageAt: new Date('2026-01-05T00:00:00Z') }),
      makeConversation({ id: '703', isArchivedByUser1: true, lastMessageAt: new Date('2026-01-09T00:00:00Z') }),
      makeConversation({ id: '704', isArchivedByUser2: true, lastMessageAt: new Date('2026-01-03T00:00:00Z') }),
    ]);

    const list = await service.listForUser('100');

    expect(list.map((c) => c.id)).toEqual(['702', '704', '701']);
  });
});
