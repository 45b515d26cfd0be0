import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ConversationService,
  MembershipService,
  MessageService,
  ReadReceiptService,
  TokenManager,
  type User,
} from '@parley/domain';
import { OpaqueTokenService } from '@parley/shared';
import { MemoryDatabase } from '../memory';

const NOW = new Date('2026-03-01T09:00:00Z');

describe('MemoryDatabase', () => {
  let clock: Date;
  let db: MemoryDatabase;
  let seq: number;
  const generateId = () => String(++seq);

  async function addUser(username: string, id: string = generateId()): Promise<User> {
    const user = await db.withTransaction((tx) =>
      db.users.create(tx, {
        id,
        username,
        email: `${username}@example.com`,
        passwordHash: 'hashed',
        firstName: null,
        lastName: null,
      }),
    );
    if (!user) throw new Error(`could not create ${username}`);
    return user;
  }

  function services() {
    const messages = new MessageService({
      messageRepo: db.messages,
      channelRepo: db.channels,
      membershipRepo: db.memberships,
      conversationRepo: db.conversations,
      userRepo: db.users,
      broadcaster: { publish: vi.fn() },
      generateId,
      withTransaction: db.withTransaction,
      now: () => clock,
    });
    const membership = new MembershipService({
      channelRepo: db.channels,
      membershipRepo: db.memberships,
      userRepo: db.users,
      systemMessages: messages,
      generateId,
      generateInviteCode: () => `invite${++seq}`,
      withTransaction: db.withTransaction,
    });
    const conversations = new ConversationService({
      conversationRepo: db.conversations,
      userRepo: db.users,
      generateId,
      withTransaction: db.withTransaction,
    });
    const receipts = new ReadReceiptService({
      messageRepo: db.messages,
      readReceiptRepo: db.readReceipts,
      withTransaction: db.withTransaction,
    });
    return { messages, membership, conversations, receipts };
  }

  beforeEach(() => {
    clock = NOW;
    seq = 1000;
    db = new MemoryDatabase(() => clock);
  });

  describe('transactions', () => {
    it('rolls back every write of a failed transaction', async () => {
      await expect(
        db.withTransaction(async (tx) => {
          await db.users.create(tx, {
            id: '42',
            username: 'ghost',
            email: 'ghost@example.com',
            passwordHash: 'hashed',
            firstName: null,
            lastName: null,
          });
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      const user = await db.withTransaction((tx) => db.users.findById(tx, '42'));
      expect(user).toBeNull();
    });

    it('keeps running transactions after one fails', async () => {
      const failed = db.withTransaction(async () => {
        throw new Error('first');
      });
      const next = addUser('bob');

      await expect(failed).rejects.toThrow('first');
      await expect(next).resolves.toMatchObject({ username: 'bob' });
    });
  });

  describe('channel capacity', () => {
    it('never admits more members than maxMembers under concurrent joins', async () => {
      const { membership } = services();
      const owner = await addUser('owner');
      const channel = await membership.createChannel(owner.id, { name: 'small', maxMembers: 3 });
      const joiners = await Promise.all(['u1', 'u2', 'u3', 'u4', 'u5'].map((name) => addUser(name)));

      const results = await Promise.allSettled(joiners.map((u) => membership.join(channel.id, u.id)));

      const admitted = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
      expect(admitted).toHaveLength(2);
      expect(rejected).toHaveLength(3);
      for (const reason of rejected) {
        expect(reason).toMatchObject({ kind: 'FULL' });
      }
      const count = await db.withTransaction((tx) => db.memberships.count(tx, channel.id));
      expect(count).toBe(3);
    });

    it('posts a system notice for each admitted member', async () => {
      const { membership, messages } = services();
      const owner = await addUser('owner');
      const channel = await membership.createChannel(owner.id, { name: 'lobby' });
      await membership.join(channel.id, (await addUser('dana')).id);

      const page = await messages.list({ kind: 'channel', channelId: channel.id }, { limit: 10 });
      expect(page.messages).toHaveLength(1);
      expect(page.messages[0]).toMatchObject({
        kind: 'system',
        content: 'dana joined the channel',
        author: null,
      });
    });
  });

  describe('conversation identity', () => {
    it('resolves both orderings of a pair to one conversation ordered by numeric id', async () => {
      const { conversations } = services();
      await addUser('nine', '999');
      await addUser('thousand', '1000');

      const [first, second] = await Promise.all([
        conversations.findOrCreate('1000', '999'),
        conversations.findOrCreate('999', '1000'),
      ]);

      expect(first.id).toBe(second.id);
      expect(first.user1Id).toBe('999');
      expect(first.user2Id).toBe('1000');
      expect(await conversations.listForUser('999')).toHaveLength(1);
    });

    it('rejects a pair whose storage order is wrong', async () => {
      await expect(
        db.withTransaction((tx) =>
          db.conversations.insertIfAbsent(tx, { id: '1', user1Id: '1000', user2Id: '999' }),
        ),
      ).rejects.toThrow('check constraint');
    });
  });

  describe('history pagination', () => {
    it('walks the history newest first without gaps or overlaps', async () => {
      const { membership, messages } = services();
      const owner = await addUser('owner');
      const channel = await membership.createChannel(owner.id, { name: 'history' });
      const ids: string[] = [];
      for (let i = 0; i < 7; i++) {
        ids.push((await messages.create(owner.id, { channelId: channel.id, content: `m${i}` })).id);
      }
      const target = { kind: 'channel' as const, channelId: channel.id };

      const page1 = await messages.list(target, { limit: 3 });
      expect(page1.messages.map((m) => m.id)).toEqual([ids[6], ids[5], ids[4]]);
      expect(page1).toMatchObject({ hasMore: true, nextCursor: ids[4] });

      const page2 = await messages.list(target, { limit: 3, beforeId: ids[4] });
      expect(page2.messages.map((m) => m.id)).toEqual([ids[3], ids[2], ids[1]]);
      expect(page2).toMatchObject({ hasMore: true, nextCursor: ids[1] });

      const page3 = await messages.list(target, { limit: 3, beforeId: ids[1] });
      expect(page3.messages.map((m) => m.id)).toEqual([ids[0]]);
      expect(page3).toMatchObject({ hasMore: false, nextCursor: null });
    });

    it('leaves deleted messages out of history and counts replies', async () => {
      const { membership, messages } = services();
      const owner = await addUser('owner');
      const channel = await membership.createChannel(owner.id, { name: 'threads' });
      const root = await messages.create(owner.id, { channelId: channel.id, content: 'root' });
      await messages.create(owner.id, { channelId: channel.id, content: 'a', parentMessageId: root.id });
      const doomed = await messages.create(owner.id, {
        channelId: channel.id,
        content: 'b',
        parentMessageId: root.id,
      });
      await messages.delete(doomed.id, owner.id);

      const page = await messages.list({ kind: 'channel', channelId: channel.id }, { limit: 10 });
      expect(page.messages.map((m) => m.content)).toEqual(['a', 'root']);
      expect(page.messages[1].replyCount).toBe(1);

      const thread = await messages.thread(root.id, { limit: 10 });
      expect(thread.messages.map((m) => m.content)).toEqual(['a']);
    });
  });

  describe('search', () => {
    it('finds messages only where the viewer can read', async () => {
      const { membership, messages, conversations } = services();
      const owner = await addUser('owner');
      const friend = await addUser('friend');
      const outsider = await addUser('outsider');
      const lobby = await membership.createChannel(owner.id, { name: 'lobby' });
      const secret = await membership.createChannel(owner.id, { name: 'secret', isPrivate: true });
      const dm = await conversations.findOrCreate(owner.id, friend.id);
      await messages.create(owner.id, { channelId: lobby.id, content: 'Deploy at noon' });
      await messages.create(owner.id, { channelId: secret.id, content: 'deploy keys rotated' });
      await messages.create(friend.id, { directConversationId: dm.id, content: 'did the deploy work?' });
      await messages.create(owner.id, { channelId: lobby.id, content: 'lunch' });

      const forOwner = await messages.search(owner.id, { query: 'DEPLOY', limit: 10 });
      const forFriend = await messages.search(friend.id, { query: 'deploy', limit: 10 });
      const forOutsider = await messages.search(outsider.id, { query: 'deploy', limit: 10 });

      expect(forOwner.messages.map((m) => m.content)).toEqual([
        'did the deploy work?',
        'deploy keys rotated',
        'Deploy at noon',
      ]);
      expect(forFriend.messages.map((m) => m.content)).toEqual(['did the deploy work?', 'Deploy at noon']);
      expect(forOutsider.messages.map((m) => m.content)).toEqual(['Deploy at noon']);
    });

    it('narrows by channel and author', async () => {
      const { membership, messages } = services();
      const owner = await addUser('owner');
      const guest = await addUser('guest');
      const lobby = await membership.createChannel(owner.id, { name: 'lobby' });
      const other = await membership.createChannel(owner.id, { name: 'other' });
      await messages.create(owner.id, { channelId: lobby.id, content: 'ship it' });
      await messages.create(guest.id, { channelId: lobby.id, content: 'ship it too' });
      await messages.create(owner.id, { channelId: other.id, content: 'ship elsewhere' });

      const page = await messages.search(guest.id, {
        query: 'ship',
        target: { kind: 'channel', channelId: lobby.id },
        authorId: owner.id,
        limit: 10,
      });

      expect(page.messages.map((m) => m.content)).toEqual(['ship it']);
    });
  });

  describe('directory and channel settings', () => {
    it('lists and searches users by username order', async () => {
      await addUser('carol');
      await addUser('alice');
      await addUser('bob');

      const listed = await db.withTransaction((tx) => db.users.list(tx, { limit: 2, offset: 1 }));
      const byName = await db.withTransaction((tx) => db.users.search(tx, 'B', 10));
      const byEmail = await db.withTransaction((tx) => db.users.search(tx, 'carol@', 10));

      expect(listed.map((u) => u.username)).toEqual(['bob', 'carol']);
      expect(byName.map((u) => u.username)).toEqual(['bob']);
      expect(byEmail.map((u) => u.username)).toEqual(['carol']);
    });

    it('refuses to rename a channel onto a taken name', async () => {
      const { membership } = services();
      const owner = await addUser('owner');
      await membership.createChannel(owner.id, { name: 'taken' });
      const channel = await membership.createChannel(owner.id, { name: 'mine' });

      await expect(membership.updateChannel(owner.id, channel.id, { name: 'Taken' })).rejects.toMatchObject({
        kind: 'CONFLICT',
      });
      await expect(
        membership.updateChannel(owner.id, channel.id, { name: 'mine', topic: 'ours' }),
      ).resolves.toMatchObject({ name: 'mine', topic: 'ours' });
    });

    it('changes a member role in place', async () => {
      const { membership } = services();
      const owner = await addUser('owner');
      const member = await addUser('member');
      const channel = await membership.createChannel(owner.id, { name: 'roles' });
      await membership.join(channel.id, member.id);

      await membership.updateMemberRole(owner.id, channel.id, member.id, 'admin');

      expect(await membership.roleOf(channel.id, member.id)).toBe('admin');
    });
  });

  describe('read receipts', () => {
    it('counts unread messages from others and never moves backwards', async () => {
      const { membership, messages, receipts } = services();
      const owner = await addUser('owner');
      const reader = await addUser('reader');
      const channel = await membership.createChannel(owner.id, { name: 'news' });
      const target = { kind: 'channel' as const, channelId: channel.id };
      const first = await messages.create(owner.id, { channelId: channel.id, content: 'one' });
      const second = await messages.create(owner.id, { channelId: channel.id, content: 'two' });
      await messages.create(reader.id, { channelId: channel.id, content: 'mine' });

      expect(await receipts.unreadCount(target, reader.id)).toBe(2);

      await receipts.markRead(target, reader.id, second.id);
      const receipt = await receipts.markRead(target, reader.id, first.id);

      expect(receipt.lastReadMessageId).toBe(second.id);
      expect(await receipts.unreadCount(target, reader.id)).toBe(0);
    });
  });

  describe('token lifecycle', () => {
    let tokens: TokenManager;

    beforeEach(() => {
      tokens = new TokenManager({
        userRepo: db.users,
        authTokenRepo: db.authTokens,
        blacklistRepo: db.blacklist,
        tokenService: new OpaqueTokenService(),
        generateId,
        withTransaction: db.withTransaction,
        accessTokenTtlSeconds: 900,
        refreshTokenTtlSeconds: 3600,
        now: () => clock,
      });
    });

    it('rotates a refresh token exactly once', async () => {
      const user = await addUser('erin');
      const pair = await tokens.issuePair(user);

      const rotated = await tokens.rotate(pair.refreshToken);

      expect(rotated.user.id).toBe(user.id);
      await expect(tokens.rotate(pair.refreshToken)).rejects.toMatchObject({ kind: 'REVOKED' });
      await expect(tokens.verify(rotated.accessToken)).resolves.toMatchObject({ user: { id: user.id } });
    });

    it('expires access tokens after their ttl', async () => {
      const user = await addUser('finn');
      const pair = await tokens.issuePair(user);

      clock = new Date(NOW.getTime() + 901 * 1000);

      await expect(tokens.verify(pair.accessToken)).rejects.toMatchObject({ kind: 'EXPIRED' });
    });

    it('invalidates every outstanding token on revokeAll', async () => {
      const user = await addUser('gwen');
      const pair = await tokens.issuePair(user);

      await tokens.revokeAll(user.id, 'logout_all');

      await expect(tokens.verify(pair.accessToken)).rejects.toMatchObject({ kind: 'VERSION_MISMATCH' });
      await expect(tokens.rotate(pair.refreshToken)).rejects.toMatchObject({ kind: 'VERSION_MISMATCH' });
    });
  });
});
