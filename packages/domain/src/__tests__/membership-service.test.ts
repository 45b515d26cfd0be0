import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MembershipService, MembershipError, type MembershipServiceDeps } from '../membership-service';
import { type ChannelMembership, type MemberRole } from '../channel';
import { type ChannelPatch, type ChannelRepository, type MembershipRepository } from '../ports';
import { inTx, makeChannel, makeSystemMessage, makeUser } from './helpers';

type NewChannel = Parameters<ChannelRepository['create']>[1];
type NewMembership = Parameters<MembershipRepository['add']>[1];

function makeMembership(overrides: Partial<ChannelMembership> = {}): ChannelMembership {
  return {
    channelId: '500',
    userId: '100',
    role: 'member',
    joinedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

function createMockDeps(): MembershipServiceDeps {
  let idCounter = 2000;
  return {
    channelRepo: {
      create: vi.fn(async (_tx: unknown, c: NewChannel) => makeChannel({ ...c })),
      findById: vi.fn(async () => makeChannel()),
      findByIdForUpdate: vi.fn(async () => makeChannel()),
      findByInviteCode: vi.fn(async () => null),
      listPublic: vi.fn(async () => [makeChannel()]),
      listForUser: vi.fn(async () => []),
      setArchived: vi.fn(async () => makeChannel({ isArchived: true })),
      setInviteCode: vi.fn(async (_tx: unknown, _id: string, code: string) =>
        makeChannel({ isPrivate: true, inviteCode: code }),
      ),
      update: vi.fn(async (_tx: unknown, _id: string, patch: ChannelPatch) =>
        makeChannel({ name: patch.name ?? 'general', topic: patch.topic ?? null }),
      ),
    },
    membershipRepo: {
      add: vi.fn(async (_tx: unknown, m: NewMembership) => makeMembership(m)),
      remove: vi.fn(async () => true),
      find: vi.fn(async () => null),
      count: vi.fn(async () => 0),
      listByChannel: vi.fn(async () => []),
      setRole: vi.fn(async (_tx: unknown, channelId: string, userId: string, role: MemberRole) =>
        makeMembership({ channelId, userId, role }),
      ),
    },
    userRepo: {
      create: vi.fn(async () => null),
      findById: vi.fn(async () => makeUser({ id: '200', username: 'bob' })),
      findByIds: vi.fn(async () => []),
      findByEmail: vi.fn(async () => null),
      findByUsername: vi.fn(async () => null),
      incrementTokenVersion: vi.fn(async () => null),
      list: vi.fn(async () => []),
      search: vi.fn(async () => []),
    },
    systemMessages: {
      createSystem: vi.fn(async () => ({ ...makeSystemMessage(), author: null, replyCount: 0 })),
    },
    generateId: vi.fn(() => String(idCounter++)),
    generateInviteCode: vi.fn(() => 'Invite1234'),
    withTransaction: inTx,
    logger: { info: vi.fn(), warn: vi.fn() },
  };
}

describe('MembershipService', () => {
  let deps: MembershipServiceDeps;
  let service: MembershipService;

  beforeEach(() => {
    deps = createMockDeps();
    service = new MembershipService(deps);
  });

  function givenRoles(byUser: Record<string, MemberRole>): void {
    vi.mocked(deps.membershipRepo.find).mockImplementation(async (_tx, channelId, userId) => {
      const role = byUser[userId];
      return role ? makeMembership({ channelId, userId, role }) : null;
    });
  }

  describe('createChannel', () => {
    it('lowercases the name and makes the creator owner', async () => {
      const channel = await service.createChannel('100', { name: 'Dev-Ops', description: 'ops talk' });

      expect(channel.name).toBe('dev-ops');
      expect(channel.inviteCode).toBeNull();
      expect(deps.membershipRepo.add).toHaveBeenCalledWith({}, {
        channelId: '2000',
        userId: '100',
        role: 'owner',
      });
    });

    it('gives private channels an invite code', async () => {
      const channel = await service.createChannel('100', { name: 'secret', isPrivate: true });
      expect(channel.inviteCode).toBe('Invite1234');
    });

    it('rejects invalid names, long descriptions and member limits', async () => {
      await expect(
        service.createChannel('100', {
          name: 'no spaces',
          description: 'x'.repeat(251),
          maxMembers: 10_001,
        }),
      ).rejects.toMatchObject({
        kind: 'VALIDATION',
        issues: [
          { path: 'name', message: 'only letters, numbers, underscores, and hyphens allowed' },
          { path: 'description', message: 'must be at most 250 characters' },
          { path: 'maxMembers', message: 'must be between 1 and 10000' },
        ],
      });
    });

    it('reports a taken name as a conflict', async () => {
      vi.mocked(deps.channelRepo.create).mockResolvedValueOnce(null);
      await expect(service.createChannel('100', { name: 'general' })).rejects.toMatchObject({
        kind: 'CONFLICT',
      });
    });
  });

  describe('join', () => {
    it('adds a member and announces it', async () => {
      const membership = await service.join('500', '200');

      expect(membership).toMatchObject({ channelId: '500', userId: '200', role: 'member' });
      expect(deps.systemMessages.createSystem).toHaveBeenCalledWith(
        { kind: 'channel', channelId: '500' },
        'bob joined the channel',
        { action: 'member_joined', userId: '200' },
      );
    });

    it('locks the channel row for the capacity check', async () => {
      await service.join('500', '200');
      expect(deps.channelRepo.findByIdForUpdate).toHaveBeenCalledWith({}, '500');
      expect(deps.channelRepo.findById).not.toHaveBeenCalled();
    });

    it('fails NOT_FOUND for a missing channel', async () => {
      vi.mocked(deps.channelRepo.findByIdForUpdate).mockResolvedValueOnce(null);
      await expect(service.join('404', '200')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });

    it('fails ALREADY_MEMBER before any other check', async () => {
      vi.mocked(deps.channelRepo.findByIdForUpdate).mockResolvedValueOnce(
        makeChannel({ isArchived: true, maxMembers: 1 }),
      );
      vi.mocked(deps.membershipRepo.find).mockResolvedValueOnce(makeMembership({ userId: '200' }));

      await expect(service.join('500', '200')).rejects.toMatchObject({ kind: 'ALREADY_MEMBER' });
    });

    it('fails ARCHIVED for an archived channel', async () => {
      vi.mocked(deps.channelRepo.findByIdForUpdate).mockResolvedValueOnce(makeChannel({ isArchived: true }));
      await expect(service.join('500', '200')).rejects.toMatchObject({ kind: 'ARCHIVED' });
    });

    it('fails FULL at capacity, even for a private channel with a wrong code', async () => {
      vi.mocked(deps.channelRepo.findByIdForUpdate).mockResolvedValueOnce(
        makeChannel({ isPrivate: true, inviteCode: 'abc', maxMembers: 1 }),
      );
      vi.mocked(deps.membershipRepo.count).mockResolvedValueOnce(1);

      await expect(service.join('500', '200', { inviteCode: 'wrong' })).rejects.toMatchObject({
        kind: 'FULL',
      });
    });

    it('requires the invite code of a private channel', async () => {
      vi.mocked(deps.channelRepo.findByIdForUpdate).mockResolvedValue(
        makeChannel({ isPrivate: true, inviteCode: 'abc' }),
      );

      await expect(service.join('500', '200')).rejects.toMatchObject({ kind: 'FORBIDDEN' });
      await expect(service.join('500', '200', { inviteCode: 'abd' })).rejects.toMatchObject({
        kind: 'FORBIDDEN',
      });
      await expect(service.join('500', '200', { inviteCode: 'abc' })).resolves.toMatchObject({
        userId: '200',
      });
    });

    it('maps a lost insert race to ALREADY_MEMBER', async () => {
      vi.mocked(deps.membershipRepo.add).mockResolvedValueOnce(null);
      await expect(service.join('500', '200')).rejects.toMatchObject({ kind: 'ALREADY_MEMBER' });
      expect(deps.systemMessages.createSystem).not.toHaveBeenCalled();
    });

    it('keeps the membership when the announcement fails', async () => {
      vi.mocked(deps.systemMessages.createSystem).mockRejectedValueOnce(new Error('db down'));

      await expect(service.join('500', '200')).resolves.toMatchObject({ userId: '200' });
      expect(deps.logger?.warn).toHaveBeenCalledOnce();
    });
  });

  describe('joinByInvite', () => {
    it('joins the private channel behind the code', async () => {
      const channel = makeChannel({ id: '501', isPrivate: true, inviteCode: 'abc' });
      vi.mocked(deps.channelRepo.findByInviteCode).mockResolvedValueOnce(channel);
      vi.mocked(deps.channelRepo.findByIdForUpdate).mockResolvedValueOnce(channel);

      await expect(service.joinByInvite('abc', '200')).resolves.toMatchObject({ role: 'member' });
    });

    it('rejects unknown codes and archived channels', async () => {
      await expect(service.joinByInvite('zzz', '200')).rejects.toBeInstanceOf(MembershipError);

      vi.mocked(deps.channelRepo.findByInviteCode).mockResolvedValueOnce(
        makeChannel({ isPrivate: true, inviteCode: 'abc', isArchived: true }),
      );
      await expect(service.joinByInvite('abc', '200')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });
  });

  describe('leave', () => {
    it('removes the membership and announces it', async () => {
      await service.leave('500', '200');

      expect(deps.membershipRepo.remove).toHaveBeenCalledWith({}, '500', '200');
      expect(deps.systemMessages.createSystem).toHaveBeenCalledWith(
        { kind: 'channel', channelId: '500' },
        'bob left the channel',
        { action: 'member_left', userId: '200' },
      );
    });

    it('fails NOT_FOUND for a non-member', async () => {
      vi.mocked(deps.membershipRepo.remove).mockResolvedValueOnce(false);
      await expect(service.leave('500', '200')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });

    it('leaves an archived channel without posting into it', async () => {
      vi.mocked(deps.channelRepo.findById).mockResolvedValueOnce(makeChannel({ isArchived: true }));

      await service.leave('500', '200');

      expect(deps.membershipRepo.remove).toHaveBeenCalledWith({}, '500', '200');
      expect(deps.systemMessages.createSystem).not.toHaveBeenCalled();
      expect(deps.logger?.warn).not.toHaveBeenCalled();
    });
  });

  describe('canAccessChannel', () => {
    it('allows anyone into a public channel', async () => {
      await expect(service.canAccessChannel('500', '999')).resolves.toBe(true);
    });

    it('allows only members into a private channel', async () => {
      vi.mocked(deps.channelRepo.findById).mockResolvedValue(makeChannel({ isPrivate: true }));
      await expect(service.canAccessChannel('500', '999')).resolves.toBe(false);

      vi.mocked(deps.membershipRepo.find).mockResolvedValueOnce(makeMembership({ userId: '999' }));
      await expect(service.canAccessChannel('500', '999')).resolves.toBe(true);
    });

    it('denies a missing channel', async () => {
      vi.mocked(deps.channelRepo.findById).mockResolvedValueOnce(null);
      await expect(service.canAccessChannel('404', '100')).resolves.toBe(false);
    });
  });

  it('reports the role of a member and null otherwise', async () => {
    vi.mocked(deps.membershipRepo.find).mockResolvedValueOnce(makeMembership({ role: 'admin' }));
    await expect(service.roleOf('500', '100')).resolves.toBe('admin');
    await expect(service.roleOf('500', '100')).resolves.toBeNull();
  });

  describe('management', () => {
    it('lets an admin archive the channel', async () => {
      vi.mocked(deps.membershipRepo.find).mockResolvedValueOnce(makeMembership({ role: 'admin' }));

      const channel = await service.archiveChannel('100', '500', true);

      expect(channel.isArchived).toBe(true);
      expect(deps.channelRepo.setArchived).toHaveBeenCalledWith({}, '500', true);
    });

    it('forbids plain members from archiving', async () => {
      vi.mocked(deps.membershipRepo.find).mockResolvedValueOnce(makeMembership());
      await expect(service.archiveChannel('100', '500', true)).rejects.toMatchObject({
        kind: 'FORBIDDEN',
      });
    });

    it('regenerates the invite code of a private channel', async () => {
      vi.mocked(deps.channelRepo.findById).mockResolvedValueOnce(makeChannel({ isPrivate: true }));
      vi.mocked(deps.membershipRepo.find).mockResolvedValueOnce(makeMembership({ role: 'owner' }));
      vi.mocked(deps.generateInviteCode).mockReturnValueOnce('Fresh56789');

      const channel = await service.regenerateInviteCode('100', '500');
      expect(channel.inviteCode).toBe('Fresh56789');
    });

    it('refuses invite codes for public channels', async () => {
      vi.mocked(deps.membershipRepo.find).mockResolvedValueOnce(makeMembership({ role: 'owner' }));
      await expect(service.regenerateInviteCode('100', '500')).rejects.toMatchObject({
        kind: 'VALIDATION',
      });
    });
  });

  describe('getChannel', () => {
    it('shows a public channel to a non-member', async () => {
      await expect(service.getChannel('500', '999')).resolves.toEqual({
        channel: makeChannel(),
        membership: null,
      });
    });

    it('includes the membership of the viewer', async () => {
      vi.mocked(deps.channelRepo.findById).mockResolvedValueOnce(makeChannel({ isPrivate: true }));
      vi.mocked(deps.membershipRepo.find).mockResolvedValueOnce(makeMembership({ role: 'admin' }));

      const { membership } = await service.getChannel('500', '100');

      expect(membership?.role).toBe('admin');
    });

    it('hides a private channel from non-members', async () => {
      vi.mocked(deps.channelRepo.findById).mockResolvedValueOnce(makeChannel({ isPrivate: true }));
      await expect(service.getChannel('500', '999')).rejects.toMatchObject({ kind: 'FORBIDDEN' });
    });

    it('fails NOT_FOUND for an unknown channel', async () => {
      vi.mocked(deps.channelRepo.findById).mockResolvedValueOnce(null);
      await expect(service.getChannel('404', '100')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });
  });

  describe('updateChannel', () => {
    beforeEach(() => {
      givenRoles({ '100': 'admin' });
    });

    it('normalizes the name and keeps fields that were not sent', async () => {
      const channel = await service.updateChannel('100', '500', { name: ' Random ', topic: 'chat' });

      expect(deps.channelRepo.update).toHaveBeenCalledWith({}, '500', {
        name: 'random',
        description: undefined,
        topic: 'chat',
        maxMembers: undefined,
      });
      expect(channel).toMatchObject({ name: 'random', topic: 'chat' });
    });

    it('reports a taken name as CONFLICT', async () => {
      vi.mocked(deps.channelRepo.update).mockResolvedValueOnce(null);
      await expect(service.updateChannel('100', '500', { name: 'random' })).rejects.toMatchObject({
        kind: 'CONFLICT',
        issues: [{ path: 'name', message: 'has already been taken' }],
      });
    });

    it('validates before touching storage', async () => {
      await expect(
        service.updateChannel('100', '500', { name: 'no spaces', maxMembers: 0 }),
      ).rejects.toMatchObject({
        kind: 'VALIDATION',
        issues: [
          { path: 'name', message: 'only letters, numbers, underscores, and hyphens allowed' },
          { path: 'maxMembers', message: 'must be between 1 and 10000' },
        ],
      });
      expect(deps.channelRepo.findById).not.toHaveBeenCalled();
    });

    it('refuses to edit an archived channel', async () => {
      vi.mocked(deps.channelRepo.findById).mockResolvedValueOnce(makeChannel({ isArchived: true }));
      await expect(service.updateChannel('100', '500', { topic: 'late' })).rejects.toMatchObject({
        kind: 'ARCHIVED',
      });
    });

    it('returns the channel unchanged for an empty patch', async () => {
      await expect(service.updateChannel('100', '500', {})).resolves.toEqual(makeChannel());
      expect(deps.channelRepo.update).not.toHaveBeenCalled();
    });

    it('forbids plain members', async () => {
      givenRoles({ '100': 'member' });
      await expect(service.updateChannel('100', '500', { topic: 'mine' })).rejects.toMatchObject({
        kind: 'FORBIDDEN',
      });
    });
  });

  describe('updateMemberRole', () => {
    it('lets an admin promote a member', async () => {
      givenRoles({ '100': 'admin', '200': 'member' });

      const membership = await service.updateMemberRole('100', '500', '200', 'admin');

      expect(membership).toMatchObject({ userId: '200', role: 'admin' });
      expect(deps.membershipRepo.setRole).toHaveBeenCalledWith({}, '500', '200', 'admin');
    });

    it('leaves ownership changes to owners', async () => {
      givenRoles({ '100': 'admin', '200': 'member', '300': 'owner' });

      await expect(service.updateMemberRole('100', '500', '200', 'owner')).rejects.toMatchObject({
        kind: 'FORBIDDEN',
      });
      await expect(service.updateMemberRole('100', '500', '300', 'member')).rejects.toMatchObject({
        kind: 'FORBIDDEN',
      });
      expect(deps.membershipRepo.setRole).not.toHaveBeenCalled();
    });

    it('lets an owner hand over ownership', async () => {
      givenRoles({ '100': 'owner', '200': 'admin' });
      await expect(service.updateMemberRole('100', '500', '200', 'owner')).resolves.toMatchObject({
        role: 'owner',
      });
    });

    it('forbids members and self-changes', async () => {
      givenRoles({ '100': 'member', '200': 'member' });

      await expect(service.updateMemberRole('100', '500', '200', 'admin')).rejects.toMatchObject({
        kind: 'FORBIDDEN',
      });
      await expect(service.updateMemberRole('200', '500', '200', 'admin')).rejects.toThrow(
        'Cannot change your own role',
      );
    });

    it('fails NOT_FOUND for a non-member target', async () => {
      givenRoles({ '100': 'owner' });
      await expect(service.updateMemberRole('100', '500', '999', 'admin')).rejects.toMatchObject({
        kind: 'NOT_FOUND',
      });
    });
  });

  it('lists members only for users who can see the channel', async () => {
    vi.mocked(deps.channelRepo.findById).mockResolvedValueOnce(makeChannel({ isPrivate: true }));
    await expect(service.listMembers('500', '999')).rejects.toMatchObject({ kind: 'FORBIDDEN' });
  });
});
