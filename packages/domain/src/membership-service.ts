import {
  type Channel,
  type ChannelMembership,
  type CreateChannelInput,
  type MemberRole,
  type UpdateChannelInput,
  normalizeChannelName,
  validateChannelInput,
  validateChannelUpdate,
} from './channel';
import { canManageChannel } from './permissions';
import {
  type ChannelPatch,
  type ChannelRepository,
  type MembershipRepository,
  type UserRepository,
  type SystemMessagePort,
  type WithTransaction,
  type DomainLogger,
} from './ports';
import { type FieldIssue } from './validation';

export interface MembershipServiceDeps {
  channelRepo: ChannelRepository;
  membershipRepo: MembershipRepository;
  userRepo: UserRepository;
  systemMessages: SystemMessagePort;
  generateId: () => string;
  generateInviteCode: () => string;
  withTransaction: WithTransaction;
  logger?: DomainLogger;
}

export interface JoinOptions {
  role?: MemberRole;
  inviteCode?: string | null;
}

export interface ChannelDetails {
  channel: Channel;
  /** The viewer's membership, null for a non-member of a public channel. */
  membership: ChannelMembership | null;
}

export class MembershipService {
  constructor(private readonly deps: MembershipServiceDeps) {}

  async createChannel(userId: string, input: CreateChannelInput): Promise<Channel> {
    const { channelRepo, membershipRepo, generateId, generateInviteCode } = this.deps;

    const issues = validateChannelInput(input);
    if (issues.length > 0) {
      throw new MembershipError('VALIDATION', 'Invalid channel', issues);
    }

    return this.deps.withTransaction(async (tx) => {
      const isPrivate = input.isPrivate ?? false;
      const channel = await channelRepo.create(tx, {
        id: generateId(),
        name: normalizeChannelName(input.name),
        description: input.description ?? null,
        topic: input.topic ?? null,
        isPrivate,
        createdBy: userId,
        maxMembers: input.maxMembers ?? null,
        inviteCode: isPrivate ? generateInviteCode() : null,
      });
      if (!channel) {
        throw new MembershipError('CONFLICT', 'Channel name is already taken', [
          { path: 'name', message: 'has already been taken' },
        ]);
      }

      await membershipRepo.add(tx, { channelId: channel.id, userId, role: 'owner' });
      return channel;
    });
  }

  /**
   * Adds a member. The channel row stays locked for the whole check-and-insert
   * so concurrent joins cannot overshoot `maxMembers`.
   */
  async join(channelId: string, userId: string, opts: JoinOptions = {}): Promise<ChannelMembership> {
    const { channelRepo, membershipRepo, userRepo } = this.deps;

    const { membership, username } = await this.deps.withTransaction(async (tx) => {
      const channel = await channelRepo.findByIdForUpdate(tx, channelId);
      if (!channel) {
        throw new MembershipError('NOT_FOUND', 'Channel not found');
      }
      const user = await userRepo.findById(tx, userId);
      if (!user) {
        throw new MembershipError('NOT_FOUND', 'User not found');
      }

      if (await membershipRepo.find(tx, channelId, userId)) {
        throw new MembershipError('ALREADY_MEMBER', 'Already a member of this channel');
      }
      if (channel.isArchived) {
        throw new MembershipError('ARCHIVED', 'Channel is archived');
      }
      if (channel.maxMembers !== null) {
        const count = await membershipRepo.count(tx, channelId);
        if (count >= channel.maxMembers) {
          throw new MembershipError('FULL', 'Channel is full');
        }
      }
      if (channel.isPrivate && (!opts.inviteCode || opts.inviteCode !== channel.inviteCode)) {
        throw new MembershipError('FORBIDDEN', 'Invite code required for private channels');
      }

      const added = await membershipRepo.add(tx, {
        channelId,
        userId,
        role: opts.role ?? 'member',
      });
      if (!added) {
        throw new MembershipError('ALREADY_MEMBER', 'Already a member of this channel');
      }
      return { membership: added, username: user.username };
    });

    await this.announce(channelId, `${username} joined the channel`, {
      action: 'member_joined',
      userId,
    });
    return membership;
  }

  async joinByInvite(inviteCode: string, userId: string): Promise<ChannelMembership> {
    const channel = await this.deps.withTransaction((tx) =>
      this.deps.channelRepo.findByInviteCode(tx, inviteCode),
    );
    if (!channel || !channel.isPrivate || channel.isArchived) {
      throw new MembershipError('NOT_FOUND', 'Invalid invite code');
    }
    return this.join(channel.id, userId, { role: 'member', inviteCode });
  }

  /**
   * Removes the membership. Ownership is not handed to anyone else, and an
   * archived channel gets no notice.
   */
  async leave(channelId: string, userId: string): Promise<void> {
    const { channelRepo, membershipRepo, userRepo } = this.deps;

    const { username, archived } = await this.deps.withTransaction(async (tx) => {
      const removed = await membershipRepo.remove(tx, channelId, userId);
      if (!removed) {
        throw new MembershipError('NOT_FOUND', 'Not a member of this channel');
      }
      const channel = await channelRepo.findById(tx, channelId);
      const user = await userRepo.findById(tx, userId);
      return { username: user?.username ?? 'unknown', archived: channel?.isArchived ?? true };
    });
    if (archived) return;

    await this.announce(channelId, `${username} left the channel`, {
      action: 'member_left',
      userId,
    });
  }

  async canAccessChannel(channelId: string, userId: string): Promise<boolean> {
    return this.deps.withTransaction(async (tx) => {
      const channel = await this.deps.channelRepo.findById(tx, channelId);
      if (!channel) return false;
      if (!channel.isPrivate) return true;
      return (await this.deps.membershipRepo.find(tx, channelId, userId)) !== null;
    });
  }

  async roleOf(channelId: string, userId: string): Promise<MemberRole | null> {
    const membership = await this.deps.withTransaction((tx) =>
      this.deps.membershipRepo.find(tx, channelId, userId),
    );
    return membership?.role ?? null;
  }

  async getChannel(channelId: string, userId: string): Promise<ChannelDetails> {
    return this.deps.withTransaction(async (tx) => {
      const channel = await this.deps.channelRepo.findById(tx, channelId);
      if (!channel) {
        throw new MembershipError('NOT_FOUND', 'Channel not found');
      }
      const membership = await this.deps.membershipRepo.find(tx, channelId, userId);
      if (channel.isPrivate && !membership) {
        throw new MembershipError('FORBIDDEN', 'Not a member of this channel');
      }
      return { channel, membership };
    });
  }

  /** Owners and admins edit name, description, topic and member limit of a live channel. */
  async updateChannel(userId: string, channelId: string, input: UpdateChannelInput): Promise<Channel> {
    const issues = validateChannelUpdate(input);
    if (issues.length > 0) {
      throw new MembershipError('VALIDATION', 'Invalid channel', issues);
    }
    const patch: ChannelPatch = {
      name: input.name === undefined ? undefined : normalizeChannelName(input.name),
      description: input.description,
      topic: input.topic,
      maxMembers: input.maxMembers,
    };

    return this.deps.withTransaction(async (tx) => {
      const channel = await this.requireManager(tx, channelId, userId);
      if (channel.isArchived) {
        throw new MembershipError('ARCHIVED', 'Channel is archived');
      }
      if (Object.values(patch).every((value) => value === undefined)) {
        return channel;
      }
      const updated = await this.deps.channelRepo.update(tx, channelId, patch);
      if (!updated) {
        throw new MembershipError('CONFLICT', 'Channel name is already taken', [
          { path: 'name', message: 'has already been taken' },
        ]);
      }
      return updated;
    });
  }

  /**
   * Owners and admins change the role of another member. Granting or taking
   * away `owner` is up to an owner.
   */
  async updateMemberRole(
    requesterId: string,
    channelId: string,
    targetUserId: string,
    role: MemberRole,
  ): Promise<ChannelMembership> {
    const { membershipRepo } = this.deps;

    if (requesterId === targetUserId) {
      throw new MembershipError('FORBIDDEN', 'Cannot change your own role');
    }

    return this.deps.withTransaction(async (tx) => {
      await this.requireManager(tx, channelId, requesterId);
      const requester = await membershipRepo.find(tx, channelId, requesterId);
      const target = await membershipRepo.find(tx, channelId, targetUserId);
      if (!target) {
        throw new MembershipError('NOT_FOUND', 'Not a member of this channel');
      }
      if ((role === 'owner' || target.role === 'owner') && requester?.role !== 'owner') {
        throw new MembershipError('FORBIDDEN', 'Only an owner can change ownership');
      }
      const updated = await membershipRepo.setRole(tx, channelId, targetUserId, role);
      if (!updated) {
        throw new MembershipError('NOT_FOUND', 'Not a member of this channel');
      }
      this.deps.logger?.info({ channelId, userId: targetUserId, role, by: requesterId }, 'Member role changed');
      return updated;
    });
  }

  async archiveChannel(userId: string, channelId: string, archived: boolean): Promise<Channel> {
    return this.deps.withTransaction(async (tx) => {
      await this.requireManager(tx, channelId, userId);
      const channel = await this.deps.channelRepo.setArchived(tx, channelId, archived);
      if (!channel) {
        throw new MembershipError('NOT_FOUND', 'Channel not found');
      }
      return channel;
    });
  }

  async regenerateInviteCode(userId: string, channelId: string): Promise<Channel> {
    return this.deps.withTransaction(async (tx) => {
      const channel = await this.requireManager(tx, channelId, userId);
      if (!channel.isPrivate) {
        throw new MembershipError('VALIDATION', 'Only private channels have invite codes');
      }
      const updated = await this.deps.channelRepo.setInviteCode(
        tx,
        channelId,
        this.deps.generateInviteCode(),
      );
      if (!updated) {
        throw new MembershipError('NOT_FOUND', 'Channel not found');
      }
      return updated;
    });
  }

  async listMembers(channelId: string, requesterId: string): Promise<ChannelMembership[]> {
    if (!(await this.canAccessChannel(channelId, requesterId))) {
      throw new MembershipError('FORBIDDEN', 'Cannot view members of this channel');
    }
    return this.deps.withTransaction((tx) => this.deps.membershipRepo.listByChannel(tx, channelId));
  }

  async listPublicChannels(): Promise<Channel[]> {
    return this.deps.withTransaction((tx) => this.deps.channelRepo.listPublic(tx));
  }

  async listUserChannels(userId: string): Promise<Channel[]> {
    return this.deps.withTransaction((tx) => this.deps.channelRepo.listForUser(tx, userId));
  }

  private async requireManager(tx: unknown, channelId: string, userId: string): Promise<Channel> {
    const channel = await this.deps.channelRepo.findById(tx, channelId);
    if (!channel) {
      throw new MembershipError('NOT_FOUND', 'Channel not found');
    }
    const membership = await this.deps.membershipRepo.find(tx, channelId, userId);
    if (!canManageChannel(membership?.role ?? null)) {
      throw new MembershipError('FORBIDDEN', 'Only owners and admins can manage this channel');
    }
    return channel;
  }

  // The membership change is already committed; a failed announcement is logged only.
  private async announce(
    channelId: string,
    content: string,
    metadata: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.deps.systemMessages.createSystem({ kind: 'channel', channelId }, content, metadata);
    } catch (err) {
      this.deps.logger?.warn(
        { channelId, action: metadata.action, err: err instanceof Error ? err.message : String(err) },
        'Failed to post membership notice',
      );
    }
  }
}

export type MembershipErrorKind =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'ALREADY_MEMBER'
  | 'ARCHIVED'
  | 'FULL'
  | 'FORBIDDEN'
  | 'CONFLICT';

export class MembershipError extends Error {
  constructor(
    public readonly kind: MembershipErrorKind,
    message: string,
    public readonly issues: FieldIssue[] = [],
  ) {
    super(message);
    this.name = 'MembershipError';
  }
}
