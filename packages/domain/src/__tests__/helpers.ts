import { type User } from '../user';
import { type Channel } from '../channel';
import { type DirectConversation } from '../conversation';
import { type UserMessage, type SystemMessage } from '../message';
import { type WithTransaction } from '../ports';

export const inTx: WithTransaction = (fn) => fn({});

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: '100',
    username: 'alice',
    email: 'alice@example.com',
    passwordHash: 'hashed:Password1',
    firstName: null,
    lastName: null,
    avatarUrl: null,
    status: 'offline',
    tokenVersion: 1,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function makeChannel(overrides: Partial<Channel> = {}): Channel {
  return {
    id: '500',
    name: 'general',
    description: null,
    topic: null,
    isPrivate: false,
    isArchived: false,
    createdBy: '100',
    maxMembers: null,
    inviteCode: null,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function makeConversation(overrides: Partial<DirectConversation> = {}): DirectConversation {
  return {
    id: '700',
    user1Id: '100',
    user2Id: '200',
    lastMessageAt: null,
    isArchivedByUser1: false,
    isArchivedByUser2: false,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

export function makeMessage(overrides: Partial<UserMessage> = {}): UserMessage {
  return {
    kind: 'user',
    type: 'text',
    id: '900',
    target: { kind: 'channel', channelId: '500' },
    authorId: '100',
    content: 'hello',
    parentMessageId: null,
    editedAt: null,
    isDeleted: false,
    metadata: {},
    attachments: [],
    createdAt: new Date('2026-01-02T00:00:00Z'),
    updatedAt: new Date('2026-01-02T00:00:00Z'),
    ...overrides,
  };
}

export function makeSystemMessage(overrides: Partial<SystemMessage> = {}): SystemMessage {
  return {
    kind: 'system',
    type: 'system',
    id: '901',
    target: { kind: 'channel', channelId: '500' },
    authorId: null,
    content: 'alice joined the channel',
    parentMessageId: null,
    editedAt: null,
    isDeleted: false,
    metadata: { action: 'member_joined', userId: '100' },
    attachments: [],
    createdAt: new Date('2026-01-02T00:00:00Z'),
    updatedAt: new Date('2026-01-02T00:00:00Z'),
    ...overrides,
  };
}
