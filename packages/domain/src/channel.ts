import { type FieldIssue } from './validation';

export type MemberRole = 'owner' | 'admin' | 'member';

export interface Channel {
  id: string;
  name: string;
  description: string | null;
  topic: string | null;
  isPrivate: boolean;
  isArchived: boolean;
  createdBy: string;
  maxMembers: number | null;
  inviteCode: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChannelMembership {
  channelId: string;
  userId: string;
  role: MemberRole;
  joinedAt: Date;
}

export interface CreateChannelInput {
  name: string;
  description?: string | null;
  topic?: string | null;
  isPrivate?: boolean;
  maxMembers?: number | null;
}

/** Fields left undefined keep their stored value. */
export interface UpdateChannelInput {
  name?: string;
  description?: string | null;
  topic?: string | null;
  maxMembers?: number | null;
}

export const CHANNEL_NAME_MAX = 80;
export const CHANNEL_DESCRIPTION_MAX = 250;
export const CHANNEL_MEMBERS_MAX = 10_000;

const CHANNEL_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export function normalizeChannelName(name: string): string {
  return name.trim().toLowerCase();
}

export function validateChannelInput(input: CreateChannelInput): FieldIssue[] {
  return [...validateName(input.name), ...validateDetails(input)];
}

export function validateChannelUpdate(input: UpdateChannelInput): FieldIssue[] {
  return [...(input.name === undefined ? [] : validateName(input.name)), ...validateDetails(input)];
}

function validateName(raw: string): FieldIssue[] {
  const name = raw.trim();
  if (name.length < 1 || name.length > CHANNEL_NAME_MAX) {
    return [{ path: 'name', message: `must be 1-${CHANNEL_NAME_MAX} characters` }];
  }
  if (!CHANNEL_NAME_PATTERN.test(name)) {
    return [{ path: 'name', message: 'only letters, numbers, underscores, and hyphens allowed' }];
  }
  return [];
}

function validateDetails(input: UpdateChannelInput): FieldIssue[] {
  const issues: FieldIssue[] = [];
  if (input.description && input.description.length > CHANNEL_DESCRIPTION_MAX) {
    issues.push({ path: 'description', message: `must be at most ${CHANNEL_DESCRIPTION_MAX} characters` });
  }
  if (input.maxMembers !== undefined && input.maxMembers !== null) {
    if (!Number.isInteger(input.maxMembers) || input.maxMembers < 1 || input.maxMembers > CHANNEL_MEMBERS_MAX) {
      issues.push({ path: 'maxMembers', message: `must be between 1 and ${CHANNEL_MEMBERS_MAX}` });
    }
  }
  return issues;
}
