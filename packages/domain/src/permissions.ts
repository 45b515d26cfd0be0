import { type MemberRole } from './channel';
import { type Message } from './message';

const ROLE_HIERARCHY: Record<MemberRole, number> = {
  owner: 3,
  admin: 2,
  member: 1,
};

export function hasRole(userRole: MemberRole, requiredRole: MemberRole): boolean {
  return ROLE_HIERARCHY[userRole] >= ROLE_HIERARCHY[requiredRole];
}

export function canManageChannel(role: MemberRole | null): boolean {
  return role !== null && hasRole(role, 'admin');
}

/** Only the author edits, and system messages have none. */
export function canEdit(message: Message, userId: string): boolean {
  return message.kind === 'user' && message.authorId === userId;
}

/**
 * Authors delete their own messages. In channels an owner or admin may also
 * delete; conversation messages are author-only.
 */
export function canDelete(message: Message, userId: string, role: MemberRole | null): boolean {
  if (message.authorId === userId) return true;
  return message.target.kind === 'channel' && canManageChannel(role);
}
