import { compareIds } from './ids';

export interface DirectConversation {
  id: string;
  user1Id: string;
  user2Id: string;
  lastMessageAt: Date | null;
  isArchivedByUser1: boolean;
  isArchivedByUser2: boolean;
  createdAt: Date;
}

export type ConversationSide = 'user1' | 'user2';

/** The stored orientation of a pair: lower id first. */
export function canonicalPair(a: string, b: string): [string, string] {
  return compareIds(a, b) <= 0 ? [a, b] : [b, a];
}

export function sideOf(conversation: DirectConversation, userId: string): ConversationSide | null {
  if (conversation.user1Id === userId) return 'user1';
  if (conversation.user2Id === userId) return 'user2';
  return null;
}

export function otherParticipant(conversation: DirectConversation, userId: string): string | null {
  const side = sideOf(conversation, userId);
  if (side === 'user1') return conversation.user2Id;
  if (side === 'user2') return conversation.user1Id;
  return null;
}

export function isArchivedFor(conversation: DirectConversation, side: ConversationSide): boolean {
  return side === 'user1' ? conversation.isArchivedByUser1 : conversation.isArchivedByUser2;
}
