import { type UserSummary } from './user';

export type MessageTarget =
  | { kind: 'channel'; channelId: string }
  | { kind: 'conversation'; conversationId: string };

export type UserMessageType = 'text' | 'image' | 'file' | 'thread';
export type MessageType = UserMessageType | 'system';

export const USER_MESSAGE_TYPES: readonly UserMessageType[] = ['text', 'image', 'file', 'thread'];
export const MESSAGE_CONTENT_MAX = 4000;
export const MAX_ATTACHMENTS = 5;
export const DELETED_CONTENT = '[deleted]';

/** Opaque descriptor of an uploaded file; the bytes live elsewhere. */
export interface Attachment {
  url: string;
  type: string;
  size: number;
}

interface MessageBase {
  id: string;
  target: MessageTarget;
  content: string;
  parentMessageId: string | null;
  editedAt: Date | null;
  isDeleted: boolean;
  metadata: Record<string, unknown>;
  attachments: Attachment[];
  createdAt: Date;
  updatedAt: Date;
}

export interface UserMessage extends MessageBase {
  kind: 'user';
  type: UserMessageType;
  authorId: string;
}

export interface SystemMessage extends MessageBase {
  kind: 'system';
  type: 'system';
  authorId: null;
}

export type Message = UserMessage | SystemMessage;

export type MessageView = Message & {
  author: UserSummary | null;
  replyCount: number;
};

export type NewMessage =
  | {
      kind: 'user';
      id: string;
      target: MessageTarget;
      authorId: string;
      type: UserMessageType;
      content: string;
      parentMessageId: string | null;
      attachments: Attachment[];
      metadata: Record<string, unknown>;
    }
  | {
      kind: 'system';
      id: string;
      target: MessageTarget;
      content: string;
      metadata: Record<string, unknown>;
    };

export function isUserMessageType(value: string): value is UserMessageType {
  return USER_MESSAGE_TYPES.some((t) => t === value);
}

export function sameTarget(a: MessageTarget, b: MessageTarget): boolean {
  if (a.kind === 'channel' && b.kind === 'channel') return a.channelId === b.channelId;
  if (a.kind === 'conversation' && b.kind === 'conversation') {
    return a.conversationId === b.conversationId;
  }
  return false;
}

/** Stable string key for maps and rate-limit buckets. */
export function targetKey(target: MessageTarget): string {
  return target.kind === 'channel'
    ? `channel:${target.channelId}`
    : `conversation:${target.conversationId}`;
}

export function tombstone<T extends Message>(message: T): T {
  return { ...message, content: DELETED_CONTENT, attachments: [], isDeleted: true };
}
