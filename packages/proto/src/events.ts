import { z } from 'zod';

export const MESSAGES_LOADED = 'messages_loaded' as const;
export const PRESENCE_STATE = 'presence_state' as const;
export const PRESENCE_DIFF = 'presence_diff' as const;
export const USER_TYPING = 'user_typing' as const;

export const UserPayloadSchema = z.object({
  id: z.string(),
  username: z.string(),
  displayName: z.string(),
  avatarUrl: z.string().nullable(),
});

export const MessagePayloadSchema = z.object({
  id: z.string(),
  kind: z.enum(['user', 'system']),
  channelId: z.string().nullable(),
  directConversationId: z.string().nullable(),
  content: z.string(),
  messageType: z.string(),
  parentMessageId: z.string().nullable(),
  editedAt: z.string().datetime().nullable(),
  isDeleted: z.boolean(),
  metadata: z.record(z.unknown()),
  attachments: z.array(z.object({ url: z.string(), type: z.string(), size: z.number() })),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  author: UserPayloadSchema.nullable(),
  replyCount: z.number().int(),
});

export const PresenceMetaSchema = z.object({
  userId: z.string(),
  username: z.string(),
  displayName: z.string(),
  avatarUrl: z.string().nullable(),
  status: z.string(),
  onlineAt: z.string().datetime(),
});

/** userId → the latest meta of that user on the topic. */
export const PresenceStateSchema = z.record(z.object({ metas: z.array(PresenceMetaSchema) }));

export const PresenceDiffSchema = z.object({
  joins: PresenceStateSchema,
  leaves: PresenceStateSchema,
});

export const UserTypingPayloadSchema = z.object({
  user: UserPayloadSchema,
  typing: z.boolean(),
  timestamp: z.string().datetime(),
});

export type UserPayload = z.infer<typeof UserPayloadSchema>;
export type MessagePayload = z.infer<typeof MessagePayloadSchema>;
export type PresenceMeta = z.infer<typeof PresenceMetaSchema>;
export type PresenceState = z.infer<typeof PresenceStateSchema>;
export type PresenceDiff = z.infer<typeof PresenceDiffSchema>;
export type UserTypingPayload = z.infer<typeof UserTypingPayloadSchema>;
