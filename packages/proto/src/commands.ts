import { z } from 'zod';
import { isValidId } from '@parley/domain';

export const SEND_MESSAGE = 'send_message' as const;
export const EDIT_MESSAGE = 'edit_message' as const;
export const DELETE_MESSAGE = 'delete_message' as const;
export const TYPING = 'typing' as const;
export const LOAD_MORE = 'load_more' as const;
export const GET_THREAD = 'get_thread' as const;
export const ARCHIVE = 'archive' as const;
export const MARK_AS_READ = 'mark_as_read' as const;

export const IdSchema = z.coerce.string().refine(isValidId, 'must be a numeric id');

export const AttachmentSchema = z.object({
  url: z.string().max(2048),
  type: z.string().max(255),
  size: z.number(),
});

export const PageLimitSchema = z.coerce.number().int().min(1).max(100);

/** Content rules (length, blank) are enforced by the message store so errors carry field issues. */
export const SendMessagePayload = z.object({
  content: z.string(),
  messageType: z.string().optional(),
  parentMessageId: IdSchema.nullish(),
  metadata: z.record(z.unknown()).optional(),
  attachments: z.array(AttachmentSchema).optional(),
});

export const EditMessagePayload = z.object({
  messageId: IdSchema,
  content: z.string(),
});

export const DeleteMessagePayload = z.object({
  messageId: IdSchema,
});

export const TypingPayload = z.object({
  typing: z.boolean(),
});

/** Without `beforeMessageId` the newest page is returned. */
export const LoadMorePayload = z.object({
  beforeMessageId: IdSchema.optional(),
  limit: PageLimitSchema.optional(),
});

export const GetThreadPayload = z.object({
  messageId: IdSchema,
  afterId: IdSchema.optional(),
  limit: PageLimitSchema.optional(),
});

export const ArchivePayload = z.object({
  archived: z.boolean(),
});

export const MarkAsReadPayload = z.object({
  messageId: IdSchema,
});

export type SendMessage = z.infer<typeof SendMessagePayload>;
export type EditMessage = z.infer<typeof EditMessagePayload>;
export type DeleteMessage = z.infer<typeof DeleteMessagePayload>;
export type Typing = z.infer<typeof TypingPayload>;
export type LoadMore = z.infer<typeof LoadMorePayload>;
export type GetThread = z.infer<typeof GetThreadPayload>;
export type Archive = z.infer<typeof ArchivePayload>;
export type MarkAsRead = z.infer<typeof MarkAsReadPayload>;
