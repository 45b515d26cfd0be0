import { z } from 'zod';
import { SEARCH_QUERY_MAX } from '@parley/domain';
import { IdSchema } from '../commands';

export const ListMessagesQuerySchema = z.object({
  before: IdSchema.optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const SearchMessagesQuerySchema = z
  .object({
    q: z.string().trim().min(1).max(SEARCH_QUERY_MAX),
    channelId: IdSchema.optional(),
    conversationId: IdSchema.optional(),
    userId: IdSchema.optional(),
    before: IdSchema.optional(),
    limit: z.coerce.number().int().min(1).max(100).default(25),
  })
  .refine((query) => !(query.channelId && query.conversationId), {
    message: 'set at most one of channelId or conversationId',
    path: ['conversationId'],
  });

export type ListMessagesQuery = z.infer<typeof ListMessagesQuerySchema>;
export type SearchMessagesQuery = z.infer<typeof SearchMessagesQuerySchema>;
