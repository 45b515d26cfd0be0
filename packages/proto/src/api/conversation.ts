import { z } from 'zod';
import { IdSchema } from '../commands';

export const CreateConversationRequestSchema = z.object({
  userId: IdSchema,
});

export const ConversationParamsSchema = z.object({
  conversationId: IdSchema,
});

export type CreateConversationRequest = z.infer<typeof CreateConversationRequestSchema>;
