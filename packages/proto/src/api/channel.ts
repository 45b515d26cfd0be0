import { z } from 'zod';
import { IdSchema } from '../commands';

/** Name, description and member-limit rules live in the membership registry. */
export const CreateChannelRequestSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  topic: z.string().max(250).nullish(),
  isPrivate: z.boolean().default(false),
  maxMembers: z.number().int().nullish(),
});

/** Omitted fields are kept; `null` clears description, topic and the member limit. */
export const UpdateChannelRequestSchema = z.object({
  name: z.string().optional(),
  description: z.string().nullish(),
  topic: z.string().max(250).nullish(),
  maxMembers: z.number().int().nullish(),
});

export const UpdateMemberRoleRequestSchema = z.object({
  role: z.enum(['owner', 'admin', 'member']),
});

export const JoinChannelRequestSchema = z.object({
  inviteCode: z.string().min(1).max(64).optional(),
});

export const ArchiveRequestSchema = z.object({
  archived: z.boolean(),
});

export const ChannelParamsSchema = z.object({
  channelId: IdSchema,
});

export const MemberParamsSchema = z.object({
  channelId: IdSchema,
  userId: IdSchema,
});

export const InviteCodeParamsSchema = z.object({
  inviteCode: z.string().min(1).max(64),
});

export type CreateChannelRequest = z.infer<typeof CreateChannelRequestSchema>;
export type UpdateChannelRequest = z.infer<typeof UpdateChannelRequestSchema>;
export type UpdateMemberRoleRequest = z.infer<typeof UpdateMemberRoleRequestSchema>;
export type JoinChannelRequest = z.infer<typeof JoinChannelRequestSchema>;
export type ArchiveRequest = z.infer<typeof ArchiveRequestSchema>;
