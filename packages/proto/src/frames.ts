import { z } from 'zod';

const RefSchema = z.string().min(1).max(64);
const TopicSchema = z.string().min(1).max(128);

export const JoinFrameSchema = z.object({
  type: z.literal('join'),
  topic: TopicSchema,
  ref: RefSchema,
});

export const LeaveFrameSchema = z.object({
  type: z.literal('leave'),
  topic: TopicSchema,
  ref: RefSchema,
});

export const CommandFrameSchema = z.object({
  type: z.literal('command'),
  topic: TopicSchema,
  ref: RefSchema,
  command: z.string().min(1).max(64),
  payload: z.record(z.unknown()).default({}),
});

export const HeartbeatFrameSchema = z.object({
  type: z.literal('heartbeat'),
  ref: RefSchema,
});

export const ClientFrameSchema = z.discriminatedUnion('type', [
  JoinFrameSchema,
  LeaveFrameSchema,
  CommandFrameSchema,
  HeartbeatFrameSchema,
]);

export const ReplyFrameSchema = z.object({
  type: z.literal('reply'),
  ref: z.string(),
  topic: z.string().nullable(),
  status: z.enum(['ok', 'error']),
  payload: z.record(z.unknown()),
});

export const PushFrameSchema = z.object({
  type: z.literal('push'),
  topic: z.string(),
  event: z.string(),
  payload: z.record(z.unknown()),
});

export const ServerFrameSchema = z.discriminatedUnion('type', [ReplyFrameSchema, PushFrameSchema]);

export type JoinFrame = z.infer<typeof JoinFrameSchema>;
export type LeaveFrame = z.infer<typeof LeaveFrameSchema>;
export type CommandFrame = z.infer<typeof CommandFrameSchema>;
export type HeartbeatFrame = z.infer<typeof HeartbeatFrameSchema>;
export type ClientFrame = z.infer<typeof ClientFrameSchema>;
export type ReplyFrame = z.infer<typeof ReplyFrameSchema>;
export type PushFrame = z.infer<typeof PushFrameSchema>;
export type ServerFrame = z.infer<typeof ServerFrameSchema>;

/** Decodes one text frame; null when it is not JSON or not a known frame. */
export function parseClientFrame(raw: string): ClientFrame | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = ClientFrameSchema.safeParse(data);
  return result.success ? result.data : null;
}

export function replyFrame(
  ref: string,
  topic: string | null,
  status: ReplyFrame['status'],
  payload: Record<string, unknown> = {},
): ReplyFrame {
  return { type: 'reply', ref, topic, status, payload };
}

export function pushFrame(topic: string, event: string, payload: Record<string, unknown>): PushFrame {
  return { type: 'push', topic, event, payload };
}
