import { z } from 'zod';

/** A topic broadcast as it travels over NATS between parley processes. */
export const RelayFrameSchema = z.object({
  origin: z.string().min(1),
  topic: z.string().min(1),
  event: z.string().min(1),
  payload: z.record(z.unknown()),
});

export type RelayFrame = z.infer<typeof RelayFrameSchema>;
