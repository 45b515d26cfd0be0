import { isValidId, type MessageTarget } from '@parley/domain';

export const Topics = {
  chat: (channelId: string) => `chat:${channelId}`,

  conversation: (conversationId: string) => `conversation:${conversationId}`,
} as const;

/** NATS subjects that carry topic broadcasts between processes. */
export const RelaySubjects = {
  topic: (topic: string) => `topic.${topic.replace(/:/g, '.')}`,

  allTopics: 'topic.>',
} as const;

export function topicForTarget(target: MessageTarget): string {
  return target.kind === 'channel'
    ? Topics.chat(target.channelId)
    : Topics.conversation(target.conversationId);
}

/** Resolves `chat:<id>` / `conversation:<id>`; anything else is null. */
export function parseTopic(topic: string): MessageTarget | null {
  const sep = topic.indexOf(':');
  if (sep < 0) return null;

  const prefix = topic.slice(0, sep);
  const id = topic.slice(sep + 1);
  if (!isValidId(id)) return null;

  if (prefix === 'chat') return { kind: 'channel', channelId: id };
  if (prefix === 'conversation') return { kind: 'conversation', conversationId: id };
  return null;
}
