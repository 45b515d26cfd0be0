import {
  isUserMessageType,
  type Attachment,
  type Message,
  type MessageRepository,
  type MessageSearch,
  type MessageTarget,
  type NewMessage,
} from '@parley/domain';
import { clientOf } from '../client';
import { containsPattern } from './like-pattern';

const MESSAGE_COLUMNS = `id, channel_id, direct_conversation_id, user_id, message_type, content,
  parent_message_id, edited_at, is_deleted, metadata, attachments, created_at, updated_at`;

interface MessageRow {
  id: string;
  channel_id: string | null;
  direct_conversation_id: string | null;
  user_id: string | null;
  message_type: string;
  content: string;
  parent_message_id: string | null;
  edited_at: Date | null;
  is_deleted: boolean;
  metadata: Record<string, unknown> | null;
  attachments: Attachment[] | null;
  created_at: Date;
  updated_at: Date;
}

/** `[channel_id, direct_conversation_id]` for a target. */
function targetColumns(target: MessageTarget): [string | null, string | null] {
  return target.kind === 'channel' ? [target.channelId, null] : [null, target.conversationId];
}

function targetFilter(target: MessageTarget): { clause: string; value: string } {
  return target.kind === 'channel'
    ? { clause: 'channel_id = $1', value: target.channelId }
    : { clause: 'direct_conversation_id = $1', value: target.conversationId };
}

export class PgMessageRepository implements MessageRepository {
  async create(tx: unknown, message: NewMessage): Promise<Message> {
    const [channelId, conversationId] = targetColumns(message.target);
    const values =
      message.kind === 'user'
        ? [
            message.id,
            channelId,
            conversationId,
            message.authorId,
            message.type,
            message.content,
            message.parentMessageId,
            JSON.stringify(message.metadata),
            JSON.stringify(message.attachments),
          ]
        : [
            message.id,
            channelId,
            conversationId,
            null,
            'system',
            message.content,
            null,
            JSON.stringify(message.metadata),
            '[]',
          ];
    const result = await clientOf(tx).query<MessageRow>(
      `INSERT INTO messages (id, channel_id, direct_conversation_id, user_id, message_type, content,
         parent_message_id, metadata, attachments)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING ${MESSAGE_COLUMNS}`,
      values,
    );
    return mapMessageRow(result.rows[0]);
  }

  async findById(tx: unknown, id: string): Promise<Message | null> {
    const result = await clientOf(tx).query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapMessageRow(result.rows[0]) : null;
  }

  async listByTarget(
    tx: unknown,
    target: MessageTarget,
    opts: { beforeId?: string; limit: number },
  ): Promise<Message[]> {
    const { clause, value } = targetFilter(target);
    const client = clientOf(tx);

    if (opts.beforeId !== undefined) {
      const result = await client.query<MessageRow>(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE ${clause} AND is_deleted = FALSE AND id < $2
         ORDER BY id DESC
         LIMIT $3`,
        [value, opts.beforeId, opts.limit],
      );
      return result.rows.map(mapMessageRow);
    }

    const result = await client.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages
       WHERE ${clause} AND is_deleted = FALSE
       ORDER BY id DESC
       LIMIT $2`,
      [value, opts.limit],
    );
    return result.rows.map(mapMessageRow);
  }

  async listReplies(
    tx: unknown,
    parentId: string,
    opts: { afterId?: string; limit: number },
  ): Promise<Message[]> {
    const result = await clientOf(tx).query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages
       WHERE parent_message_id = $1 AND is_deleted = FALSE AND ($2::bigint IS NULL OR id > $2)
       ORDER BY id ASC
       LIMIT $3`,
      [parentId, opts.afterId ?? null, opts.limit],
    );
    return result.rows.map(mapMessageRow);
  }

  async countReplies(tx: unknown, parentIds: string[]): Promise<Map<string, number>> {
    const counts = new Map<string, number>();
    if (parentIds.length === 0) return counts;
    const result = await clientOf(tx).query<{ parent_message_id: string; count: string }>(
      `SELECT parent_message_id, COUNT(*) AS count FROM messages
       WHERE parent_message_id = ANY($1::bigint[]) AND is_deleted = FALSE
       GROUP BY parent_message_id`,
      [parentIds],
    );
    for (const row of result.rows) {
      counts.set(row.parent_message_id, Number(row.count));
    }
    return counts;
  }

  async updateContent(
    tx: unknown,
    id: string,
    content: string,
    editedAt: Date,
  ): Promise<Message | null> {
    const result = await clientOf(tx).query<MessageRow>(
      `UPDATE messages SET content = $2, edited_at = $3, updated_at = $3
       WHERE id = $1 AND is_deleted = FALSE
       RETURNING ${MESSAGE_COLUMNS}`,
      [id, content, editedAt],
    );
    return result.rows[0] ? mapMessageRow(result.rows[0]) : null;
  }

  async markDeleted(tx: unknown, id: string, at: Date): Promise<Message | null> {
    const result = await clientOf(tx).query<MessageRow>(
      `UPDATE messages SET is_deleted = TRUE, updated_at = $2
       WHERE id = $1 AND is_deleted = FALSE
       RETURNING ${MESSAGE_COLUMNS}`,
      [id, at],
    );
    return result.rows[0] ? mapMessageRow(result.rows[0]) : null;
  }

  async countUnread(
    tx: unknown,
    target: MessageTarget,
    opts: { afterId: string | null; excludeAuthorId: string },
  ): Promise<number> {
    const { clause, value } = targetFilter(target);
    const result = await clientOf(tx).query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM messages
       WHERE ${clause} AND is_deleted = FALSE
         AND ($2::bigint IS NULL OR id > $2)
         AND user_id IS DISTINCT FROM $3`,
      [value, opts.afterId, opts.excludeAuthorId],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async search(tx: unknown, opts: MessageSearch): Promise<Message[]> {
    const values: unknown[] = [containsPattern(opts.query), opts.viewerId];
    const conditions = [
      'm.is_deleted = FALSE',
      'm.content ILIKE $1',
      `(EXISTS (SELECT 1 FROM channels c
               WHERE c.id = m.channel_id
                 AND (c.is_private = FALSE
                      OR EXISTS (SELECT 1 FROM channel_memberships cm
                                 WHERE cm.channel_id = c.id AND cm.user_id = $2)))
        OR EXISTS (SELECT 1 FROM direct_conversations d
                   WHERE d.id = m.direct_conversation_id AND $2 IN (d.user1_id, d.user2_id)))`,
    ];
    const param = (value: unknown): string => {
      values.push(value);
      return `$${values.length}`;
    };

    if (opts.target) {
      conditions.push(
        opts.target.kind === 'channel'
          ? `m.channel_id = ${param(opts.target.channelId)}`
          : `m.direct_conversation_id = ${param(opts.target.conversationId)}`,
      );
    }
    if (opts.authorId !== undefined) conditions.push(`m.user_id = ${param(opts.authorId)}`);
    if (opts.beforeId !== undefined) conditions.push(`m.id < ${param(opts.beforeId)}`);

    const result = await clientOf(tx).query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM messages m
       WHERE ${conditions.join(' AND ')}
       ORDER BY m.id DESC
       LIMIT ${param(opts.limit)}`,
      values,
    );
    return result.rows.map(mapMessageRow);
  }
}

function toTarget(row: MessageRow): MessageTarget {
  if (row.channel_id !== null) return { kind: 'channel', channelId: row.channel_id };
  if (row.direct_conversation_id !== null) {
    return { kind: 'conversation', conversationId: row.direct_conversation_id };
  }
  throw new Error(`Message ${row.id} has no target`);
}

function mapMessageRow(row: MessageRow): Message {
  const base = {
    id: row.id,
    target: toTarget(row),
    content: row.content,
    parentMessageId: row.parent_message_id,
    editedAt: row.edited_at,
    isDeleted: row.is_deleted,
    metadata: row.metadata ?? {},
    attachments: row.attachments ?? [],
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.user_id === null || row.message_type === 'system') {
    return { ...base, kind: 'system', type: 'system', authorId: null };
  }
  const type = row.message_type;
  if (!isUserMessageType(type)) throw new Error(`Unknown message type: ${type}`);
  return { ...base, kind: 'user', type, authorId: row.user_id };
}
