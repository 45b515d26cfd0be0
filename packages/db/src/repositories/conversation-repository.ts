import {
  type ConversationRepository,
  type ConversationSide,
  type DirectConversation,
} from '@parley/domain';
import { clientOf } from '../client';

const CONVERSATION_COLUMNS = `id, user1_id, user2_id, last_message_at, is_archived_by_user1,
  is_archived_by_user2, created_at`;

interface ConversationRow {
  id: string;
  user1_id: string;
  user2_id: string;
  last_message_at: Date | null;
  is_archived_by_user1: boolean;
  is_archived_by_user2: boolean;
  created_at: Date;
}

export class PgConversationRepository implements ConversationRepository {
  async findByPair(tx: unknown, user1Id: string, user2Id: string): Promise<DirectConversation | null> {
    const result = await clientOf(tx).query<ConversationRow>(
      `SELECT ${CONVERSATION_COLUMNS} FROM direct_conversations
       WHERE user1_id = $1 AND user2_id = $2`,
      [user1Id, user2Id],
    );
    return result.rows[0] ? mapConversationRow(result.rows[0]) : null;
  }

  async insertIfAbsent(
    tx: unknown,
    conversation: { id: string; user1Id: string; user2Id: string },
  ): Promise<DirectConversation | null> {
    const result = await clientOf(tx).query<ConversationRow>(
      `INSERT INTO direct_conversations (id, user1_id, user2_id)
       VALUES ($1, $2, $3)
       ON CONFLICT (user1_id, user2_id) DO NOTHING
       RETURNING ${CONVERSATION_COLUMNS}`,
      [conversation.id, conversation.user1Id, conversation.user2Id],
    );
    return result.rows[0] ? mapConversationRow(result.rows[0]) : null;
  }

  async findById(tx: unknown, id: string): Promise<DirectConversation | null> {
    const result = await clientOf(tx).query<ConversationRow>(
      `SELECT ${CONVERSATION_COLUMNS} FROM direct_conversations WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapConversationRow(result.rows[0]) : null;
  }

  async setArchived(
    tx: unknown,
    id: string,
    side: ConversationSide,
    archived: boolean,
  ): Promise<DirectConversation | null> {
    // The column name comes from a closed union, never from input.
    const column = side === 'user1' ? 'is_archived_by_user1' : 'is_archived_by_user2';
    const result = await clientOf(tx).query<ConversationRow>(
      `UPDATE direct_conversations SET ${column} = $2
       WHERE id = $1
       RETURNING ${CONVERSATION_COLUMNS}`,
      [id, archived],
    );
    return result.rows[0] ? mapConversationRow(result.rows[0]) : null;
  }

  async touchLastMessage(tx: unknown, id: string, at: Date): Promise<void> {
    await clientOf(tx).query(
      `UPDATE direct_conversations
       SET last_message_at = GREATEST(COALESCE(last_message_at, $2), $2)
       WHERE id = $1`,
      [id, at],
    );
  }

  async listForUser(tx: unknown, userId: string): Promise<DirectConversation[]> {
    const result = await clientOf(tx).query<ConversationRow>(
      `SELECT ${CONVERSATION_COLUMNS} FROM direct_conversations
       WHERE (user1_id = $1 AND is_archived_by_user1 = FALSE)
          OR (user2_id = $1 AND is_archived_by_user2 = FALSE)
       ORDER BY last_message_at DESC NULLS LAST, id DESC`,
      [userId],
    );
    return result.rows.map(mapConversationRow);
  }
}

function mapConversationRow(row: ConversationRow): DirectConversation {
  return {
    id: row.id,
    user1Id: row.user1_id,
    user2Id: row.user2_id,
    lastMessageAt: row.last_message_at,
    isArchivedByUser1: row.is_archived_by_user1,
    isArchivedByUser2: row.is_archived_by_user2,
    createdAt: row.created_at,
  };
}
