import { type MessageTarget, type ReadReceipt, type ReadReceiptRepository } from '@parley/domain';
import { clientOf } from '../client';

interface ReadReceiptRow {
  user_id: string;
  channel_id: string | null;
  direct_conversation_id: string | null;
  last_read_message_id: string;
  updated_at: Date;
}

const RECEIPT_COLUMNS = 'user_id, channel_id, direct_conversation_id, last_read_message_id, updated_at';

export class PgReadReceiptRepository implements ReadReceiptRepository {
  async find(tx: unknown, userId: string, target: MessageTarget): Promise<ReadReceipt | null> {
    const column = target.kind === 'channel' ? 'channel_id' : 'direct_conversation_id';
    const targetId = target.kind === 'channel' ? target.channelId : target.conversationId;
    const result = await clientOf(tx).query<ReadReceiptRow>(
      `SELECT ${RECEIPT_COLUMNS} FROM read_receipts WHERE user_id = $1 AND ${column} = $2`,
      [userId, targetId],
    );
    return result.rows[0] ? mapReceiptRow(result.rows[0]) : null;
  }

  async advance(
    tx: unknown,
    receipt: { userId: string; target: MessageTarget; lastReadMessageId: string },
  ): Promise<ReadReceipt> {
    const { target } = receipt;
    // Each target kind has its own partial unique index to conflict on.
    const conflict =
      target.kind === 'channel'
        ? '(user_id, channel_id) WHERE channel_id IS NOT NULL'
        : '(user_id, direct_conversation_id) WHERE direct_conversation_id IS NOT NULL';
    const result = await clientOf(tx).query<ReadReceiptRow>(
      `INSERT INTO read_receipts (user_id, channel_id, direct_conversation_id, last_read_message_id)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT ${conflict} DO UPDATE
         SET last_read_message_id = GREATEST(read_receipts.last_read_message_id, EXCLUDED.last_read_message_id),
             updated_at = NOW()
       RETURNING ${RECEIPT_COLUMNS}`,
      [
        receipt.userId,
        target.kind === 'channel' ? target.channelId : null,
        target.kind === 'conversation' ? target.conversationId : null,
        receipt.lastReadMessageId,
      ],
    );
    return mapReceiptRow(result.rows[0]);
  }
}

function mapReceiptRow(row: ReadReceiptRow): ReadReceipt {
  let target: MessageTarget;
  if (row.channel_id !== null) {
    target = { kind: 'channel', channelId: row.channel_id };
  } else if (row.direct_conversation_id !== null) {
    target = { kind: 'conversation', conversationId: row.direct_conversation_id };
  } else {
    throw new Error(`Read receipt for user ${row.user_id} has no target`);
  }
  return {
    userId: row.user_id,
    target,
    lastReadMessageId: row.last_read_message_id,
    updatedAt: row.updated_at,
  };
}
