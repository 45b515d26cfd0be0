import { type ChannelMembership, type MemberRole, type MembershipRepository } from '@parley/domain';
import { clientOf } from '../client';

interface MembershipRow {
  channel_id: string;
  user_id: string;
  role: string;
  joined_at: Date;
}

export class PgMembershipRepository implements MembershipRepository {
  async add(
    tx: unknown,
    membership: { channelId: string; userId: string; role: MemberRole },
  ): Promise<ChannelMembership | null> {
    const result = await clientOf(tx).query<MembershipRow>(
      `INSERT INTO channel_memberships (channel_id, user_id, role)
       VALUES ($1, $2, $3)
       ON CONFLICT (channel_id, user_id) DO NOTHING
       RETURNING channel_id, user_id, role, joined_at`,
      [membership.channelId, membership.userId, membership.role],
    );
    return result.rows[0] ? mapMembershipRow(result.rows[0]) : null;
  }

  async remove(tx: unknown, channelId: string, userId: string): Promise<boolean> {
    const result = await clientOf(tx).query(
      `DELETE FROM channel_memberships WHERE channel_id = $1 AND user_id = $2`,
      [channelId, userId],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async find(tx: unknown, channelId: string, userId: string): Promise<ChannelMembership | null> {
    const result = await clientOf(tx).query<MembershipRow>(
      `SELECT channel_id, user_id, role, joined_at
       FROM channel_memberships WHERE channel_id = $1 AND user_id = $2`,
      [channelId, userId],
    );
    return result.rows[0] ? mapMembershipRow(result.rows[0]) : null;
  }

  async count(tx: unknown, channelId: string): Promise<number> {
    const result = await clientOf(tx).query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM channel_memberships WHERE channel_id = $1`,
      [channelId],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async listByChannel(tx: unknown, channelId: string): Promise<ChannelMembership[]> {
    const result = await clientOf(tx).query<MembershipRow>(
      `SELECT channel_id, user_id, role, joined_at
       FROM channel_memberships WHERE channel_id = $1
       ORDER BY joined_at ASC`,
      [channelId],
    );
    return result.rows.map(mapMembershipRow);
  }

  async setRole(
    tx: unknown,
    channelId: string,
    userId: string,
    role: MemberRole,
  ): Promise<ChannelMembership | null> {
    const result = await clientOf(tx).query<MembershipRow>(
      `UPDATE channel_memberships SET role = $3
       WHERE channel_id = $1 AND user_id = $2
       RETURNING channel_id, user_id, role, joined_at`,
      [channelId, userId, role],
    );
    return result.rows[0] ? mapMembershipRow(result.rows[0]) : null;
  }
}

function toRole(value: string): MemberRole {
  if (value === 'owner' || value === 'admin' || value === 'member') return value;
  throw new Error(`Unknown member role: ${value}`);
}

function mapMembershipRow(row: MembershipRow): ChannelMembership {
  return {
    channelId: row.channel_id,
    userId: row.user_id,
    role: toRole(row.role),
    joinedAt: row.joined_at,
  };
}
