import { type Channel, type ChannelPatch, type ChannelRepository } from '@parley/domain';
import { clientOf } from '../client';

const CHANNEL_COLUMNS = `c.id, c.name, c.description, c.topic, c.is_private, c.is_archived,
  c.created_by, c.max_members, c.invite_code, c.created_at, c.updated_at`;

interface ChannelRow {
  id: string;
  name: string;
  description: string | null;
  topic: string | null;
  is_private: boolean;
  is_archived: boolean;
  created_by: string;
  max_members: number | null;
  invite_code: string | null;
  created_at: Date;
  updated_at: Date;
}

export class PgChannelRepository implements ChannelRepository {
  async create(
    tx: unknown,
    channel: {
      id: string;
      name: string;
      description: string | null;
      topic: string | null;
      isPrivate: boolean;
      createdBy: string;
      maxMembers: number | null;
      inviteCode: string | null;
    },
  ): Promise<Channel | null> {
    const result = await clientOf(tx).query<ChannelRow>(
      `INSERT INTO channels AS c (id, name, description, topic, is_private, created_by, max_members, invite_code)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT DO NOTHING
       RETURNING ${CHANNEL_COLUMNS}`,
      [
        channel.id,
        channel.name,
        channel.description,
        channel.topic,
        channel.isPrivate,
        channel.createdBy,
        channel.maxMembers,
        channel.inviteCode,
      ],
    );
    return result.rows[0] ? mapChannelRow(result.rows[0]) : null;
  }

  async findById(tx: unknown, id: string): Promise<Channel | null> {
    const result = await clientOf(tx).query<ChannelRow>(
      `SELECT ${CHANNEL_COLUMNS} FROM channels c WHERE c.id = $1`,
      [id],
    );
    return result.rows[0] ? mapChannelRow(result.rows[0]) : null;
  }

  async findByIdForUpdate(tx: unknown, id: string): Promise<Channel | null> {
    const result = await clientOf(tx).query<ChannelRow>(
      `SELECT ${CHANNEL_COLUMNS} FROM channels c WHERE c.id = $1 FOR UPDATE`,
      [id],
    );
    return result.rows[0] ? mapChannelRow(result.rows[0]) : null;
  }

  async findByInviteCode(tx: unknown, inviteCode: string): Promise<Channel | null> {
    const result = await clientOf(tx).query<ChannelRow>(
      `SELECT ${CHANNEL_COLUMNS} FROM channels c WHERE c.invite_code = $1`,
      [inviteCode],
    );
    return result.rows[0] ? mapChannelRow(result.rows[0]) : null;
  }

  async listPublic(tx: unknown): Promise<Channel[]> {
    const result = await clientOf(tx).query<ChannelRow>(
      `SELECT ${CHANNEL_COLUMNS}
       FROM channels c
       WHERE c.is_private = FALSE AND c.is_archived = FALSE
       ORDER BY c.name ASC`,
    );
    return result.rows.map(mapChannelRow);
  }

  async listForUser(tx: unknown, userId: string): Promise<Channel[]> {
    const result = await clientOf(tx).query<ChannelRow>(
      `SELECT ${CHANNEL_COLUMNS}
       FROM channels c
       JOIN channel_memberships m ON m.channel_id = c.id
       WHERE m.user_id = $1
       ORDER BY c.name ASC`,
      [userId],
    );
    return result.rows.map(mapChannelRow);
  }

  async setArchived(tx: unknown, id: string, archived: boolean): Promise<Channel | null> {
    const result = await clientOf(tx).query<ChannelRow>(
      `UPDATE channels c SET is_archived = $2, updated_at = NOW()
       WHERE c.id = $1
       RETURNING ${CHANNEL_COLUMNS}`,
      [id, archived],
    );
    return result.rows[0] ? mapChannelRow(result.rows[0]) : null;
  }

  async setInviteCode(tx: unknown, id: string, inviteCode: string): Promise<Channel | null> {
    const result = await clientOf(tx).query<ChannelRow>(
      `UPDATE channels c SET invite_code = $2, updated_at = NOW()
       WHERE c.id = $1
       RETURNING ${CHANNEL_COLUMNS}`,
      [id, inviteCode],
    );
    return result.rows[0] ? mapChannelRow(result.rows[0]) : null;
  }

  async update(tx: unknown, id: string, patch: ChannelPatch): Promise<Channel | null> {
    const values: unknown[] = [id];
    const sets: string[] = [];
    const assign = (column: string, value: unknown): string => {
      values.push(value);
      sets.push(`${column} = $${values.length}`);
      return `$${values.length}`;
    };

    // A taken name matches no row instead of raising a unique violation.
    let nameFree = '';
    if (patch.name !== undefined) {
      const param = assign('name', patch.name);
      nameFree = `AND NOT EXISTS (SELECT 1 FROM channels o WHERE o.name = ${param} AND o.id <> c.id)`;
    }
    if (patch.description !== undefined) assign('description', patch.description);
    if (patch.topic !== undefined) assign('topic', patch.topic);
    if (patch.maxMembers !== undefined) assign('max_members', patch.maxMembers);

    const result = await clientOf(tx).query<ChannelRow>(
      `UPDATE channels c SET ${[...sets, 'updated_at = NOW()'].join(', ')}
       WHERE c.id = $1 ${nameFree}
       RETURNING ${CHANNEL_COLUMNS}`,
      values,
    );
    return result.rows[0] ? mapChannelRow(result.rows[0]) : null;
  }
}

function mapChannelRow(row: ChannelRow): Channel {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    topic: row.topic,
    isPrivate: row.is_private,
    isArchived: row.is_archived,
    createdBy: row.created_by,
    maxMembers: row.max_members,
    inviteCode: row.invite_code,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
