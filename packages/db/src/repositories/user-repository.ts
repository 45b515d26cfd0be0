import { type User, type UserRepository, type UserStatus } from '@parley/domain';
import { clientOf } from '../client';
import { containsPattern } from './like-pattern';

const USER_COLUMNS = `id, username, email, password_hash, first_name, last_name, avatar_url,
  status, token_version, created_at, updated_at`;

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  avatar_url: string | null;
  status: string;
  token_version: number;
  created_at: Date;
  updated_at: Date;
}

export class PgUserRepository implements UserRepository {
  async create(
    tx: unknown,
    user: {
      id: string;
      username: string;
      email: string;
      passwordHash: string;
      firstName: string | null;
      lastName: string | null;
    },
  ): Promise<User | null> {
    const result = await clientOf(tx).query<UserRow>(
      `INSERT INTO users (id, username, email, password_hash, first_name, last_name)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [user.id, user.username, user.email, user.passwordHash, user.firstName, user.lastName],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findById(tx: unknown, id: string): Promise<User | null> {
    const result = await clientOf(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByIds(tx: unknown, ids: string[]): Promise<User[]> {
    if (ids.length === 0) return [];
    const result = await clientOf(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = ANY($1::bigint[])`,
      [ids],
    );
    return result.rows.map(mapUserRow);
  }

  async findByEmail(tx: unknown, email: string): Promise<User | null> {
    const result = await clientOf(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async findByUsername(tx: unknown, username: string): Promise<User | null> {
    const result = await clientOf(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username],
    );
    return result.rows[0] ? mapUserRow(result.rows[0]) : null;
  }

  async incrementTokenVersion(tx: unknown, userId: string): Promise<number | null> {
    const result = await clientOf(tx).query<{ token_version: number }>(
      `UPDATE users
       SET token_version = token_version + 1, updated_at = NOW()
       WHERE id = $1
       RETURNING token_version`,
      [userId],
    );
    return result.rows[0]?.token_version ?? null;
  }

  async list(tx: unknown, opts: { limit: number; offset: number }): Promise<User[]> {
    const result = await clientOf(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY username ASC LIMIT $1 OFFSET $2`,
      [opts.limit, opts.offset],
    );
    return result.rows.map(mapUserRow);
  }

  async search(tx: unknown, query: string, limit: number): Promise<User[]> {
    const result = await clientOf(tx).query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users
       WHERE username ILIKE $1 OR email ILIKE $1
       ORDER BY username ASC
       LIMIT $2`,
      [containsPattern(query), limit],
    );
    return result.rows.map(mapUserRow);
  }
}

const STATUSES: readonly UserStatus[] = ['online', 'away', 'busy', 'offline'];

function toStatus(value: string): UserStatus {
  return STATUSES.find((s) => s === value) ?? 'offline';
}

function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name,
    avatarUrl: row.avatar_url,
    status: toStatus(row.status),
    tokenVersion: row.token_version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
