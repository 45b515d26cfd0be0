import { type BlacklistedToken, type TokenBlacklistRepository } from '@parley/domain';
import { clientOf } from '../client';

interface BlacklistRow {
  id: string;
  token_hash: string;
  user_id: string;
  reason: string;
  expires_at: Date;
  created_at: Date;
}

export class PgTokenBlacklistRepository implements TokenBlacklistRepository {
  async add(
    tx: unknown,
    entry: { id: string; tokenHash: string; userId: string; reason: string; expiresAt: Date },
  ): Promise<boolean> {
    const result = await clientOf(tx).query(
      `INSERT INTO token_blacklist (id, token_hash, user_id, reason, expires_at)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (token_hash) DO NOTHING`,
      [entry.id, entry.tokenHash, entry.userId, entry.reason, entry.expiresAt],
    );
    return result.rowCount === 1;
  }

  async findActive(tx: unknown, tokenHash: string, now: Date): Promise<BlacklistedToken | null> {
    const result = await clientOf(tx).query<BlacklistRow>(
      `SELECT id, token_hash, user_id, reason, expires_at, created_at
       FROM token_blacklist
       WHERE token_hash = $1 AND expires_at > $2`,
      [tokenHash, now],
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      id: row.id,
      tokenHash: row.token_hash,
      userId: row.user_id,
      reason: row.reason,
      expiresAt: row.expires_at,
      createdAt: row.created_at,
    };
  }
}
