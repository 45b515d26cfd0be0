import { type AuthToken, type AuthTokenRepository, type TokenType } from '@parley/domain';
import { clientOf } from '../client';

const TOKEN_COLUMNS = `id, user_id, token_hash, type, version, expires_at, last_used_at,
  device_info, ip_address, created_at`;

interface AuthTokenRow {
  id: string;
  user_id: string;
  token_hash: string;
  type: string;
  version: number;
  expires_at: Date;
  last_used_at: Date | null;
  device_info: Record<string, unknown> | null;
  ip_address: string | null;
  created_at: Date;
}

export class PgAuthTokenRepository implements AuthTokenRepository {
  async create(
    tx: unknown,
    token: {
      id: string;
      userId: string;
      tokenHash: string;
      type: TokenType;
      version: number;
      expiresAt: Date;
      deviceInfo: Record<string, unknown> | null;
      ipAddress: string | null;
    },
  ): Promise<AuthToken> {
    const result = await clientOf(tx).query<AuthTokenRow>(
      `INSERT INTO auth_tokens (id, user_id, token_hash, type, version, expires_at, device_info, ip_address)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${TOKEN_COLUMNS}`,
      [
        token.id,
        token.userId,
        token.tokenHash,
        token.type,
        token.version,
        token.expiresAt,
        token.deviceInfo === null ? null : JSON.stringify(token.deviceInfo),
        token.ipAddress,
      ],
    );
    return mapTokenRow(result.rows[0]);
  }

  async findByHash(tx: unknown, tokenHash: string): Promise<AuthToken | null> {
    const result = await clientOf(tx).query<AuthTokenRow>(
      `SELECT ${TOKEN_COLUMNS} FROM auth_tokens WHERE token_hash = $1`,
      [tokenHash],
    );
    return result.rows[0] ? mapTokenRow(result.rows[0]) : null;
  }

  async touchLastUsed(tx: unknown, id: string, at: Date): Promise<void> {
    await clientOf(tx).query(`UPDATE auth_tokens SET last_used_at = $2 WHERE id = $1`, [id, at]);
  }
}

function toTokenType(value: string): TokenType {
  if (value === 'access' || value === 'refresh') return value;
  throw new Error(`Unknown token type: ${value}`);
}

function mapTokenRow(row: AuthTokenRow): AuthToken {
  return {
    id: row.id,
    userId: row.user_id,
    tokenHash: row.token_hash,
    type: toTokenType(row.type),
    version: row.version,
    expiresAt: row.expires_at,
    lastUsedAt: row.last_used_at,
    deviceInfo: row.device_info,
    ipAddress: row.ip_address,
    createdAt: row.created_at,
  };
}
