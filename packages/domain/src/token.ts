export type TokenType = 'access' | 'refresh';

export interface DeviceContext {
  deviceInfo?: Record<string, unknown> | null;
  ipAddress?: string | null;
}

export interface AuthToken {
  id: string;
  userId: string;
  tokenHash: string;
  type: TokenType;
  version: number;
  expiresAt: Date;
  lastUsedAt: Date | null;
  deviceInfo: Record<string, unknown> | null;
  ipAddress: string | null;
  createdAt: Date;
}

export interface BlacklistedToken {
  id: string;
  tokenHash: string;
  userId: string;
  reason: string;
  expiresAt: Date;
  createdAt: Date;
}

export function isExpired(expiresAt: Date, now: Date): boolean {
  return now.getTime() > expiresAt.getTime();
}
