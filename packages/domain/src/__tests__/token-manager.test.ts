import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TokenManager, TokenError, type TokenManagerDeps } from '../token-manager';
import { type AuthToken, type BlacklistedToken } from '../token';
import { type AuthTokenRepository, type TokenBlacklistRepository } from '../ports';
import { type User } from '../user';
import { inTx, makeUser } from './helpers';

type NewToken = Parameters<AuthTokenRepository['create']>[1];
type NewBlacklistEntry = Parameters<TokenBlacklistRepository['add']>[1];

function createFixture() {
  const users = new Map<string, User>([['100', makeUser()]]);
  const tokens = new Map<string, AuthToken>();
  const blacklist = new Map<string, BlacklistedToken>();
  let idCounter = 1000;
  let secretCounter = 0;
  let now = new Date('2026-03-01T00:00:00Z');

  const deps: TokenManagerDeps = {
    userRepo: {
      create: vi.fn(async () => null),
      findById: vi.fn(async (_tx: unknown, id: string) => users.get(id) ?? null),
      findByIds: vi.fn(async () => []),
      findByEmail: vi.fn(async () => null),
      findByUsername: vi.fn(async () => null),
      incrementTokenVersion: vi.fn(async (_tx: unknown, id: string) => {
        const user = users.get(id);
        if (!user) return null;
        user.tokenVersion += 1;
        return user.tokenVersion;
      }),
      list: vi.fn(async () => []),
      search: vi.fn(async () => []),
    },
    authTokenRepo: {
      create: vi.fn(async (_tx: unknown, t: NewToken) => {
        const record: AuthToken = { ...t, lastUsedAt: null, createdAt: now };
        tokens.set(t.tokenHash, record);
        return record;
      }),
      findByHash: vi.fn(async (_tx: unknown, hash: string) => tokens.get(hash) ?? null),
      touchLastUsed: vi.fn(async () => {}),
    },
    blacklistRepo: {
      add: vi.fn(async (_tx: unknown, entry: NewBlacklistEntry) => {
        if (blacklist.has(entry.tokenHash)) return false;
        blacklist.set(entry.tokenHash, { ...entry, createdAt: now });
        return true;
      }),
      findActive: vi.fn(async (_tx: unknown, hash: string, at: Date) => {
        const entry = blacklist.get(hash);
        return entry && entry.expiresAt > at ? entry : null;
      }),
    },
    tokenService: {
      generateToken: vi.fn(() => `secret-${++secretCounter}`),
      hashToken: vi.fn((token: string) => `sha256:${token}`),
    },
    generateId: vi.fn(() => String(idCounter++)),
    withTransaction: inTx,
    accessTokenTtlSeconds: 900,
    refreshTokenTtlSeconds: 30 * 24 * 60 * 60,
    logger: { info: vi.fn(), warn: vi.fn() },
    now: () => now,
  };

  return {
    deps,
    users,
    tokens,
    blacklist,
    advance(ms: number) {
      now = new Date(now.getTime() + ms);
    },
  };
}

describe('TokenManager', () => {
  let fx: ReturnType<typeof createFixture>;
  let manager: TokenManager;
  let alice: User;

  beforeEach(() => {
    fx = createFixture();
    manager = new TokenManager(fx.deps);
    alice = makeUser();
    fx.users.set(alice.id, alice);
  });

  describe('issue', () => {
    it('stores only the hash and returns the raw secret once', async () => {
      const { token, record } = await manager.issue(alice, 'access', {
        deviceInfo: { agent: 'test' },
        ipAddress: '127.0.0.1',
      });

      expect(token).toBe('secret-1');
      expect(record.tokenHash).toBe('sha256:secret-1');
      expect(record.type).toBe('access');
      expect(record.version).toBe(1);
      expect(record.deviceInfo).toEqual({ agent: 'test' });
      expect(record.ipAddress).toBe('127.0.0.1');
      expect(fx.tokens.has('secret-1')).toBe(false);
    });

    it('expires access tokens after 15 minutes and refresh tokens after 30 days', async () => {
      const access = await manager.issue(alice, 'access');
      const refresh = await manager.issue(alice, 'refresh');

      expect(access.record.expiresAt.toISOString()).toBe('2026-03-01T00:15:00.000Z');
      expect(refresh.record.expiresAt.toISOString()).toBe('2026-03-31T00:00:00.000Z');
    });
  });

  describe('verify', () => {
    it('returns the user and record, and records the use', async () => {
      const { token } = await manager.issue(alice, 'access');

      const result = await manager.verify(token);

      expect(result.user.id).toBe('100');
      expect(result.record.tokenHash).toBe('sha256:secret-1');
      expect(fx.deps.authTokenRepo.touchLastUsed).toHaveBeenCalledWith({}, result.record.id, expect.any(Date));
    });

    it('accepts a token at its exact expiry instant', async () => {
      const { token } = await manager.issue(alice, 'access');
      fx.advance(900_000);
      await expect(manager.verify(token)).resolves.toMatchObject({ user: { id: '100' } });
    });

    it('rejects an expired token', async () => {
      const { token } = await manager.issue(alice, 'access');
      fx.advance(900_001);
      await expect(manager.verify(token)).rejects.toMatchObject({ kind: 'EXPIRED' });
    });

    it('rejects an unknown token', async () => {
      await expect(manager.verify('nope')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });

    it('rejects a refresh token used as access token', async () => {
      const { token } = await manager.issue(alice, 'refresh');
      await expect(manager.verify(token)).rejects.toMatchObject({ kind: 'INVALID_TYPE' });
    });

    it('checks the blacklist before anything else', async () => {
      const { token } = await manager.issue(alice, 'access');
      await manager.blacklist(token, 'logout');
      fx.advance(1);
      fx.tokens.delete('sha256:secret-1');

      await expect(manager.verify(token)).rejects.toMatchObject({ kind: 'REVOKED' });
    });

    it('rejects tokens issued before a revoke-all', async () => {
      const { token } = await manager.issue(alice, 'access');
      await manager.revokeAll(alice.id, 'password_changed');

      await expect(manager.verify(token)).rejects.toMatchObject({ kind: 'VERSION_MISMATCH' });
    });

    it('rejects a token whose owner is gone', async () => {
      const { token } = await manager.issue(alice, 'access');
      fx.users.delete('100');

      await expect(manager.verify(token)).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });

    it('still verifies when recording the use fails', async () => {
      const { token } = await manager.issue(alice, 'access');
      vi.mocked(fx.deps.authTokenRepo.touchLastUsed).mockRejectedValueOnce(new Error('db down'));

      await expect(manager.verify(token)).resolves.toMatchObject({ user: { id: '100' } });
      expect(fx.deps.logger?.warn).toHaveBeenCalledOnce();
    });
  });

  describe('rotate', () => {
    it('issues a fresh pair and spends the refresh token', async () => {
      const { token: refresh } = await manager.issue(alice, 'refresh');

      const pair = await manager.rotate(refresh);

      expect(pair.accessToken).toBe('secret-2');
      expect(pair.refreshToken).toBe('secret-3');
      expect(pair.user.id).toBe('100');
      expect(fx.blacklist.get('sha256:secret-1')?.reason).toBe('rotated');
      await expect(manager.verify(pair.accessToken)).resolves.toBeTruthy();
    });

    it('fails the second rotation of the same token', async () => {
      const { token: refresh } = await manager.issue(alice, 'refresh');
      await manager.rotate(refresh);

      await expect(manager.rotate(refresh)).rejects.toMatchObject({ kind: 'REVOKED' });
    });

    it('fails when a concurrent rotation already blacklisted the hash', async () => {
      const { token: refresh } = await manager.issue(alice, 'refresh');
      vi.mocked(fx.deps.blacklistRepo.add).mockResolvedValueOnce(false);

      await expect(manager.rotate(refresh)).rejects.toMatchObject({ kind: 'REVOKED' });
    });

    it('refuses an access token', async () => {
      const { token } = await manager.issue(alice, 'access');
      await expect(manager.rotate(token)).rejects.toMatchObject({ kind: 'INVALID_TYPE' });
    });
  });

  describe('revokeAll', () => {
    it('bumps the token version once and logs the reason', async () => {
      await manager.issue(alice, 'access');
      await manager.issue(alice, 'refresh');

      const version = await manager.revokeAll('100', 'security');

      expect(version).toBe(2);
      expect(fx.deps.userRepo.incrementTokenVersion).toHaveBeenCalledOnce();
      expect(fx.deps.logger?.info).toHaveBeenCalledWith(
        { userId: '100', reason: 'security', tokenVersion: 2 },
        'All tokens revoked',
      );
    });

    it('leaves tokens issued afterwards valid', async () => {
      await manager.revokeAll('100', 'security');
      const { token } = await manager.issue(alice, 'access');

      await expect(manager.verify(token)).resolves.toBeTruthy();
    });

    it('rejects an unknown user', async () => {
      await expect(manager.revokeAll('404', 'x')).rejects.toBeInstanceOf(TokenError);
    });
  });

  describe('blacklist', () => {
    it('is idempotent', async () => {
      const { token } = await manager.issue(alice, 'access');
      await manager.blacklist(token, 'logout');
      await expect(manager.blacklist(token, 'logout')).resolves.toBeUndefined();
    });

    it('expires the entry with the token', async () => {
      const { token, record } = await manager.issue(alice, 'access');
      await manager.blacklist(token, 'logout');

      expect(fx.blacklist.get(record.tokenHash)?.expiresAt).toEqual(record.expiresAt);
    });

    it('rejects an unknown token', async () => {
      await expect(manager.blacklist('nope', 'logout')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    });

    it('leaves a token of another owner untouched', async () => {
      const { token } = await manager.issue(alice, 'refresh');

      await expect(manager.blacklist(token, 'logout', '200')).rejects.toMatchObject({ kind: 'NOT_FOUND' });
      expect(fx.blacklist.size).toBe(0);
      await expect(manager.rotate(token)).resolves.toMatchObject({ user: { id: '100' } });
    });
  });
});
