import { type User } from './user';
import { type AuthToken, type DeviceContext, type TokenType, isExpired } from './token';
import {
  type UserRepository,
  type AuthTokenRepository,
  type TokenBlacklistRepository,
  type TokenService,
  type WithTransaction,
  type DomainLogger,
} from './ports';

export interface TokenManagerDeps {
  userRepo: UserRepository;
  authTokenRepo: AuthTokenRepository;
  blacklistRepo: TokenBlacklistRepository;
  tokenService: TokenService;
  generateId: () => string;
  withTransaction: WithTransaction;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  logger?: DomainLogger;
  now?: () => Date;
}

export interface IssuedToken {
  token: string;
  record: AuthToken;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  accessTokenExpiresAt: Date;
  refreshTokenExpiresAt: Date;
}

export interface VerifiedToken {
  user: User;
  record: AuthToken;
}

/**
 * Issues and validates opaque bearer tokens. Only hashes are persisted;
 * the raw secret leaves this class exactly once, from `issue`.
 */
export class TokenManager {
  private readonly now: () => Date;

  constructor(private readonly deps: TokenManagerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async issue(user: User, type: TokenType, context: DeviceContext = {}): Promise<IssuedToken> {
    return this.deps.withTransaction((tx) => this.issueIn(tx, user, type, context));
  }

  async issuePair(user: User, context: DeviceContext = {}): Promise<TokenPair> {
    return this.deps.withTransaction((tx) => this.issuePairIn(tx, user, context));
  }

  /**
   * Validates the token, then records its use in a transaction of its own so
   * a failed bookkeeping write never aborts the verification.
   */
  async verify(token: string, expectedType: TokenType = 'access'): Promise<VerifiedToken> {
    const verified = await this.deps.withTransaction((tx) => this.verifyIn(tx, token, expectedType));
    await this.recordUse(verified.record);
    return verified;
  }

  /**
   * Exchanges a refresh token for a new pair. The consumed token is
   * blacklisted first; losing that insert to a concurrent rotation means the
   * token was already spent.
   */
  async rotate(refreshToken: string, context: DeviceContext = {}): Promise<TokenPair & { user: User }> {
    const { blacklistRepo, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const { user, record } = await this.verifyIn(tx, refreshToken, 'refresh');

      const consumed = await blacklistRepo.add(tx, {
        id: generateId(),
        tokenHash: record.tokenHash,
        userId: user.id,
        reason: 'rotated',
        expiresAt: record.expiresAt,
      });
      if (!consumed) {
        throw new TokenError('REVOKED', 'Token has been revoked');
      }

      const pair = await this.issuePairIn(tx, user, context);
      return { ...pair, user };
    });
  }

  /** Invalidates every outstanding token of the user in one write. */
  async revokeAll(userId: string, reason: string): Promise<number> {
    return this.deps.withTransaction(async (tx) => {
      const version = await this.deps.userRepo.incrementTokenVersion(tx, userId);
      if (version === null) {
        throw new TokenError('NOT_FOUND', 'User not found');
      }
      this.deps.logger?.info({ userId, reason, tokenVersion: version }, 'All tokens revoked');
      return version;
    });
  }

  /** With `ownerId`, a token of any other user is reported as unknown. */
  async blacklist(token: string, reason: string, ownerId?: string): Promise<void> {
    const { authTokenRepo, blacklistRepo, tokenService, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      const record = await authTokenRepo.findByHash(tx, tokenService.hashToken(token));
      if (!record || (ownerId !== undefined && record.userId !== ownerId)) {
        throw new TokenError('NOT_FOUND', 'Token not found');
      }
      // an already blacklisted token stays blacklisted
      await blacklistRepo.add(tx, {
        id: generateId(),
        tokenHash: record.tokenHash,
        userId: record.userId,
        reason,
        expiresAt: record.expiresAt,
      });
    });
  }

  private async issueIn(
    tx: unknown,
    user: User,
    type: TokenType,
    context: DeviceContext,
  ): Promise<IssuedToken> {
    const { authTokenRepo, tokenService, generateId } = this.deps;
    const token = tokenService.generateToken();
    const ttl = type === 'access' ? this.deps.accessTokenTtlSeconds : this.deps.refreshTokenTtlSeconds;

    const record = await authTokenRepo.create(tx, {
      id: generateId(),
      userId: user.id,
      tokenHash: tokenService.hashToken(token),
      type,
      version: user.tokenVersion,
      expiresAt: new Date(this.now().getTime() + ttl * 1000),
      deviceInfo: context.deviceInfo ?? null,
      ipAddress: context.ipAddress ?? null,
    });

    return { token, record };
  }

  private async issuePairIn(tx: unknown, user: User, context: DeviceContext): Promise<TokenPair> {
    const access = await this.issueIn(tx, user, 'access', context);
    const refresh = await this.issueIn(tx, user, 'refresh', context);
    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      accessTokenExpiresAt: access.record.expiresAt,
      refreshTokenExpiresAt: refresh.record.expiresAt,
    };
  }

  private async verifyIn(tx: unknown, token: string, expectedType: TokenType): Promise<VerifiedToken> {
    const { userRepo, authTokenRepo, blacklistRepo, tokenService } = this.deps;
    const tokenHash = tokenService.hashToken(token);
    const now = this.now();

    if (await blacklistRepo.findActive(tx, tokenHash, now)) {
      throw new TokenError('REVOKED', 'Token has been revoked');
    }

    const record = await authTokenRepo.findByHash(tx, tokenHash);
    if (!record) {
      throw new TokenError('NOT_FOUND', 'Token not found');
    }
    if (record.type !== expectedType) {
      throw new TokenError('INVALID_TYPE', `Expected a ${expectedType} token`);
    }
    if (isExpired(record.expiresAt, now)) {
      throw new TokenError('EXPIRED', 'Token has expired');
    }

    const user = await userRepo.findById(tx, record.userId);
    if (!user) {
      throw new TokenError('NOT_FOUND', 'Token owner not found');
    }
    if (record.version !== user.tokenVersion) {
      throw new TokenError('VERSION_MISMATCH', 'Token has been invalidated');
    }

    return { user, record };
  }

  private async recordUse(record: AuthToken): Promise<void> {
    try {
      await this.deps.withTransaction((tx) => this.deps.authTokenRepo.touchLastUsed(tx, record.id, this.now()));
    } catch (err) {
      this.deps.logger?.warn(
        { tokenId: record.id, err: err instanceof Error ? err.message : String(err) },
        'Failed to record token use',
      );
    }
  }
}

export type TokenErrorKind = 'EXPIRED' | 'REVOKED' | 'VERSION_MISMATCH' | 'NOT_FOUND' | 'INVALID_TYPE';

export class TokenError extends Error {
  constructor(
    public readonly kind: TokenErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'TokenError';
  }
}
