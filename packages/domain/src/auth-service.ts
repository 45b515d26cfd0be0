import { type User } from './user';
import { type DeviceContext } from './token';
import { type TokenManager, type TokenPair, TokenError } from './token-manager';
import { type UserRepository, type PasswordHasher, type WithTransaction } from './ports';
import { type FieldIssue } from './validation';

export type AuthTokenOps = Pick<TokenManager, 'issuePair' | 'rotate' | 'blacklist' | 'revokeAll'>;

export interface AuthServiceDeps {
  userRepo: UserRepository;
  passwordHasher: PasswordHasher;
  tokenManager: AuthTokenOps;
  generateId: () => string;
  withTransaction: WithTransaction;
}

export interface AuthResult extends TokenPair {
  user: User;
}

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
  firstName?: string | null;
  lastName?: string | null;
}

const INVALID_CREDENTIALS = 'Invalid email or password';

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async register(input: RegisterInput, context: DeviceContext = {}): Promise<AuthResult> {
    const { userRepo, passwordHasher, tokenManager, generateId } = this.deps;
    const email = input.email.trim().toLowerCase();
    const username = input.username.trim();

    const user = await this.deps.withTransaction(async (tx) => {
      const issues: FieldIssue[] = [];
      if (await userRepo.findByUsername(tx, username)) {
        issues.push({ path: 'username', message: 'has already been taken' });
      }
      if (await userRepo.findByEmail(tx, email)) {
        issues.push({ path: 'email', message: 'has already been taken' });
      }
      if (issues.length > 0) {
        throw new AuthError('CONFLICT', 'Account already exists', issues);
      }

      const created = await userRepo.create(tx, {
        id: generateId(),
        username,
        email,
        passwordHash: await passwordHasher.hash(input.password),
        firstName: input.firstName ?? null,
        lastName: input.lastName ?? null,
      });
      if (!created) {
        throw new AuthError('CONFLICT', 'Account already exists');
      }
      return created;
    });

    const pair = await tokenManager.issuePair(user, context);
    return { ...pair, user };
  }

  async login(input: { email: string; password: string }, context: DeviceContext = {}): Promise<AuthResult> {
    const { userRepo, passwordHasher, tokenManager } = this.deps;

    const user = await this.deps.withTransaction((tx) =>
      userRepo.findByEmail(tx, input.email.trim().toLowerCase()),
    );
    if (!user) {
      throw new AuthError('UNAUTHORIZED', INVALID_CREDENTIALS);
    }

    const valid = await passwordHasher.verify(input.password, user.passwordHash);
    if (!valid) {
      throw new AuthError('UNAUTHORIZED', INVALID_CREDENTIALS);
    }

    const pair = await tokenManager.issuePair(user, context);
    return { ...pair, user };
  }

  async refresh(refreshToken: string, context: DeviceContext = {}): Promise<AuthResult> {
    return this.deps.tokenManager.rotate(refreshToken, context);
  }

  /**
   * Revokes the presented access token and, when given, the caller's refresh
   * token. A refresh token owned by someone else is left alone.
   */
  async logout(userId: string, accessToken: string, refreshToken?: string): Promise<void> {
    const { tokenManager } = this.deps;
    await tokenManager.blacklist(accessToken, 'logout', userId);
    if (!refreshToken) return;

    try {
      await tokenManager.blacklist(refreshToken, 'logout', userId);
    } catch (err) {
      // unknown and foreign refresh tokens have nothing to revoke
      if (!(err instanceof TokenError && err.kind === 'NOT_FOUND')) throw err;
    }
  }

  async logoutAll(userId: string): Promise<number> {
    return this.deps.tokenManager.revokeAll(userId, 'logout_all');
  }

  async getMe(userId: string): Promise<User> {
    const user = await this.deps.withTransaction((tx) => this.deps.userRepo.findById(tx, userId));
    if (!user) {
      throw new AuthError('NOT_FOUND', 'User not found');
    }
    return user;
  }
}

export class AuthError extends Error {
  constructor(
    public readonly kind: 'UNAUTHORIZED' | 'CONFLICT' | 'VALIDATION' | 'NOT_FOUND',
    message: string,
    public readonly issues: FieldIssue[] = [],
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
