import { toUserSummary, type UserSummary } from './user';
import { type UserRepository, type WithTransaction } from './ports';

export const USER_PAGE_MAX = 100;
export const USER_SEARCH_LIMIT = 10;

export interface UserServiceDeps {
  userRepo: UserRepository;
  withTransaction: WithTransaction;
}

/** Read-only user directory. Results carry public profile fields only. */
export class UserService {
  constructor(private readonly deps: UserServiceDeps) {}

  async list(opts: { limit: number; offset?: number }): Promise<UserSummary[]> {
    const limit = Math.min(Math.max(Math.trunc(opts.limit), 1), USER_PAGE_MAX);
    const offset = Math.max(Math.trunc(opts.offset ?? 0), 0);
    const users = await this.deps.withTransaction((tx) => this.deps.userRepo.list(tx, { limit, offset }));
    return users.map(toUserSummary);
  }

  /** A blank query matches nobody. */
  async search(query: string, limit: number = USER_SEARCH_LIMIT): Promise<UserSummary[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0) return [];
    const capped = Math.min(Math.max(Math.trunc(limit), 1), USER_PAGE_MAX);
    const users = await this.deps.withTransaction((tx) => this.deps.userRepo.search(tx, trimmed, capped));
    return users.map(toUserSummary);
  }
}
