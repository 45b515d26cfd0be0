import { type RepositorySet } from '@parley/domain';
import { withTransaction } from '../client';
import { PgAuthTokenRepository } from './auth-token-repository';
import { PgChannelRepository } from './channel-repository';
import { PgConversationRepository } from './conversation-repository';
import { PgMembershipRepository } from './membership-repository';
import { PgMessageRepository } from './message-repository';
import { PgReadReceiptRepository } from './read-receipt-repository';
import { PgTokenBlacklistRepository } from './token-blacklist-repository';
import { PgUserRepository } from './user-repository';

/** Postgres-backed repositories on the shared pool; call `initPool` first. */
export function createPgRepositories(): RepositorySet {
  return {
    users: new PgUserRepository(),
    authTokens: new PgAuthTokenRepository(),
    blacklist: new PgTokenBlacklistRepository(),
    channels: new PgChannelRepository(),
    memberships: new PgMembershipRepository(),
    conversations: new PgConversationRepository(),
    messages: new PgMessageRepository(),
    readReceipts: new PgReadReceiptRepository(),
    withTransaction,
  };
}
