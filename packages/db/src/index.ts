export { initPool, closePool, getPool, withTransaction, clientOf } from './client';
export { MemoryDatabase } from './memory';
export { createPgRepositories } from './repositories';
export { PgUserRepository } from './repositories/user-repository';
export { PgAuthTokenRepository } from './repositories/auth-token-repository';
export { PgTokenBlacklistRepository } from './repositories/token-blacklist-repository';
export { PgChannelRepository } from './repositories/channel-repository';
export { PgMembershipRepository } from './repositories/membership-repository';
export { PgConversationRepository } from './repositories/conversation-repository';
export { PgMessageRepository } from './repositories/message-repository';
export { PgReadReceiptRepository } from './repositories/read-receipt-repository';
