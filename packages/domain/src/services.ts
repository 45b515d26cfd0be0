import { AuthService } from './auth-service';
import { ConversationService } from './conversation-service';
import { MembershipService } from './membership-service';
import { MessageService } from './message-service';
import { ReadReceiptService } from './read-receipt-service';
import { TokenManager } from './token-manager';
import { UserService } from './user-service';
import {
  type DomainLogger,
  type MessageBroadcastPort,
  type MessageRateLimiterPort,
  type PasswordHasher,
  type RepositorySet,
  type TokenService,
} from './ports';

export interface ServiceOptions {
  generateId: () => string;
  generateInviteCode: () => string;
  tokenService: TokenService;
  passwordHasher: PasswordHasher;
  broadcaster: MessageBroadcastPort;
  rateLimiter?: MessageRateLimiterPort;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  logger?: DomainLogger;
  now?: () => Date;
}

export interface Services {
  tokens: TokenManager;
  auth: AuthService;
  membership: MembershipService;
  conversations: ConversationService;
  messages: MessageService;
  receipts: ReadReceiptService;
  users: UserService;
}

/** Wires every service onto one repository set. */
export function createServices(repos: RepositorySet, opts: ServiceOptions): Services {
  const { withTransaction } = repos;
  const { generateId, logger, now } = opts;

  const tokens = new TokenManager({
    userRepo: repos.users,
    authTokenRepo: repos.authTokens,
    blacklistRepo: repos.blacklist,
    tokenService: opts.tokenService,
    generateId,
    withTransaction,
    accessTokenTtlSeconds: opts.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: opts.refreshTokenTtlSeconds,
    logger,
    now,
  });

  const messages = new MessageService({
    messageRepo: repos.messages,
    channelRepo: repos.channels,
    membershipRepo: repos.memberships,
    conversationRepo: repos.conversations,
    userRepo: repos.users,
    broadcaster: opts.broadcaster,
    rateLimiter: opts.rateLimiter,
    generateId,
    withTransaction,
    now,
  });

  return {
    tokens,
    auth: new AuthService({
      userRepo: repos.users,
      passwordHasher: opts.passwordHasher,
      tokenManager: tokens,
      generateId,
      withTransaction,
    }),
    membership: new MembershipService({
      channelRepo: repos.channels,
      membershipRepo: repos.memberships,
      userRepo: repos.users,
      systemMessages: messages,
      generateId,
      generateInviteCode: opts.generateInviteCode,
      withTransaction,
      logger,
    }),
    conversations: new ConversationService({
      conversationRepo: repos.conversations,
      userRepo: repos.users,
      generateId,
      withTransaction,
    }),
    messages,
    receipts: new ReadReceiptService({
      messageRepo: repos.messages,
      readReceiptRepo: repos.readReceipts,
      withTransaction,
    }),
    users: new UserService({ userRepo: repos.users, withTransaction }),
  };
}
