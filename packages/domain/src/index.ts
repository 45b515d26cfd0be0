export { compareIds, isValidId } from './ids';
export type { FieldIssue } from './validation';
export { type User, type UserStatus, type UserSummary, displayName, toUserSummary } from './user';
export { type TokenType, type AuthToken, type BlacklistedToken, type DeviceContext, isExpired } from './token';
export {
  type Channel,
  type ChannelMembership,
  type MemberRole,
  type CreateChannelInput,
  type UpdateChannelInput,
  CHANNEL_NAME_MAX,
  CHANNEL_DESCRIPTION_MAX,
  CHANNEL_MEMBERS_MAX,
  normalizeChannelName,
  validateChannelInput,
  validateChannelUpdate,
} from './channel';
export {
  type DirectConversation,
  type ConversationSide,
  canonicalPair,
  sideOf,
  otherParticipant,
  isArchivedFor,
} from './conversation';
export {
  type Message,
  type UserMessage,
  type SystemMessage,
  type MessageView,
  type MessageTarget,
  type MessageType,
  type UserMessageType,
  type Attachment,
  type NewMessage,
  USER_MESSAGE_TYPES,
  MESSAGE_CONTENT_MAX,
  MAX_ATTACHMENTS,
  DELETED_CONTENT,
  isUserMessageType,
  sameTarget,
  targetKey,
  tombstone,
} from './message';
export { hasRole, canManageChannel, canEdit, canDelete } from './permissions';
export type {
  WithTransaction,
  UserRepository,
  AuthTokenRepository,
  TokenBlacklistRepository,
  ChannelRepository,
  ChannelPatch,
  MembershipRepository,
  ConversationRepository,
  MessageRepository,
  MessageSearch,
  ReadReceipt,
  ReadReceiptRepository,
  RepositorySet,
  PasswordHasher,
  TokenService,
  MessageRateLimiterPort,
  MessageEventName,
  MessageBroadcastPort,
  SystemMessagePort,
  DomainLogger,
} from './ports';
export {
  TokenManager,
  TokenError,
  type TokenErrorKind,
  type TokenManagerDeps,
  type TokenPair,
  type IssuedToken,
  type VerifiedToken,
} from './token-manager';
export { AuthService, AuthError, type AuthTokenOps, type AuthServiceDeps, type AuthResult, type RegisterInput } from './auth-service';
export {
  MembershipService,
  MembershipError,
  type MembershipErrorKind,
  type MembershipServiceDeps,
  type JoinOptions,
  type ChannelDetails,
} from './membership-service';
export { ConversationService, ConversationError, type ConversationServiceDeps } from './conversation-service';
export {
  MessageService,
  MessageError,
  MAX_PAGE_SIZE,
  SEARCH_QUERY_MAX,
  validateCreateInput,
  type MessageErrorKind,
  type MessageServiceDeps,
  type CreateMessageInput,
  type MessagePage,
  type ThreadPage,
  type SearchMessagesInput,
} from './message-service';
export { ReadReceiptService, ReadReceiptError, type ReadReceiptServiceDeps } from './read-receipt-service';
export { UserService, USER_PAGE_MAX, USER_SEARCH_LIMIT, type UserServiceDeps } from './user-service';
export { createServices, type ServiceOptions, type Services } from './services';
