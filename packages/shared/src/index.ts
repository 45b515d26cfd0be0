export { createLogger, sanitize, errorMessage, type SafeLogger } from './logger';
export { AppError, ErrorCode, toValidationIssues, wsCloseCode, type ValidationIssue } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type AuthConfig,
  type ApiConfig,
  type GatewayConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  NatsConfigSchema,
  AuthConfigSchema,
  ApiConfigSchema,
  GatewayConfigSchema,
} from './config';
export { SnowflakeGenerator } from './id';
export { Argon2PasswordHasher } from './auth/password-hasher';
export { OpaqueTokenService } from './auth/token-service';
export { generateInviteCode, INVITE_CODE_LENGTH } from './auth/invite-code';
export { WindowRateLimiter, InMemoryMessageRateLimiter } from './rate-limiter';
export {
  CredentialRefresher,
  type CredentialRefresherOptions,
  type IssuedCredentials,
} from './credential-refresher';
