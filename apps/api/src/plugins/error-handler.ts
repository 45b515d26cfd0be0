import { type FastifyInstance } from 'fastify';
import { AppError, ErrorCode, createLogger, type ValidationIssue } from '@parley/shared';
import {
  AuthError,
  ConversationError,
  MembershipError,
  MessageError,
  ReadReceiptError,
  TokenError,
} from '@parley/domain';

const logger = createLogger({ name: 'api:error' });

const KIND_CODES: Record<string, ErrorCode> = {
  VALIDATION: ErrorCode.VALIDATION,
  NOT_FOUND: ErrorCode.NOT_FOUND,
  FORBIDDEN: ErrorCode.FORBIDDEN,
  UNAUTHORIZED: ErrorCode.UNAUTHORIZED,
  CONFLICT: ErrorCode.CONFLICT,
  ALREADY_MEMBER: ErrorCode.CONFLICT,
  ARCHIVED: ErrorCode.CONFLICT,
  FULL: ErrorCode.CONFLICT,
  RATE_LIMITED: ErrorCode.RATE_LIMITED,
};

function withIssues(issues: ValidationIssue[]): Record<string, unknown> {
  return issues.length > 0 ? { issues } : {};
}

/** Domain errors as the HTTP surface reports them; null for anything unexpected. */
export function toAppError(err: unknown): AppError | null {
  if (err instanceof AppError) return err;

  if (err instanceof TokenError) {
    return new AppError(ErrorCode.UNAUTHORIZED, err.message, { reason: err.kind.toLowerCase() });
  }
  if (err instanceof AuthError || err instanceof MembershipError || err instanceof MessageError) {
    const code = KIND_CODES[err.kind] ?? ErrorCode.INTERNAL;
    return new AppError(code, err.message, { reason: err.kind.toLowerCase(), ...withIssues(err.issues) });
  }
  if (err instanceof ConversationError || err instanceof ReadReceiptError) {
    const code = KIND_CODES[err.kind] ?? ErrorCode.INTERNAL;
    return new AppError(code, err.message, { reason: err.kind.toLowerCase() });
  }
  return null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error, _request, reply) => {
    const appError = toAppError(error);
    if (appError) {
      logger.warn({ code: appError.code, ...appError.safeMeta }, appError.message);
      return reply.status(appError.httpStatus).send(appError.toJSON());
    }

    // malformed JSON, oversized bodies and the like
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ code: ErrorCode.BAD_REQUEST, message: error.message });
    }

    logger.error({ err: error.message }, 'Unhandled error');

    return reply.status(500).send({
      code: ErrorCode.INTERNAL,
      message: 'Internal server error',
    });
  });
}
