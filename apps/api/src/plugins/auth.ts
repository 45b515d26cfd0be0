import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode } from '@parley/shared';
import { TokenError, type TokenManager } from '@parley/domain';

declare module 'fastify' {
  interface FastifyRequest {
    userId?: string;
    accessToken?: string;
  }
}

export function createAuthMiddleware(tokens: Pick<TokenManager, 'verify'>) {
  return async function authenticate(request: FastifyRequest) {
    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      throw new AppError(ErrorCode.UNAUTHORIZED, 'Missing or invalid authorization header');
    }

    const token = header.slice(7);
    try {
      const { user } = await tokens.verify(token, 'access');
      request.userId = user.id;
      request.accessToken = token;
    } catch (err) {
      if (err instanceof TokenError) {
        throw new AppError(ErrorCode.UNAUTHORIZED, 'Invalid or expired access token', {
          reason: err.kind.toLowerCase(),
        });
      }
      throw err;
    }
  };
}

/** The caller set by `authenticate`; routes without it in their preHandler never get here. */
export function authenticated(request: FastifyRequest): { userId: string; accessToken: string } {
  const { userId, accessToken } = request;
  if (!userId || !accessToken) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Not authenticated');
  }
  return { userId, accessToken };
}
