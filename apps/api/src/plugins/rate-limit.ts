import { type FastifyRequest, type FastifyReply } from 'fastify';
import { AppError, ErrorCode, WindowRateLimiter, createLogger } from '@parley/shared';

const logger = createLogger({ name: 'api:rate-limit' });

/** Per client address: at most `maxRequests` every `windowMs`. */
export function createRateLimiter(opts: { windowMs: number; maxRequests: number }) {
  const limiter = new WindowRateLimiter(opts.maxRequests, opts.windowMs);

  setInterval(() => limiter.prune(), opts.windowMs).unref();

  return async function rateLimit(request: FastifyRequest, _reply: FastifyReply) {
    if (!limiter.consume(request.ip)) {
      logger.warn({ requestId: request.id }, 'Rate limit exceeded');
      throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later');
    }
  };
}
