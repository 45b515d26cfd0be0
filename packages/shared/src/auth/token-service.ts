import { randomBytes, createHash } from 'node:crypto';
import { type TokenService } from '@parley/domain';

const SECRET_BYTES = 32;

/**
 * Opaque bearer secrets: 32 random bytes, base64url. Only the lowercase hex
 * SHA-256 of a secret is ever stored.
 */
export class OpaqueTokenService implements TokenService {
  generateToken(): string {
    return randomBytes(SECRET_BYTES).toString('base64url');
  }

  hashToken(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }
}
