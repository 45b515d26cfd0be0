import { hash, verify, type Options } from '@node-rs/argon2';
import { type PasswordHasher } from '@parley/domain';

const DEFAULT_OPTIONS: Options = {
  memoryCost: 19456,
  timeCost: 2,
  outputLen: 32,
  parallelism: 1,
};

export class Argon2PasswordHasher implements PasswordHasher {
  private readonly options: Options;

  constructor(options: Partial<Options> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async hash(password: string): Promise<string> {
    return hash(password, this.options);
  }

  async verify(password: string, passwordHash: string): Promise<boolean> {
    if (!passwordHash.startsWith('$argon2')) return false;
    try {
      return await verify(passwordHash, password, this.options);
    } catch {
      return false;
    }
  }
}
