import { type MessageRateLimiterPort } from '@parley/domain';

/**
 * Fixed-window counter keyed by an arbitrary string. Single-instance only.
 */
export class WindowRateLimiter {
  private readonly windows = new Map<string, { count: number; resetAt: number }>();

  constructor(
    private readonly maxPerWindow: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  consume(key: string): boolean {
    const now = this.now();
    const window = this.windows.get(key);

    if (!window || now >= window.resetAt) {
      this.windows.set(key, { count: 1, resetAt: now + this.windowMs });
      return true;
    }

    if (window.count >= this.maxPerWindow) {
      return false;
    }

    window.count++;
    return true;
  }

  reset(key: string): void {
    this.windows.delete(key);
  }

  prune(): void {
    const now = this.now();
    for (const [key, window] of this.windows) {
      if (now >= window.resetAt) this.windows.delete(key);
    }
  }
}

/** Per user and target: at most `maxPerWindow` messages every `windowMs`. */
export class InMemoryMessageRateLimiter implements MessageRateLimiterPort {
  private readonly limiter: WindowRateLimiter;

  constructor(maxPerWindow: number = 5, windowMs: number = 5000, now: () => number = Date.now) {
    this.limiter = new WindowRateLimiter(maxPerWindow, windowMs, now);
  }

  async checkSendRate(userId: string, targetKey: string): Promise<boolean> {
    return this.limiter.consume(`${userId}:${targetKey}`);
  }
}
