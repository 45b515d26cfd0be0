import { type SafeLogger, createLogger, errorMessage } from './logger';

export interface IssuedCredentials<T> {
  value: T;
  expiresAt: Date;
}

export interface CredentialRefresherOptions<T> {
  name: string;
  fetch: () => Promise<IssuedCredentials<T>>;
  refreshBeforeMs?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  logger?: SafeLogger;
  /** Wall clock, used only to read `expiresAt`. */
  now?: () => number;
  /** Monotonic clock for scheduling and validity. */
  monotonicNow?: () => number;
}

/**
 * Keeps a rotating credential fresh in the background. Refreshes
 * `refreshBeforeMs` ahead of expiry and retries failed fetches with capped
 * exponential backoff.
 */
export class CredentialRefresher<T> {
  private readonly fetchCredentials: () => Promise<IssuedCredentials<T>>;
  private readonly refreshBeforeMs: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly logger: SafeLogger;
  private readonly now: () => number;
  private readonly monotonicNow: () => number;

  private value: T | null = null;
  private validUntil = 0;
  private nextAt: number | null = null;
  private failures = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(opts: CredentialRefresherOptions<T>) {
    this.fetchCredentials = opts.fetch;
    this.refreshBeforeMs = opts.refreshBeforeMs ?? 5 * 60 * 1000;
    this.initialBackoffMs = opts.initialBackoffMs ?? 1000;
    this.maxBackoffMs = opts.maxBackoffMs ?? 60_000;
    this.logger = opts.logger ?? createLogger({ name: `credentials:${opts.name}` });
    this.now = opts.now ?? Date.now;
    this.monotonicNow = opts.monotonicNow ?? (() => performance.now());
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    await this.refresh();
  }

  stop(): void {
    this.running = false;
    this.nextAt = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  current(): T {
    if (this.value === null || this.monotonicNow() >= this.validUntil) {
      throw new Error('No valid credentials available');
    }
    return this.value;
  }

  /** Monotonic timestamp of the next scheduled fetch, or null when idle. */
  nextRefreshAt(): number | null {
    return this.nextAt;
  }

  private async refresh(): Promise<void> {
    try {
      const issued = await this.fetchCredentials();
      if (!this.running) return;

      const mono = this.monotonicNow();
      const lifetime = issued.expiresAt.getTime() - this.now();
      this.value = issued.value;
      this.validUntil = mono + lifetime;
      this.failures = 0;

      const delay = Math.max(0, lifetime - this.refreshBeforeMs);
      this.logger.info({ expiresInMs: lifetime, refreshInMs: delay }, 'Credentials refreshed');
      this.schedule(delay);
    } catch (err) {
      if (!this.running) return;
      this.failures++;
      const delay = Math.min(
        this.initialBackoffMs * 2 ** (this.failures - 1),
        this.maxBackoffMs,
      );
      this.logger.error(
        { err: errorMessage(err), attempt: this.failures, retryInMs: delay },
        'Credential refresh failed',
      );
      this.schedule(delay);
    }
  }

  private schedule(delayMs: number): void {
    if (this.timer) clearTimeout(this.timer);
    this.nextAt = this.monotonicNow() + delayMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.refresh().catch((err) => {
        this.logger.error({ err: errorMessage(err) }, 'Credential refresh crashed');
      });
    }, delayMs);
    this.timer.unref?.();
  }
}
