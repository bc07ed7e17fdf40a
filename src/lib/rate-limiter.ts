/**
 * Shared Exchange Rate Limiter
 *
 * Every exchange call from every pair draws from one token bucket.
 * Waiters are served in arrival order. A 429 from the exchange empties the
 * bucket and imposes a penalty window that doubles on each consecutive hit
 * and resets after the next successful call.
 */

import { RATE_LIMIT_DEFAULTS } from './constants';
import { RateLimitedError } from './errors';
import { createLogger, type Logger } from './logger';
import { sleep as defaultSleep } from './retry';

export interface RateLimiterConfig {
  requestsPerSecond: number;
  burst: number;
  backoffFactor: number;
  maxBackoffMs: number;
}

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class RateLimiter {
  readonly config: RateLimiterConfig;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  private tokens: number;
  private lastRefill: number;
  private backoffMs = 0;
  private penaltyUntil = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(config: Partial<RateLimiterConfig> = {}, options: RateLimiterOptions = {}) {
    this.config = { ...RATE_LIMIT_DEFAULTS, ...config };
    if (this.config.requestsPerSecond <= 0) {
      throw new Error('requestsPerSecond must be positive');
    }
    this.intervalMs = 1000 / this.config.requestsPerSecond;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? createLogger('rate-limiter');
    this.tokens = Math.max(1, this.config.burst);
    this.lastRefill = this.now();
  }

  /**
   * Wait for a token. Callers are served FIFO.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForToken());
    this.tail = turn;
    return turn;
  }

  /**
   * Acquire a token, run `fn`, and feed the outcome back into the back-off state
   */
  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      if (error instanceof RateLimitedError) {
        this.onRateLimited();
      }
      throw error;
    }
  }

  /**
   * The exchange answered 429: slow everyone down
   */
  onRateLimited(): void {
    this.backoffMs = Math.min(
      Math.max(this.backoffMs * this.config.backoffFactor, this.intervalMs * this.config.backoffFactor),
      this.config.maxBackoffMs
    );
    this.penaltyUntil = this.now() + this.backoffMs;
    this.tokens = 0;
    this.lastRefill = this.penaltyUntil;
    this.log.warn('Rate limited by exchange, backing off', { backoffMs: Math.round(this.backoffMs) });
  }

  onSuccess(): void {
    if (this.backoffMs > 0) {
      this.log.info('Rate limit back-off cleared');
    }
    this.backoffMs = 0;
  }

  get currentBackoffMs(): number {
    return this.backoffMs;
  }

  get availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(this.config.burst, this.tokens + elapsed / this.intervalMs);
    this.lastRefill = now;
  }

  private async waitForToken(): Promise<void> {
    const penalty = this.penaltyUntil - this.now();
    if (penalty > 0) {
      await this.sleep(penalty);
    }

    this.refill();
    if (this.tokens < 1) {
      await this.sleep(Math.ceil((1 - this.tokens) * this.intervalMs));
      this.refill();
    }
    this.tokens = Math.max(0, this.tokens - 1);
  }
}
