/**
 * Retry Policy with Exponential Backoff
 *
 * One policy object is shared by every exchange call so attempt counts and
 * delays are consistent across the engine.
 */

import { isTransientError } from './errors';
import { RETRY_DEFAULTS } from './constants';

export interface RetryConfig {
  /** Total attempts including the first one (default: 3) */
  maxAttempts: number;
  /** Base delay in ms before the first retry (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in ms between retries (default: 10000) */
  maxDelayMs: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier: number;
  /** Randomize each delay between 50% and 100% of its value (default: true) */
  jitter: boolean;
}

export interface RetryHooks {
  /** Decides whether an error is worth another attempt (default: transport errors only) */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each retry sleep */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = { ...RETRY_DEFAULTS };

/**
 * Thrown once every attempt has failed; wraps the last error
 */
export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(
      `Gave up after ${attempts} attempt(s): ` +
      (lastError instanceof Error ? lastError.message : String(lastError))
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Calculate delay for a given retry index (0-based) with exponential backoff and optional jitter
 */
export function calculateDelay(retryIndex: number, config: RetryConfig): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffMultiplier, retryIndex);
  const clampedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    return Math.round(clampedDelay * (0.5 + Math.random() * 0.5));
  }

  return Math.round(clampedDelay);
}

/**
 * Sleep helper
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class RetryPolicy {
  readonly config: RetryConfig;
  private readonly hooks: Required<Pick<RetryHooks, 'isRetryable' | 'sleep'>> & Pick<RetryHooks, 'onRetry'>;

  constructor(config: Partial<RetryConfig> = {}, hooks: RetryHooks = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.hooks = {
      isRetryable: hooks.isRetryable ?? isTransientError,
      sleep: hooks.sleep ?? sleep,
      onRetry: hooks.onRetry,
    };
  }

  /**
   * Run `fn` until it succeeds, a non-retryable error is thrown, or attempts run out.
   * Non-retryable errors propagate unchanged; exhaustion throws RetryExhaustedError.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>): Promise<T> {
    const maxAttempts = Math.max(1, Math.floor(this.config.maxAttempts));
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (!this.hooks.isRetryable(error)) {
          throw error;
        }
        lastError = error;

        if (attempt >= maxAttempts) {
          break;
        }

        const delay = calculateDelay(attempt - 1, this.config);
        this.hooks.onRetry?.(attempt, error, delay);
        await this.hooks.sleep(delay);
      }
    }

    throw new RetryExhaustedError(maxAttempts, lastError);
  }
}
