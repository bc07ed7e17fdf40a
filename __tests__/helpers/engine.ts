import { silentLogger } from '@/lib/logger';
import { RateLimiter } from '@/lib/rate-limiter';
import { RetryPolicy } from '@/lib/retry';
import type { OrderRequest } from '@/lib/types';

const noSleep = async (): Promise<void> => undefined;

/** Three attempts, no real waiting */
export function instantRetry(): RetryPolicy {
  return new RetryPolicy(
    { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 10_000, backoffMultiplier: 2, jitter: false },
    { sleep: noSleep }
  );
}

export function openLimiter(): RateLimiter {
  return new RateLimiter(
    { requestsPerSecond: 1_000_000, burst: 1_000_000 },
    { sleep: noSleep, logger: silentLogger }
  );
}

export function orderRequest(overrides: Partial<OrderRequest> = {}): OrderRequest {
  return {
    clientOrderId: 'ma-BTC-1-entry',
    symbol: 'BTC',
    strategyId: 'ma',
    side: 'buy',
    type: 'market',
    size: 0.01,
    reduceOnly: false,
    ...overrides,
  };
}

export interface ManualClock {
  time: number;
  now: () => number;
}

export function manualClock(start = 0): ManualClock {
  const clock: ManualClock = {
    time: start,
    now: () => clock.time,
  };
  return clock;
}
