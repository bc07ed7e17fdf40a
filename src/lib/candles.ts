/**
 * Candle series helpers: timeframe parsing, dropping the still-open bar,
 * and the contiguity precondition every indicator relies on.
 */

import { TIMEFRAME_MS, type Timeframe } from './constants';
import { CandleGapError } from './errors';
import type { Candle } from './types';

const TIMEFRAME_PATTERN = /^(\d+)([mhd])$/;

const UNIT_MS: Record<string, number> = {
  m: 60_000,
  h: 60 * 60_000,
  d: 24 * 60 * 60_000,
};

export function isKnownTimeframe(value: string): value is Timeframe {
  return Object.prototype.hasOwnProperty.call(TIMEFRAME_MS, value);
}

/**
 * Parse a timeframe such as "15m", "1h" or "1d" into milliseconds
 */
export function timeframeToMs(timeframe: string): number {
  if (isKnownTimeframe(timeframe)) return TIMEFRAME_MS[timeframe];

  const match = TIMEFRAME_PATTERN.exec(timeframe);
  const count = match ? parseInt(match[1], 10) : 0;
  const unit = match ? UNIT_MS[match[2]] : undefined;
  if (!unit || count <= 0) {
    throw new Error(`Unsupported timeframe: ${timeframe}`);
  }
  return count * unit;
}

/**
 * Keep only candles whose period has fully elapsed at `now`
 */
export function closedCandles(candles: readonly Candle[], timeframeMs: number, now: number): Candle[] {
  return candles.filter(c => c.openTime + timeframeMs <= now);
}

/**
 * Throws CandleGapError unless open times step by exactly one timeframe
 */
export function assertContiguous(candles: readonly Candle[], timeframeMs: number): void {
  for (let i = 1; i < candles.length; i++) {
    const previous = candles[i - 1].openTime;
    if (candles[i].openTime - previous !== timeframeMs) {
      throw new CandleGapError(previous, candles[i].openTime, timeframeMs);
    }
  }
}

/**
 * Start of the next candle period after `now`
 */
export function nextBoundary(now: number, timeframeMs: number): number {
  return (Math.floor(now / timeframeMs) + 1) * timeframeMs;
}
