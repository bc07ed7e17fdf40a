import { InsufficientHistoryError } from '../errors';
import type { Candle, Signal, SignalDirection } from '../types';

export function requireHistory(candles: readonly Candle[], minHistory: number): void {
  if (candles.length < minHistory) {
    throw new InsufficientHistoryError(minHistory, candles.length);
  }
}

export function buildSignal(
  strategyId: string,
  candles: readonly Candle[],
  direction: SignalDirection,
  strength: number,
  reason: string,
  meta?: Record<string, number>
): Signal {
  const signal: Signal = {
    direction,
    strength: direction === 'FLAT' ? 0 : Math.min(Math.max(strength, 0), 1),
    sourceStrategyId: strategyId,
    evaluatedAt: candles[candles.length - 1].openTime,
    reason,
  };
  if (meta) signal.meta = meta;
  return signal;
}

export function closesOf(candles: readonly Candle[]): number[] {
  return candles.map(c => c.close);
}
