/**
 * Simple Moving Average Crossover
 *
 * LONG on a golden cross (fast SMA closes above slow SMA on the last
 * candle), SHORT on a death cross, FLAT otherwise. Crosses are full
 * strength.
 */

import { crossedAbove, crossedBelow, last, sma } from '../indicators';
import type { Candle, Signal } from '../types';
import { buildSignal, closesOf, requireHistory } from './base';
import type { SignalStrategy, SimpleMaParams } from './types';

export class SimpleMaStrategy implements SignalStrategy {
  readonly kind = 'simple_ma' as const;
  readonly minHistory: number;

  constructor(readonly id: string, readonly params: SimpleMaParams) {
    if (params.fastPeriod >= params.slowPeriod) {
      throw new RangeError('simple_ma fastPeriod must be shorter than slowPeriod');
    }
    this.minHistory = params.slowPeriod;
  }

  evaluate(candles: readonly Candle[]): Signal {
    requireHistory(candles, this.minHistory);
    const closes = closesOf(candles);
    const fast = sma(closes, this.params.fastPeriod);
    const slow = sma(closes, this.params.slowPeriod);

    const [prevFast, curFast] = [last(fast, 1), last(fast)];
    const [prevSlow, curSlow] = [last(slow, 1), last(slow)];
    const meta = { fastSma: curFast, slowSma: curSlow };

    if (crossedAbove(prevFast, prevSlow, curFast, curSlow)) {
      return buildSignal(this.id, candles, 'LONG', 1, 'Fast SMA crossed above slow SMA', meta);
    }
    if (crossedBelow(prevFast, prevSlow, curFast, curSlow)) {
      return buildSignal(this.id, candles, 'SHORT', 1, 'Fast SMA crossed below slow SMA', meta);
    }
    return buildSignal(this.id, candles, 'FLAT', 0, 'No SMA crossover', meta);
  }
}
