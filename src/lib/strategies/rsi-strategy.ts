/**
 * RSI Threshold Cross
 *
 * Fires only on the candle where RSI crosses into oversold (LONG) or
 * overbought (SHORT); staying in the zone is FLAT.
 */

import { last, rsi } from '../indicators';
import type { Candle, Signal } from '../types';
import { buildSignal, closesOf, requireHistory } from './base';
import type { RsiParams, SignalStrategy } from './types';

const CROSS_STRENGTH = 0.8;

export class RsiStrategy implements SignalStrategy {
  readonly kind = 'rsi' as const;
  readonly minHistory: number;

  constructor(readonly id: string, readonly params: RsiParams) {
    if (params.oversold >= params.overbought) {
      throw new RangeError('rsi oversold must be below overbought');
    }
    // one extra candle for the previous RSI value
    this.minHistory = params.rsiPeriod + 2;
  }

  evaluate(candles: readonly Candle[]): Signal {
    requireHistory(candles, this.minHistory);
    const series = rsi(closesOf(candles), this.params.rsiPeriod);
    const current = last(series);
    const previous = last(series, 1);
    const { oversold, overbought } = this.params;
    const meta = { rsi: current };

    if (previous >= oversold && current < oversold) {
      return buildSignal(this.id, candles, 'LONG', CROSS_STRENGTH, `RSI crossed below ${oversold}`, meta);
    }
    if (previous <= overbought && current > overbought) {
      return buildSignal(this.id, candles, 'SHORT', CROSS_STRENGTH, `RSI crossed above ${overbought}`, meta);
    }
    return buildSignal(this.id, candles, 'FLAT', 0, `RSI ${current.toFixed(1)}, no threshold cross`, meta);
  }
}
