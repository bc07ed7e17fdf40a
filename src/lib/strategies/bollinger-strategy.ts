/**
 * Bollinger Band Mean Reversion
 *
 * Buys closes that pierce the lower band while the bands are wide enough to
 * trade, sells closes that pierce the upper band, and buys an upward release
 * out of a squeeze.
 */

import { bollingerBands, last } from '../indicators';
import type { Candle, Signal } from '../types';
import { buildSignal, closesOf, requireHistory } from './base';
import type { BollingerParams, SignalStrategy } from './types';

const STRONG_OVERSOLD_FACTOR = 0.995;

export class BollingerStrategy implements SignalStrategy {
  readonly kind = 'bollinger_bands' as const;
  readonly minHistory: number;

  constructor(readonly id: string, readonly params: BollingerParams) {
    this.minHistory = params.period + 1;
  }

  evaluate(candles: readonly Candle[]): Signal {
    requireHistory(candles, this.minHistory);
    const closes = closesOf(candles);
    const bands = bollingerBands(closes, this.params.period, this.params.stdDev);

    const close = last(closes);
    const prevClose = last(closes, 1);
    const lower = last(bands.lower);
    const upper = last(bands.upper);
    const middle = last(bands.middle);
    const width = last(bands.width);
    const prevWidth = last(bands.width, 1);
    const squeezed = width <= this.params.squeezeThreshold;
    const meta = { lower, middle, upper, width };

    if (!squeezed && close < lower * STRONG_OVERSOLD_FACTOR) {
      return buildSignal(this.id, candles, 'LONG', 0.85, 'Close well below lower band', meta);
    }
    if (!squeezed && prevClose >= last(bands.lower, 1) && close < lower) {
      return buildSignal(this.id, candles, 'LONG', 0.75, 'Close crossed below lower band', meta);
    }
    if (prevClose <= last(bands.upper, 1) && close > upper) {
      return buildSignal(this.id, candles, 'SHORT', 0.8, 'Close crossed above upper band', meta);
    }
    if (prevWidth <= this.params.squeezeThreshold && !squeezed && close > middle) {
      return buildSignal(this.id, candles, 'LONG', 0.7, 'Upward release from band squeeze', meta);
    }
    return buildSignal(this.id, candles, 'FLAT', 0, squeezed ? 'Bands in squeeze' : 'Close inside bands', meta);
  }
}
