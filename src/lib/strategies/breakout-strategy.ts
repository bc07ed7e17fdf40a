/**
 * Breakout Strategy
 *
 * N-bar channel break with volume confirmation. The channel and the volume
 * baseline are taken from the bars before the current one. Multi-bar
 * confirmation is counted by the strategy state machine.
 */

import { atr, last, mean } from '../indicators';
import type { Candle, Signal } from '../types';
import { buildSignal, requireHistory } from './base';
import type { BreakoutParams, SignalStrategy } from './types';

const VOLUME_BASELINE_BARS = 20;
/** A close this many ATRs past the channel counts as a strong break */
const STRONG_BREAK_ATR = 0.5;

export class BreakoutStrategy implements SignalStrategy {
  readonly kind = 'breakout' as const;
  readonly minHistory: number;

  constructor(readonly id: string, readonly params: BreakoutParams) {
    this.minHistory = Math.max(params.lookbackPeriod, VOLUME_BASELINE_BARS, params.atrPeriod) + 1;
  }

  evaluate(candles: readonly Candle[]): Signal {
    requireHistory(candles, this.minHistory);
    const { lookbackPeriod, volumeMultiplier, atrPeriod } = this.params;
    const current = candles[candles.length - 1];
    const channel = candles.slice(-(lookbackPeriod + 1), -1);
    const channelHigh = Math.max(...channel.map(c => c.high));
    const channelLow = Math.min(...channel.map(c => c.low));

    const avgVolume = mean(candles.slice(-(VOLUME_BASELINE_BARS + 1), -1).map(c => c.volume));
    const volumeConfirmed = avgVolume > 0 && current.volume >= avgVolume * volumeMultiplier;
    const currentAtr = last(atr(candles, atrPeriod));
    const meta = { channelHigh, channelLow, atr: currentAtr, volumeRatio: avgVolume > 0 ? current.volume / avgVolume : 0 };

    if (current.close > channelHigh && volumeConfirmed) {
      const strong = current.close - channelHigh > STRONG_BREAK_ATR * currentAtr;
      return buildSignal(
        this.id,
        candles,
        'LONG',
        strong ? 0.85 : 0.7,
        `Close broke ${lookbackPeriod}-bar high $${channelHigh.toFixed(2)} on volume`,
        meta
      );
    }

    if (current.close < channelLow && volumeConfirmed) {
      const strong = channelLow - current.close > STRONG_BREAK_ATR * currentAtr;
      return buildSignal(
        this.id,
        candles,
        'SHORT',
        strong ? 0.85 : 0.7,
        `Close broke ${lookbackPeriod}-bar low $${channelLow.toFixed(2)} on volume`,
        meta
      );
    }

    const reason = current.close > channelHigh || current.close < channelLow
      ? 'Channel break without volume confirmation'
      : 'Close inside channel';
    return buildSignal(this.id, candles, 'FLAT', 0, reason, meta);
  }
}
