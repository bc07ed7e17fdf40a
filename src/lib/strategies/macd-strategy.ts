/**
 * MACD Crossover with Divergence
 *
 * Divergence compares the two most extreme lows (or highs) inside the
 * trailing window: a lower low with a higher histogram is bullish, a
 * higher high with a lower histogram is bearish.
 */

import { crossedAbove, crossedBelow, last, macd } from '../indicators';
import type { Candle, Signal } from '../types';
import { buildSignal, closesOf, requireHistory } from './base';
import type { MacdParams, SignalStrategy } from './types';

type Divergence = 'bullish' | 'bearish' | 'none';

/**
 * Indexes of the two smallest (or largest) values, returned oldest first
 */
function twoExtremes(values: readonly number[], pick: 'low' | 'high'): [number, number] | null {
  if (values.length < 2) return null;
  const order = values
    .map((value, index) => ({ value, index }))
    .sort((a, b) => (pick === 'low' ? a.value - b.value : b.value - a.value) || a.index - b.index);
  const [first, second] = [order[0].index, order[1].index];
  return first < second ? [first, second] : [second, first];
}

export function detectDivergence(
  candles: readonly Candle[],
  histogram: readonly number[],
  lookback: number
): Divergence {
  const firstValid = histogram.findIndex(v => !Number.isNaN(v));
  if (firstValid === -1) return 'none';
  const start = Math.max(firstValid, candles.length - lookback);
  const window = candles.slice(start);
  const hist = histogram.slice(start);

  const lows = twoExtremes(window.map(c => c.low), 'low');
  if (lows) {
    const [a, b] = lows;
    if (window[b].low < window[a].low && hist[b] > hist[a]) return 'bullish';
  }

  const highs = twoExtremes(window.map(c => c.high), 'high');
  if (highs) {
    const [a, b] = highs;
    if (window[b].high > window[a].high && hist[b] < hist[a]) return 'bearish';
  }

  return 'none';
}

export class MacdStrategy implements SignalStrategy {
  readonly kind = 'macd' as const;
  readonly minHistory: number;

  constructor(readonly id: string, readonly params: MacdParams) {
    if (params.fastPeriod >= params.slowPeriod) {
      throw new RangeError('macd fastPeriod must be shorter than slowPeriod');
    }
    this.minHistory = params.slowPeriod + params.signalPeriod + 1;
  }

  evaluate(candles: readonly Candle[]): Signal {
    requireHistory(candles, this.minHistory);
    const { fastPeriod, slowPeriod, signalPeriod, divergenceLookback } = this.params;
    const series = macd(closesOf(candles), fastPeriod, slowPeriod, signalPeriod);

    const line = last(series.macd);
    const signalLine = last(series.signal);
    const hist = last(series.histogram);
    const prevHist = last(series.histogram, 1);
    const divergence = detectDivergence(candles, series.histogram, divergenceLookback);
    const meta = { macd: line, signal: signalLine, histogram: hist };

    const bullishCross = crossedAbove(last(series.macd, 1), last(series.signal, 1), line, signalLine);
    const bearishCross = crossedBelow(last(series.macd, 1), last(series.signal, 1), line, signalLine);

    if (bullishCross && line < 0) {
      return divergence === 'bullish'
        ? buildSignal(this.id, candles, 'LONG', 0.85, 'Bullish MACD cross below zero with divergence', meta)
        : buildSignal(this.id, candles, 'LONG', 0.7, 'Bullish MACD cross below zero', meta);
    }
    if (bearishCross) {
      return divergence === 'bearish'
        ? buildSignal(this.id, candles, 'SHORT', 0.9, 'Bearish MACD cross with divergence', meta)
        : buildSignal(this.id, candles, 'SHORT', 0.75, 'Bearish MACD cross', meta);
    }
    if (divergence === 'bullish' && hist > prevHist) {
      return buildSignal(this.id, candles, 'LONG', 0.75, 'Bullish divergence with rising histogram', meta);
    }
    return buildSignal(this.id, candles, 'FLAT', 0, 'No MACD setup', meta);
  }
}
