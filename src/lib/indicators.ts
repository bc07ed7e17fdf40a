/**
 * Technical Indicators
 *
 * Every function returns a full series aligned with its input; positions
 * without enough history hold NaN. A value at index i depends only on
 * inputs 0..i, so appending candles never changes earlier values.
 */

import type { Candle } from './types';

export interface BollingerSeries {
  middle: number[];
  upper: number[];
  lower: number[];
  /** (upper - lower) / middle */
  width: number[];
}

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

function assertPeriod(period: number): void {
  if (!Number.isInteger(period) || period < 1) {
    throw new RangeError(`Indicator period must be a positive integer, got ${period}`);
  }
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Population standard deviation
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Simple returns between consecutive values
 */
export function calculateReturns(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    if (values[i - 1] !== 0) {
      returns.push((values[i] - values[i - 1]) / values[i - 1]);
    }
  }
  return returns;
}

/**
 * Simple moving average
 */
export function sma(values: readonly number[], period: number): number[] {
  assertPeriod(period);
  return values.map((_, i) => (i < period - 1 ? NaN : mean(values.slice(i - period + 1, i + 1))));
}

/**
 * Exponential moving average seeded with the SMA of the first `period`
 * defined values. Leading NaN input (e.g. a MACD line) is skipped.
 */
export function ema(values: readonly number[], period: number): number[] {
  assertPeriod(period);
  const result: number[] = new Array<number>(values.length).fill(NaN);
  const start = values.findIndex(v => !Number.isNaN(v));
  if (start === -1) return result;

  const seedIndex = start + period - 1;
  if (seedIndex >= values.length) return result;

  const k = 2 / (period + 1);
  result[seedIndex] = mean(values.slice(start, seedIndex + 1));
  for (let i = seedIndex + 1; i < values.length; i++) {
    result[i] = values[i] * k + result[i - 1] * (1 - k);
  }
  return result;
}

/**
 * Relative Strength Index with Wilder smoothing
 */
export function rsi(closes: readonly number[], period: number = 14): number[] {
  assertPeriod(period);
  const result: number[] = new Array<number>(closes.length).fill(NaN);
  if (closes.length <= period) return result;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const change = closes[i] - closes[i - 1];
    avgGain += Math.max(change, 0);
    avgLoss += Math.max(-change, 0);
  }
  avgGain /= period;
  avgLoss /= period;
  result[period] = toRsi(avgGain, avgLoss);

  for (let i = period + 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    result[i] = toRsi(avgGain, avgLoss);
  }
  return result;
}

function toRsi(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) return avgGain === 0 ? 50 : 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/**
 * Bollinger Bands over a population standard deviation
 */
export function bollingerBands(closes: readonly number[], period: number = 20, stdDevs: number = 2): BollingerSeries {
  assertPeriod(period);
  const middle = sma(closes, period);
  const upper: number[] = [];
  const lower: number[] = [];
  const width: number[] = [];

  closes.forEach((_, i) => {
    if (Number.isNaN(middle[i])) {
      upper.push(NaN);
      lower.push(NaN);
      width.push(NaN);
      return;
    }
    const sd = standardDeviation(closes.slice(i - period + 1, i + 1));
    upper.push(middle[i] + stdDevs * sd);
    lower.push(middle[i] - stdDevs * sd);
    width.push(middle[i] === 0 ? NaN : (2 * stdDevs * sd) / middle[i]);
  });

  return { middle, upper, lower, width };
}

/**
 * MACD line, signal line and histogram
 */
export function macd(
  closes: readonly number[],
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9
): MacdSeries {
  if (fastPeriod >= slowPeriod) {
    throw new RangeError(`MACD fast period (${fastPeriod}) must be shorter than slow period (${slowPeriod})`);
  }
  const fast = ema(closes, fastPeriod);
  const slow = ema(closes, slowPeriod);
  const line = closes.map((_, i) => fast[i] - slow[i]);
  const signal = ema(line, signalPeriod);
  const histogram = line.map((v, i) => v - signal[i]);
  return { macd: line, signal, histogram };
}

/**
 * True Range for a single bar
 */
export function trueRange(candle: Candle, previous?: Candle): number {
  const hl = candle.high - candle.low;
  if (!previous) return hl;
  return Math.max(hl, Math.abs(candle.high - previous.close), Math.abs(candle.low - previous.close));
}

/**
 * Average True Range (simple average of true ranges)
 */
export function atr(candles: readonly Candle[], period: number = 14): number[] {
  assertPeriod(period);
  const ranges = candles.map((c, i) => trueRange(c, i > 0 ? candles[i - 1] : undefined));
  return sma(ranges, period);
}

/**
 * Last element of a series, NaN when empty
 */
export function last(series: readonly number[], offset: number = 0): number {
  const index = series.length - 1 - offset;
  return index >= 0 ? series[index] : NaN;
}

/**
 * True when `a` moved from at-or-below `b` to strictly above it
 */
export function crossedAbove(prevA: number, prevB: number, a: number, b: number): boolean {
  return prevA <= prevB && a > b;
}

/**
 * True when `a` moved from at-or-above `b` to strictly below it
 */
export function crossedBelow(prevA: number, prevB: number, a: number, b: number): boolean {
  return prevA >= prevB && a < b;
}
