import type { Candle, Signal } from '../types';

export interface SimpleMaParams {
  fastPeriod: number;
  slowPeriod: number;
}

export interface RsiParams {
  rsiPeriod: number;
  oversold: number;
  overbought: number;
}

export interface BollingerParams {
  period: number;
  stdDev: number;
  squeezeThreshold: number;
}

export interface MacdParams {
  fastPeriod: number;
  slowPeriod: number;
  signalPeriod: number;
  divergenceLookback: number;
}

export interface GridParams {
  gridLevels: number;
  gridSpacingPct: number;
  rangePeriod: number;
  maxRangePct: number;
  maxVolatility: number;
  regridAfterBars: number;
}

export interface BreakoutParams {
  lookbackPeriod: number;
  volumeMultiplier: number;
  confirmationBars: number;
  atrPeriod: number;
}

/**
 * Strategy selector plus its parameters. Adding a variant means adding a
 * member here and a case in the factory.
 */
export type StrategySpec =
  | { kind: 'simple_ma'; params: SimpleMaParams }
  | { kind: 'rsi'; params: RsiParams }
  | { kind: 'bollinger_bands'; params: BollingerParams }
  | { kind: 'macd'; params: MacdParams }
  | { kind: 'grid_trading'; params: GridParams }
  | { kind: 'breakout'; params: BreakoutParams };

export type StrategyKind = StrategySpec['kind'];

export const STRATEGY_KINDS: readonly StrategyKind[] = [
  'simple_ma',
  'rsi',
  'bollinger_bands',
  'macd',
  'grid_trading',
  'breakout',
];

/**
 * A pure signal generator: the same closed-candle history always yields
 * the same Signal. Throws InsufficientHistoryError below `minHistory`.
 */
export interface SignalStrategy {
  readonly id: string;
  readonly kind: StrategyKind;
  readonly minHistory: number;
  evaluate(candles: readonly Candle[]): Signal;
}
