export type {
  SignalStrategy,
  StrategySpec,
  StrategyKind,
  SimpleMaParams,
  RsiParams,
  BollingerParams,
  MacdParams,
  GridParams,
  BreakoutParams,
} from './types';
export { STRATEGY_KINDS } from './types';
export { SimpleMaStrategy } from './simple-ma-strategy';
export { RsiStrategy } from './rsi-strategy';
export { BollingerStrategy } from './bollinger-strategy';
export { MacdStrategy, detectDivergence } from './macd-strategy';
export { GridStrategy, computeGrid, type GridLayout, type GridLevel } from './grid-strategy';
export { BreakoutStrategy } from './breakout-strategy';
export { createStrategy, defaultStrategySpec, getAvailableStrategyTypes } from './strategy-factory';
