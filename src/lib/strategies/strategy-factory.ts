/**
 * Strategy Factory
 *
 * Builds signal strategies from a StrategySpec and supplies the default
 * parameters for each kind.
 */

import {
  BOLLINGER_DEFAULTS,
  BREAKOUT_DEFAULTS,
  GRID_DEFAULTS,
  MACD_DEFAULTS,
  RSI_DEFAULTS,
  SIMPLE_MA_DEFAULTS,
} from '../constants';
import { BollingerStrategy } from './bollinger-strategy';
import { BreakoutStrategy } from './breakout-strategy';
import { GridStrategy } from './grid-strategy';
import { MacdStrategy } from './macd-strategy';
import { RsiStrategy } from './rsi-strategy';
import { SimpleMaStrategy } from './simple-ma-strategy';
import { STRATEGY_KINDS, type SignalStrategy, type StrategyKind, type StrategySpec } from './types';

/**
 * Create a strategy instance from its spec
 */
export function createStrategy(id: string, spec: StrategySpec): SignalStrategy {
  switch (spec.kind) {
    case 'simple_ma':
      return new SimpleMaStrategy(id, spec.params);
    case 'rsi':
      return new RsiStrategy(id, spec.params);
    case 'bollinger_bands':
      return new BollingerStrategy(id, spec.params);
    case 'macd':
      return new MacdStrategy(id, spec.params);
    case 'grid_trading':
      return new GridStrategy(id, spec.params);
    case 'breakout':
      return new BreakoutStrategy(id, spec.params);
    default: {
      const unknown: never = spec;
      throw new Error(`Unknown strategy type: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Spec for `kind` populated with default parameters
 */
export function defaultStrategySpec(kind: StrategyKind): StrategySpec {
  switch (kind) {
    case 'simple_ma':
      return { kind, params: { ...SIMPLE_MA_DEFAULTS } };
    case 'rsi':
      return { kind, params: { ...RSI_DEFAULTS } };
    case 'bollinger_bands':
      return { kind, params: { ...BOLLINGER_DEFAULTS } };
    case 'macd':
      return { kind, params: { ...MACD_DEFAULTS } };
    case 'grid_trading': {
      const { minCandles: _minCandles, ...params } = GRID_DEFAULTS;
      return { kind, params };
    }
    case 'breakout':
      return { kind, params: { ...BREAKOUT_DEFAULTS } };
  }
}

/**
 * Get all available strategy types
 */
export function getAvailableStrategyTypes(): StrategyKind[] {
  return [...STRATEGY_KINDS];
}
