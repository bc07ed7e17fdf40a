/**
 * Grid Trading
 *
 * Levels are spaced symmetrically around the midpoint of the trailing range
 * (the current candle excluded). In a ranging market a close that crosses
 * down through a buy level is LONG, a close that crosses up through a sell
 * level is SHORT. The signal carries the level so the state machine can
 * avoid re-entering it.
 */

import { GRID_DEFAULTS } from '../constants';
import { calculateReturns, standardDeviation } from '../indicators';
import type { Candle, Signal } from '../types';
import { buildSignal, closesOf, requireHistory } from './base';
import type { GridParams, SignalStrategy } from './types';

const GRID_STRENGTH = 0.6;
const BUY_TOLERANCE = 1.001;
const SELL_TOLERANCE = 0.999;

export interface GridLevel {
  /** Negative below the anchor (buy), positive above (sell) */
  index: number;
  price: number;
}

export interface GridLayout {
  anchor: number;
  rangeHigh: number;
  rangeLow: number;
  rangePct: number;
  volatility: number;
  levels: GridLevel[];
}

export function computeGrid(history: readonly Candle[], params: GridParams): GridLayout {
  const rangeHigh = Math.max(...history.map(c => c.high));
  const rangeLow = Math.min(...history.map(c => c.low));
  const anchor = (rangeHigh + rangeLow) / 2;
  const rangePct = rangeLow > 0 ? ((rangeHigh - rangeLow) / rangeLow) * 100 : Infinity;
  const volatility = standardDeviation(calculateReturns(closesOf(history)));

  const perSide = Math.max(1, Math.floor(params.gridLevels / 2));
  const levels: GridLevel[] = [];
  for (let i = perSide; i >= 1; i--) {
    levels.push({ index: -i, price: anchor * (1 - (i * params.gridSpacingPct) / 100) });
  }
  for (let i = 1; i <= perSide; i++) {
    levels.push({ index: i, price: anchor * (1 + (i * params.gridSpacingPct) / 100) });
  }

  return { anchor, rangeHigh, rangeLow, rangePct, volatility, levels };
}

export class GridStrategy implements SignalStrategy {
  readonly kind = 'grid_trading' as const;
  readonly minHistory: number;

  constructor(readonly id: string, readonly params: GridParams) {
    this.minHistory = Math.min(params.rangePeriod, GRID_DEFAULTS.minCandles) + 1;
  }

  evaluate(candles: readonly Candle[]): Signal {
    requireHistory(candles, this.minHistory);
    const history = candles.slice(Math.max(0, candles.length - 1 - this.params.rangePeriod), -1);
    const grid = computeGrid(history, this.params);
    const close = candles[candles.length - 1].close;
    const prevClose = candles[candles.length - 2].close;
    const baseMeta = { anchor: grid.anchor, rangePct: grid.rangePct };

    const ranging = grid.rangePct < this.params.maxRangePct && grid.volatility < this.params.maxVolatility;
    if (!ranging) {
      return buildSignal(this.id, candles, 'FLAT', 0, 'Market not ranging', baseMeta);
    }

    // deepest buy level crossed on this candle
    const buyLevel = grid.levels
      .filter(l => l.index < 0 && prevClose > l.price && close <= l.price * BUY_TOLERANCE)
      .sort((a, b) => a.price - b.price)[0];
    if (buyLevel) {
      return buildSignal(this.id, candles, 'LONG', GRID_STRENGTH, `Crossed down through grid level ${buyLevel.index}`, {
        ...baseMeta,
        level: buyLevel.price,
        levelIndex: buyLevel.index,
      });
    }

    const sellLevel = grid.levels
      .filter(l => l.index > 0 && prevClose < l.price && close >= l.price * SELL_TOLERANCE)
      .sort((a, b) => b.price - a.price)[0];
    if (sellLevel) {
      return buildSignal(this.id, candles, 'SHORT', GRID_STRENGTH, `Crossed up through grid level ${sellLevel.index}`, {
        ...baseMeta,
        level: sellLevel.price,
        levelIndex: sellLevel.index,
      });
    }

    return buildSignal(this.id, candles, 'FLAT', 0, 'No grid level crossed', baseMeta);
  }
}
