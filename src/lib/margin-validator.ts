/**
 * Margin Preflight
 *
 * Checks at startup whether the account can carry every position a
 * strategy may open at once. Advisory only: a failed check is logged with
 * recommendations, live risk evaluation still gates each order.
 */

import { minOrderNotionalFor, type ExecutionConfig, type StrategyConfig } from './config';
import { MARGIN_CONFIG } from './constants';
import { createLogger, type Logger } from './logger';
import type { AccountState } from './types';

export interface MarginValidationResult {
  isValid: boolean;
  message: string;
  recommendations: string[];
  /** Margin the worst case needs, buffers included */
  requiredMargin: number;
  totalExposure: number;
}

export function riskMultiplier(kind: string): number {
  return MARGIN_CONFIG.STRATEGY_RISK_MULTIPLIERS[kind] ?? 1;
}

/**
 * Validate one strategy against the account. One position per symbol is the
 * most a strategy holds, so worst-case exposure is size × symbol count.
 */
export function validateStrategyMargin(
  strategy: StrategyConfig,
  account: AccountState,
  execution: ExecutionConfig,
  logger: Logger = createLogger('margin')
): MarginValidationResult {
  const { MARGIN_REQUIREMENT, INITIAL_MARGIN_MULTIPLIER, SAFETY_BUFFER } = MARGIN_CONFIG;
  const size = strategy.positionSizeUsd;
  const maxPositions = strategy.symbols.length;
  const multiplier = riskMultiplier(strategy.spec.kind);

  const totalExposure = size * maxPositions;
  const perUsd = MARGIN_REQUIREMENT * INITIAL_MARGIN_MULTIPLIER * SAFETY_BUFFER * multiplier;
  const requiredMargin = totalExposure * perUsd;
  const recommendations: string[] = [];

  if (account.equity <= 0) {
    return {
      isValid: false,
      message: 'Account equity unavailable',
      recommendations: ['Check exchange connectivity and account funding'],
      requiredMargin,
      totalExposure,
    };
  }

  if (requiredMargin > account.equity) {
    recommendations.push(`Reduce positionSizeUsd to $${(account.equity / (maxPositions * perUsd)).toFixed(2)} or less`);
    recommendations.push(`Or trade at most ${Math.floor(account.equity / (size * perUsd))} symbols`);
    recommendations.push(`Or add at least $${(requiredMargin - account.equity).toFixed(2)} to the account`);
  }

  const minimumFor = (symbol: string): number => minOrderNotionalFor(execution, symbol);
  const belowMinimum = strategy.symbols.filter(symbol => size < minimumFor(symbol));
  if (belowMinimum.length > 0) {
    const floor = Math.max(...strategy.symbols.map(minimumFor));
    recommendations.push(`Increase positionSizeUsd to at least $${floor.toFixed(2)} (${belowMinimum.join(', ')})`);
  }

  if (strategy.spec.kind === 'grid_trading') {
    const levels = strategy.spec.params.gridLevels;
    const gridMargin = size * levels * MARGIN_REQUIREMENT;
    if (gridMargin > account.equity) {
      recommendations.push(`Reduce gridLevels to ${Math.floor(account.equity / (size * MARGIN_REQUIREMENT))} or less`);
    }
  }

  const isValid = recommendations.length === 0;
  const meta = {
    strategyId: strategy.id,
    kind: strategy.spec.kind,
    symbols: strategy.symbols,
    equity: account.equity,
    totalExposure,
    requiredMargin,
  };
  if (isValid) {
    logger.info('Margin preflight passed', {
      ...meta,
      utilizationPct: (requiredMargin / account.equity) * 100,
    });
  } else {
    logger.warn('Margin preflight failed', { ...meta, recommendations });
  }

  return {
    isValid,
    message: isValid ? 'Configuration is valid for trading' : 'Insufficient margin or invalid configuration',
    recommendations,
    requiredMargin,
    totalExposure,
  };
}

/**
 * Smallest balance that can place even one order of `minOrderNotionalUsd`
 */
export function validateMinimumBalance(equity: number, minOrderNotionalUsd: number): MarginValidationResult {
  const required = minOrderNotionalUsd * MARGIN_CONFIG.MARGIN_REQUIREMENT * MARGIN_CONFIG.SAFETY_BUFFER;
  if (equity < required) {
    return {
      isValid: false,
      message: `Account balance $${equity.toFixed(2)} is below minimum $${required.toFixed(2)}`,
      recommendations: [`Add at least $${(required - equity).toFixed(2)} to the account`],
      requiredMargin: required,
      totalExposure: 0,
    };
  }
  return {
    isValid: true,
    message: `Account meets minimum requirements ($${equity.toFixed(2)} >= $${required.toFixed(2)})`,
    recommendations: [],
    requiredMargin: required,
    totalExposure: 0,
  };
}
