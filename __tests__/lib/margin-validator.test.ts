/**
 * Tests for the startup margin preflight
 */

import { parseConfig, type StrategyConfig } from '@/lib/config';
import { silentLogger, type Logger } from '@/lib/logger';
import {
  riskMultiplier,
  validateMinimumBalance,
  validateStrategyMargin,
} from '@/lib/margin-validator';
import { defaultStrategySpec } from '@/lib/strategies';
import type { AccountState } from '@/lib/types';

function strategy(overrides: Partial<StrategyConfig> = {}): StrategyConfig {
  return {
    id: 'ma',
    spec: defaultStrategySpec('simple_ma'),
    symbols: ['BTC', 'ETH'],
    timeframe: '1h',
    timeframeMs: 3_600_000,
    positionSizeUsd: 100,
    takeProfitPct: 5,
    stopLossPct: 2,
    entryThreshold: 0.5,
    exitThreshold: 0.5,
    allowShort: false,
    ...overrides,
  };
}

const EXECUTION = parseConfig(
  'symbols: [BTC, ETH, SOL]\nstrategies:\n  - kind: simple_ma\nexecution:\n  minOrderNotionalBySymbol:\n    BTC: 100\n',
  {}
).execution;

function account(equity: number): AccountState {
  return { equity, marginUsed: 0, available: equity, totalNotional: 0 };
}

describe('Margin preflight', () => {
  describe('lookups', () => {
    it('should fall back to one for unweighted kinds', () => {
      expect(riskMultiplier('breakout')).toBe(1.5);
      expect(riskMultiplier('rsi')).toBe(1);
    });
  });

  describe('validateStrategyMargin', () => {
    it('should pass when equity covers worst-case margin', () => {
      const result = validateStrategyMargin(strategy(), account(1000), EXECUTION, silentLogger);

      expect(result.isValid).toBe(true);
      expect(result.message).toBe('Configuration is valid for trading');
      expect(result.totalExposure).toBe(200);
      expect(result.requiredMargin).toBeCloseTo(90, 8);
      expect(result.recommendations).toEqual([]);
    });

    it('should recommend fixes when margin is short, and log a warning', () => {
      const warn = jest.fn();
      const logger: Logger = { ...silentLogger, warn };

      const result = validateStrategyMargin(strategy(), account(50), EXECUTION, logger);

      expect(result.isValid).toBe(false);
      expect(result.message).toBe('Insufficient margin or invalid configuration');
      expect(result.recommendations).toEqual([
        'Reduce positionSizeUsd to $55.56 or less',
        'Or trade at most 1 symbols',
        'Or add at least $40.00 to the account',
      ]);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toBe('Margin preflight failed');
    });

    it('should flag sizes under a symbol minimum', () => {
      const result = validateStrategyMargin(
        strategy({ symbols: ['BTC', 'SOL'], positionSizeUsd: 60 }),
        account(10_000),
        EXECUTION,
        silentLogger
      );
      expect(result.recommendations).toEqual(['Increase positionSizeUsd to at least $100.00 (BTC)']);
    });

    it('should check the margin of a full grid', () => {
      const spec = defaultStrategySpec('grid_trading');
      if (spec.kind !== 'grid_trading') throw new Error('expected a grid spec');
      spec.params.gridLevels = 20;

      const result = validateStrategyMargin(strategy({ spec, symbols: ['ETH'] }), account(150), EXECUTION, silentLogger);
      expect(result.recommendations).toEqual(['Reduce gridLevels to 15 or less']);
    });

    it('should fail without account equity', () => {
      const result = validateStrategyMargin(strategy(), account(0), EXECUTION, silentLogger);
      expect(result.isValid).toBe(false);
      expect(result.message).toBe('Account equity unavailable');
    });
  });

  describe('validateMinimumBalance', () => {
    it('should require enough for one minimum order', () => {
      expect(validateMinimumBalance(5, 50)).toMatchObject({
        isValid: false,
        message: 'Account balance $5.00 is below minimum $7.50',
        recommendations: ['Add at least $2.50 to the account'],
      });
      expect(validateMinimumBalance(100, 50)).toMatchObject({
        isValid: true,
        message: 'Account meets minimum requirements ($100.00 >= $7.50)',
      });
    });

    it('should scale with the configured minimum notional', () => {
      expect(validateMinimumBalance(1, EXECUTION.minOrderNotionalUsd)).toMatchObject({
        isValid: false,
        message: 'Account balance $1.00 is below minimum $1.50',
        recommendations: ['Add at least $0.50 to the account'],
      });
    });
  });
});
