/**
 * Tests for Trading Engine Constants
 */

import {
  COMMON_STRATEGY_DEFAULTS,
  DEFAULT_RISK_LIMITS,
  MACD_DEFAULTS,
  MARGIN_CONFIG,
  RETRY_DEFAULTS,
  RSI_DEFAULTS,
  SIMPLE_MA_DEFAULTS,
  TIMEFRAME_MS,
} from '@/lib/constants';

describe('Trading Engine Constants', () => {
  describe('strategy defaults', () => {
    it('should have logical period ordering', () => {
      expect(SIMPLE_MA_DEFAULTS.fastPeriod).toBeLessThan(SIMPLE_MA_DEFAULTS.slowPeriod);
      expect(MACD_DEFAULTS.fastPeriod).toBeLessThan(MACD_DEFAULTS.slowPeriod);
    });

    it('should have RSI bands inside 0-100', () => {
      expect(RSI_DEFAULTS.oversold).toBeGreaterThan(0);
      expect(RSI_DEFAULTS.oversold).toBeLessThan(RSI_DEFAULTS.overbought);
      expect(RSI_DEFAULTS.overbought).toBeLessThan(100);
    });

    it('should keep thresholds within signal strength range', () => {
      expect(COMMON_STRATEGY_DEFAULTS.entryThreshold).toBeGreaterThanOrEqual(0);
      expect(COMMON_STRATEGY_DEFAULTS.entryThreshold).toBeLessThan(1);
      expect(COMMON_STRATEGY_DEFAULTS.exitThreshold).toBeLessThan(1);
    });

    it('should be long-only unless configured otherwise', () => {
      expect(COMMON_STRATEGY_DEFAULTS.allowShort).toBe(false);
    });
  });

  describe('DEFAULT_RISK_LIMITS', () => {
    it('should have positive limits', () => {
      expect(DEFAULT_RISK_LIMITS.maxLeverage).toBeGreaterThan(0);
      expect(DEFAULT_RISK_LIMITS.maxPositionUsd).toBeGreaterThan(0);
      expect(DEFAULT_RISK_LIMITS.maxDailyLossUsd).toBeGreaterThan(0);
    });

    it('should express drawdown as a percentage', () => {
      expect(DEFAULT_RISK_LIMITS.maxDrawdownPct).toBe(10);
    });
  });

  describe('RETRY_DEFAULTS', () => {
    it('should cap the delay above the base delay', () => {
      expect(RETRY_DEFAULTS.maxAttempts).toBe(3);
      expect(RETRY_DEFAULTS.baseDelayMs).toBeLessThan(RETRY_DEFAULTS.maxDelayMs);
    });
  });

  describe('MARGIN_CONFIG', () => {
    it('should require more than the maintenance margin', () => {
      expect(MARGIN_CONFIG.MARGIN_REQUIREMENT).toBeLessThan(1);
      expect(MARGIN_CONFIG.INITIAL_MARGIN_MULTIPLIER).toBeGreaterThan(1);
      expect(MARGIN_CONFIG.SAFETY_BUFFER).toBeGreaterThan(1);
    });

    it('should weight the grid as the riskiest kind', () => {
      const multipliers = Object.values(MARGIN_CONFIG.STRATEGY_RISK_MULTIPLIERS);
      expect(Math.max(...multipliers)).toBe(MARGIN_CONFIG.STRATEGY_RISK_MULTIPLIERS.grid_trading);
    });
  });

  describe('TIMEFRAME_MS', () => {
    it('should list timeframes in ascending order', () => {
      const values = Object.values(TIMEFRAME_MS);
      expect([...values].sort((a, b) => a - b)).toEqual(values);
      expect(TIMEFRAME_MS['4h']).toBe(4 * TIMEFRAME_MS['1h']);
    });
  });
});
