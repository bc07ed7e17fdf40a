/**
 * Tests for the Risk Manager
 */

import { RiskRejection } from '@/lib/errors';
import { EquityTracker, evaluateRisk, riskError } from '@/lib/risk-manager';
import type { Intent, Position, RiskAccountState, RiskLimits } from '@/lib/types';

const LIMITS: RiskLimits = {
  maxLeverage: 3,
  maxPositionUsd: 5000,
  maxDailyLossUsd: 100,
  maxDrawdownPct: 10,
};

const OPTIONS = { minOrderNotionalUsd: 10 };

function account(overrides: Partial<RiskAccountState> = {}): RiskAccountState {
  return {
    equity: 1000,
    marginUsed: 0,
    available: 1000,
    totalNotional: 0,
    peakEquity: 1000,
    realizedPnlToday: 0,
    ...overrides,
  };
}

function intent(overrides: Partial<Intent> = {}): Intent {
  return {
    symbol: 'BTC',
    strategyId: 'ma',
    side: 'buy',
    action: 'ENTRY',
    requestedNotional: 3500,
    referencePrice: 50_000,
    reason: 'test',
    createdAt: 0,
    reduceOnly: false,
    ...overrides,
  };
}

function position(netSize: number): Position {
  return { symbol: 'BTC', netSize, entryPrice: 50_000, markPrice: 50_000, unrealizedPnl: 0, realizedPnl: 0, updatedAt: 0 };
}

describe('Risk Manager', () => {
  describe('entries', () => {
    it('should size an entry down to the leverage headroom', () => {
      const decision = evaluateRisk(intent(), undefined, account(), LIMITS, OPTIONS);

      expect(decision.approved).toBe(true);
      expect(decision.sizedNotional).toBe(3000);
      expect(decision.checks.map(c => c.name)).toEqual(['leverage', 'position_cap', 'daily_loss', 'drawdown']);
      expect(decision.checks.every(c => c.passed)).toBe(true);
    });

    it('should be deterministic for identical inputs', () => {
      const a = evaluateRisk(intent(), position(0.01), account(), LIMITS, OPTIONS);
      const b = evaluateRisk(intent(), position(0.01), account(), LIMITS, OPTIONS);
      expect(a).toEqual(b);
    });

    it('should reject when leverage is used up', () => {
      const decision = evaluateRisk(intent(), undefined, account({ totalNotional: 3000 }), LIMITS, OPTIONS);

      expect(decision.approved).toBe(false);
      expect(decision.sizedNotional).toBe(0);
      expect(decision.code).toBe('RISK_REJECTED');
      expect(decision.rejectionReason).toBe('Leverage limit reached: Exposure $3000.00 of $3000.00 allowed at 3x');
      expect(decision.checks).toHaveLength(1);
    });

    it('should reject adding to a position at its cap', () => {
      const decision = evaluateRisk(intent(), position(0.1), account({ equity: 10_000, peakEquity: 10_000 }), LIMITS, OPTIONS);
      expect(decision.rejectionReason).toBe('Position cap reached: Position $5000.00 against cap $5000.00');
    });

    it('should allow trading against a position at its cap', () => {
      const decision = evaluateRisk(
        intent({ side: 'sell', requestedNotional: 12_000 }),
        position(0.1),
        account({ equity: 10_000, peakEquity: 10_000 }),
        LIMITS,
        OPTIONS
      );
      expect(decision.approved).toBe(true);
      expect(decision.sizedNotional).toBe(10_000);
    });

    it('should reject entries once the daily loss limit is hit', () => {
      const decision = evaluateRisk(intent(), undefined, account({ realizedPnlToday: -105 }), LIMITS, OPTIONS);

      expect(decision.approved).toBe(false);
      expect(decision.rejectionReason).toBe('Daily loss limit reached: Realized today $-105.00, limit -$100.00');
      expect(decision.checks.map(c => c.passed)).toEqual([true, true, false]);
    });

    it('should reject entries at the drawdown limit', () => {
      const decision = evaluateRisk(intent(), undefined, account({ equity: 900 }), LIMITS, OPTIONS);
      expect(decision.rejectionReason).toBe('Drawdown limit reached: Drawdown 10.00%, limit 10%');
    });

    it('should reject sizes under the exchange minimum', () => {
      const decision = evaluateRisk(intent({ requestedNotional: 5 }), undefined, account(), LIMITS, OPTIONS);

      expect(decision.approved).toBe(false);
      expect(decision.code).toBe('SIZE_TOO_SMALL');
      expect(decision.rejectionReason).toBe('Sized notional $5.00 below exchange minimum $10.00');
      expect(decision.checks[decision.checks.length - 1]).toEqual({
        name: 'minimum_size',
        passed: false,
        details: 'Sized notional $5.00 below exchange minimum $10.00',
      });
    });
  });

  describe('exits', () => {
    it('should approve exits past the daily loss limit, capped at the position', () => {
      const decision = evaluateRisk(
        intent({ action: 'EXIT', side: 'sell', requestedNotional: 600, reduceOnly: true }),
        position(0.01),
        account({ realizedPnlToday: -105 }),
        LIMITS,
        OPTIONS
      );

      expect(decision.approved).toBe(true);
      expect(decision.sizedNotional).toBe(500);
      expect(decision.checks).toEqual([
        { name: 'exit_reduces_position', passed: true, details: 'Exit of up to $500.00 permitted' },
      ]);
    });

    it('should reject an exit with nothing to reduce', () => {
      const decision = evaluateRisk(intent({ action: 'EXIT', side: 'sell' }), undefined, account(), LIMITS, OPTIONS);
      expect(decision.approved).toBe(false);
      expect(decision.rejectionReason).toBe('No long position to exit');
    });

    it('should reject an exit on the wrong side', () => {
      const decision = evaluateRisk(intent({ action: 'EXIT', side: 'buy' }), position(0.01), account(), LIMITS, OPTIONS);
      expect(decision.rejectionReason).toBe('No short position to exit');
    });
  });

  describe('riskError', () => {
    it('should map decisions to RiskRejection', () => {
      const approved = evaluateRisk(intent(), undefined, account(), LIMITS, OPTIONS);
      expect(riskError(approved)).toBeNull();

      const error = riskError(evaluateRisk(intent({ requestedNotional: 5 }), undefined, account(), LIMITS, OPTIONS));
      expect(error).toBeInstanceOf(RiskRejection);
      expect(error?.code).toBe('SIZE_TOO_SMALL');
    });
  });

  describe('EquityTracker', () => {
    it('should keep the high-water mark', () => {
      const tracker = new EquityTracker(1000);
      expect(tracker.update(900)).toBe(1000);
      expect(tracker.update(1200)).toBe(1200);
      expect(tracker.update(1100)).toBe(1200);
      expect(tracker.peakEquity).toBe(1200);
    });
  });
});
