import { InsufficientHistoryError } from '@/lib/errors';
import { SimpleMaStrategy } from '@/lib/strategies/simple-ma-strategy';
import { candlesFromCloses, HOUR, repeat, T0 } from '../../helpers/candles';

describe('SimpleMaStrategy', () => {
  const strategy = new SimpleMaStrategy('ma', { fastPeriod: 10, slowPeriod: 30 });

  it('should need slowPeriod candles', () => {
    expect(strategy.minHistory).toBe(30);
    expect(() => strategy.evaluate(candlesFromCloses(repeat(100, 29)))).toThrow(InsufficientHistoryError);
  });

  it('should stay FLAT at exactly slowPeriod candles', () => {
    const signal = strategy.evaluate(candlesFromCloses(repeat(100, 30)));
    expect(signal.direction).toBe('FLAT');
    expect(signal.strength).toBe(0);
  });

  it('should emit a full-strength LONG on the candle where fast crosses above slow', () => {
    const candles = candlesFromCloses([...repeat(100, 30), 130]);

    // fast = 1030 / 10 = 103, slow = 3030 / 30 = 101
    const signal = strategy.evaluate(candles);
    expect(signal).toMatchObject({
      direction: 'LONG',
      strength: 1,
      sourceStrategyId: 'ma',
      evaluatedAt: T0 + 30 * HOUR,
      reason: 'Fast SMA crossed above slow SMA',
    });
    expect(signal.meta?.fastSma).toBe(103);
    expect(signal.meta?.slowSma).toBe(101);
  });

  it('should not repeat the signal once fast is already above', () => {
    const signal = strategy.evaluate(candlesFromCloses([...repeat(100, 30), 130, 130]));
    expect(signal.direction).toBe('FLAT');
  });

  it('should emit SHORT on a death cross', () => {
    const signal = strategy.evaluate(candlesFromCloses([...repeat(100, 30), 70]));
    expect(signal.direction).toBe('SHORT');
    expect(signal.strength).toBe(1);
  });

  it('should reject fastPeriod >= slowPeriod', () => {
    expect(() => new SimpleMaStrategy('bad', { fastPeriod: 30, slowPeriod: 30 })).toThrow(RangeError);
  });
});
