/**
 * Tests for Breakout Strategy
 */

import { BreakoutStrategy } from '@/lib/strategies/breakout-strategy';
import { candlesFromCloses, repeat } from '../../helpers/candles';

// 20 flat bars: channel 99..101, true range 2, volume 1000
function withLast(close: number, volume: number) {
  return candlesFromCloses([...repeat(100, 20), close], {
    wick: 1,
    volume: [...repeat(1000, 20), volume],
  });
}

describe('BreakoutStrategy', () => {
  const strategy = new BreakoutStrategy('brk', {
    lookbackPeriod: 20,
    volumeMultiplier: 1.5,
    confirmationBars: 2,
    atrPeriod: 14,
  });

  it('should need max(lookback, 20, atrPeriod) + 1 candles', () => {
    expect(strategy.minHistory).toBe(21);
  });

  it('should go LONG at 0.85 when the close clears the high by more than half an ATR', () => {
    // ATR = (13 * 2 + 5) / 14, break of 2 > 1.107
    const signal = strategy.evaluate(withLast(103, 2000));

    expect(signal.direction).toBe('LONG');
    expect(signal.strength).toBe(0.85);
    expect(signal.reason).toBe('Close broke 20-bar high $101.00 on volume');
    expect(signal.meta?.volumeRatio).toBe(2);
    expect(signal.meta?.atr).toBeCloseTo(31 / 14, 10);
  });

  it('should go LONG at 0.7 on a shallow break', () => {
    const signal = strategy.evaluate(withLast(101.5, 2000));
    expect(signal.direction).toBe('LONG');
    expect(signal.strength).toBe(0.7);
  });

  it('should go SHORT on a low break with volume', () => {
    const signal = strategy.evaluate(withLast(97, 1500));
    expect(signal.direction).toBe('SHORT');
    expect(signal.strength).toBe(0.85);
    expect(signal.reason).toBe('Close broke 20-bar low $99.00 on volume');
  });

  it('should stay FLAT when volume does not confirm', () => {
    const signal = strategy.evaluate(withLast(103, 1000));
    expect(signal.direction).toBe('FLAT');
    expect(signal.reason).toBe('Channel break without volume confirmation');
  });

  it('should stay FLAT inside the channel', () => {
    const signal = strategy.evaluate(withLast(100.5, 5000));
    expect(signal.direction).toBe('FLAT');
    expect(signal.reason).toBe('Close inside channel');
  });
});
