import { BollingerStrategy } from '@/lib/strategies/bollinger-strategy';
import { candlesFromCloses } from '../../helpers/candles';

// 20 closes alternating 99 / 101: middle 100, deviation 1, width 0.04
const BASE = Array.from({ length: 20 }, (_, i) => (i % 2 === 0 ? 99 : 101));

function evaluateWith(close: number, squeezeThreshold = 0.02) {
  const strategy = new BollingerStrategy('bb', { period: 20, stdDev: 2, squeezeThreshold });
  return strategy.evaluate(candlesFromCloses([...BASE, close]));
}

describe('BollingerStrategy', () => {
  it('should need period + 1 candles', () => {
    const strategy = new BollingerStrategy('bb', { period: 20, stdDev: 2, squeezeThreshold: 0.02 });
    expect(strategy.minHistory).toBe(21);
  });

  it('should go LONG at 0.85 on a close well below the lower band', () => {
    // lower band ~94.75
    const signal = evaluateWith(90);
    expect(signal.direction).toBe('LONG');
    expect(signal.strength).toBe(0.85);
    expect(signal.reason).toBe('Close well below lower band');
  });

  it('should go LONG at 0.75 on a shallow cross of the lower band', () => {
    // lower band ~97.60, strong threshold ~97.11
    const signal = evaluateWith(97.2);
    expect(signal.direction).toBe('LONG');
    expect(signal.strength).toBe(0.75);
    expect(signal.reason).toBe('Close crossed below lower band');
  });

  it('should go SHORT at 0.8 on a cross of the upper band', () => {
    // upper band ~102.53
    const signal = evaluateWith(103);
    expect(signal.direction).toBe('SHORT');
    expect(signal.strength).toBe(0.8);
  });

  it('should stay FLAT inside the bands', () => {
    const signal = evaluateWith(100);
    expect(signal.direction).toBe('FLAT');
    expect(signal.reason).toBe('Close inside bands');
  });

  it('should not buy the lower band while squeezed', () => {
    const signal = evaluateWith(97.2, 0.1);
    expect(signal.direction).toBe('FLAT');
    expect(signal.reason).toBe('Bands in squeeze');
  });
});
