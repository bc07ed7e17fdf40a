import { assertContiguous, closedCandles, isKnownTimeframe, nextBoundary, timeframeToMs } from '@/lib/candles';
import { CandleGapError } from '@/lib/errors';
import { candlesFromCloses, HOUR, T0 } from '../helpers/candles';

describe('Candle helpers', () => {
  describe('timeframeToMs', () => {
    it('should resolve named timeframes', () => {
      expect(timeframeToMs('15m')).toBe(900_000);
      expect(timeframeToMs('1d')).toBe(86_400_000);
      expect(isKnownTimeframe('4h')).toBe(true);
      expect(isKnownTimeframe('2h')).toBe(false);
    });

    it('should parse other counts of a known unit', () => {
      expect(timeframeToMs('2h')).toBe(7_200_000);
      expect(timeframeToMs('3m')).toBe(180_000);
    });

    it('should reject unknown formats', () => {
      expect(() => timeframeToMs('abc')).toThrow('Unsupported timeframe: abc');
      expect(() => timeframeToMs('0h')).toThrow('Unsupported timeframe: 0h');
      expect(() => timeframeToMs('1w')).toThrow('Unsupported timeframe: 1w');
    });
  });

  describe('closedCandles', () => {
    it('should drop the candle still forming at now', () => {
      const candles = candlesFromCloses([1, 2, 3]);
      const now = T0 + 2 * HOUR + 5;

      expect(closedCandles(candles, HOUR, now).map(c => c.close)).toEqual([1, 2]);
    });

    it('should keep a candle whose period ends exactly at now', () => {
      const candles = candlesFromCloses([1, 2, 3]);
      expect(closedCandles(candles, HOUR, T0 + 3 * HOUR)).toHaveLength(3);
    });
  });

  describe('assertContiguous', () => {
    it('should accept evenly spaced candles', () => {
      expect(() => assertContiguous(candlesFromCloses([1, 2, 3]), HOUR)).not.toThrow();
    });

    it('should throw CandleGapError on a missing period', () => {
      const candles = candlesFromCloses([1, 2, 3]);
      const gapped = [candles[0], candles[2]];

      expect(() => assertContiguous(gapped, HOUR)).toThrow(CandleGapError);
      expect(() => assertContiguous(gapped, HOUR)).toThrow(
        `Candle series not contiguous: ${T0} -> ${T0 + 2 * HOUR} (timeframe ${HOUR}ms)`
      );
    });
  });

  describe('nextBoundary', () => {
    it('should round up to the next period start', () => {
      expect(nextBoundary(T0 + 10, HOUR)).toBe(T0 + HOUR);
      expect(nextBoundary(T0, HOUR)).toBe(T0 + HOUR);
    });
  });
});
