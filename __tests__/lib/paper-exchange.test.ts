import { ExchangeRejection, TransientTransportError } from '@/lib/errors';
import { PaperExchange } from '@/lib/paper-exchange';
import { orderRequest } from '../helpers/engine';

describe('PaperExchange', () => {
  let exchange: PaperExchange;

  beforeEach(() => {
    exchange = new PaperExchange({ initialEquity: 10_000 });
    exchange.setMark('BTC', 100);
  });

  describe('market orders', () => {
    it('should fill at the mark and open a position', async () => {
      const report = await exchange.submitOrder(orderRequest({ size: 1 }));

      expect(report).toMatchObject({ exchangeOrderId: 'paper-1', status: 'filled', filledSize: 1, avgFillPrice: 100 });
      expect(await exchange.getPositions()).toEqual([{ symbol: 'BTC', netSize: 1, entryPrice: 100, markPrice: 100 }]);
    });

    it('should settle realized PnL into equity when reducing', async () => {
      await exchange.submitOrder(orderRequest({ size: 1 }));
      exchange.setMark('BTC', 110);
      await exchange.submitOrder(orderRequest({ clientOrderId: 'ma-BTC-2-exit', side: 'sell', size: 0.5, reduceOnly: true }));

      const account = await exchange.getAccountState();
      expect(account.equity).toBe(10_010);
      expect(account.totalNotional).toBe(55);
      expect(account.marginUsed).toBeCloseTo(5.5, 9);
      expect(account.available).toBeCloseTo(10_004.5, 9);
    });

    it('should return the existing order for a repeated client id', async () => {
      const first = await exchange.submitOrder(orderRequest({ size: 1 }));
      const second = await exchange.submitOrder(orderRequest({ size: 1 }));

      expect(second.exchangeOrderId).toBe(first.exchangeOrderId);
      expect((await exchange.getPositions())[0].netSize).toBe(1);
    });
  });

  describe('refusals', () => {
    it('should refuse a reduce-only order with nothing to reduce', async () => {
      await expect(exchange.submitOrder(orderRequest({ side: 'sell', reduceOnly: true }))).rejects.toThrow(
        'Reduce-only order would increase position'
      );
    });

    it('should refuse orders beyond the venue leverage', async () => {
      await expect(exchange.submitOrder(orderRequest({ size: 1001 }))).rejects.toThrow('Insufficient margin');
    });

    it('should refuse unknown markets', async () => {
      await expect(exchange.submitOrder(orderRequest({ symbol: 'DOGE' }))).rejects.toBeInstanceOf(ExchangeRejection);
    });
  });

  describe('limit orders', () => {
    it('should rest until the mark crosses, then fill at the limit price', async () => {
      const report = await exchange.submitOrder(orderRequest({ type: 'limit', price: 95, size: 1 }));
      expect(report.status).toBe('open');

      exchange.setMark('BTC', 96);
      expect(await exchange.getOpenOrders()).toHaveLength(1);

      exchange.setMark('BTC', 94);
      expect(await exchange.getOrderStatus('ma-BTC-1-entry')).toMatchObject({ status: 'filled', avgFillPrice: 95 });
      expect(await exchange.getOpenOrders()).toEqual([]);
    });

    it('should cancel a resting order', async () => {
      await exchange.submitOrder(orderRequest({ type: 'limit', price: 95 }));
      const report = await exchange.cancelOrder('BTC', 'ma-BTC-1-entry');
      expect(report.status).toBe('cancelled');
    });
  });

  describe('fault injection', () => {
    it('should throw the queued error then recover', async () => {
      exchange.failNext('getPositions', new TransientTransportError('timeout'));

      await expect(exchange.getPositions()).rejects.toThrow('timeout');
      await expect(exchange.getPositions()).resolves.toEqual([]);
      expect(exchange.callCount('getPositions')).toBe(2);
    });

    it('should report unknown orders as null', async () => {
      expect(await exchange.getOrderStatus('missing')).toBeNull();
    });
  });
});
