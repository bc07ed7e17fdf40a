/**
 * Tests for the Order Manager
 */

import { LiveOrderConflictError, TransientTransportError } from '@/lib/errors';
import { silentLogger } from '@/lib/logger';
import { OrderManager, pairKey } from '@/lib/order-manager';
import { createOrder, OrderStatus, transitionOrder } from '@/lib/order-state';
import { PaperExchange } from '@/lib/paper-exchange';
import type { FillEvent } from '@/lib/types';
import { instantRetry, manualClock, openLimiter, orderRequest, type ManualClock } from '../helpers/engine';

describe('OrderManager', () => {
  let exchange: PaperExchange;
  let clock: ManualClock;
  let manager: OrderManager;
  let fills: FillEvent[];

  beforeEach(() => {
    exchange = new PaperExchange({ initialEquity: 10_000 });
    exchange.setMark('BTC', 100);
    exchange.setMark('ETH', 10);
    clock = manualClock(1_000);
    manager = new OrderManager({
      exchange,
      retry: instantRetry(),
      rateLimiter: openLimiter(),
      logger: silentLogger,
      now: clock.now,
      orderTtlMs: 300_000,
      pendingTimeoutMs: 60_000,
    });
    fills = [];
    manager.onFill(fill => fills.push(fill));
  });

  describe('submit', () => {
    it('should fill a market order and emit one fill', async () => {
      const order = await manager.submit(orderRequest({ size: 2 }));

      expect(order.status).toBe(OrderStatus.FILLED);
      expect(order.filledSize).toBe(2);
      expect(order.avgFillPrice).toBe(100);
      expect(order.exchangeOrderId).toBe('paper-1');
      expect(order.attempts).toBe(1);
      expect(fills).toEqual([{
        fillId: 'ma-BTC-1-entry:2',
        clientOrderId: 'ma-BTC-1-entry',
        symbol: 'BTC',
        strategyId: 'ma',
        side: 'buy',
        size: 2,
        price: 100,
        timestamp: 1_000,
      }]);
      expect(manager.getLiveOrder('BTC', 'ma')).toBeUndefined();
    });

    it('should reject after three transport failures without dropping the order', async () => {
      exchange.failNext('submitOrder', new TransientTransportError('timeout'), 3);

      const order = await manager.submit(orderRequest());

      expect(order.status).toBe(OrderStatus.REJECTED);
      expect(order.attempts).toBe(3);
      expect(order.rejectionReason).toBe('Transport failed after 3 attempts: timeout');
      expect(exchange.callCount('submitOrder')).toBe(3);
      expect(manager.getOrder('ma-BTC-1-entry')?.status).toBe(OrderStatus.REJECTED);
      expect(manager.getLiveOrder('BTC', 'ma')).toBeUndefined();
    });

    it('should succeed on a retry after a transient failure', async () => {
      exchange.failNext('submitOrder', new TransientTransportError('connection reset'));

      const order = await manager.submit(orderRequest());
      expect(order.status).toBe(OrderStatus.FILLED);
      expect(order.attempts).toBe(2);
    });

    it('should reject immediately on an exchange refusal', async () => {
      const order = await manager.submit(orderRequest({ side: 'sell', reduceOnly: true }));

      expect(order.status).toBe(OrderStatus.REJECTED);
      expect(order.rejectionReason).toBe('Exchange rejected: Reduce-only order would increase position');
      expect(exchange.callCount('submitOrder')).toBe(1);
    });

    it('should reach the exchange once for concurrent submissions of the same id', async () => {
      const [first, second] = await Promise.all([
        manager.submit(orderRequest()),
        manager.submit(orderRequest()),
      ]);

      expect(first).toEqual(second);
      expect(exchange.callCount('submitOrder')).toBe(1);

      const again = await manager.submit(orderRequest());
      expect(again.status).toBe(OrderStatus.FILLED);
      expect(exchange.callCount('submitOrder')).toBe(1);
      expect(fills).toHaveLength(1);
    });

    it('should refuse a second live order for the same pair', async () => {
      const resting = await manager.submit(orderRequest({ type: 'limit', price: 90 }));
      expect(resting.status).toBe(OrderStatus.OPEN);

      await expect(manager.submit(orderRequest({ clientOrderId: 'ma-BTC-2-entry' }))).rejects.toBeInstanceOf(
        LiveOrderConflictError
      );
      await expect(manager.submit(orderRequest({ clientOrderId: 'rsi-BTC-2-entry', strategyId: 'rsi' })))
        .resolves.toMatchObject({ status: OrderStatus.FILLED });
      expect(manager.getLiveOrder('BTC', 'ma')?.clientOrderId).toBe('ma-BTC-1-entry');
    });

    it('should notify order listeners on every change', async () => {
      const seen: OrderStatus[] = [];
      manager.onOrderUpdate(order => seen.push(order.status));
      await manager.submit(orderRequest());
      expect(seen).toEqual([OrderStatus.FILLED]);
    });
  });

  describe('cancel', () => {
    it('should cancel a resting order and free the pair', async () => {
      await manager.submit(orderRequest({ type: 'limit', price: 90 }));
      const cancelled = await manager.cancel('ma-BTC-1-entry');

      expect(cancelled.status).toBe(OrderStatus.CANCELLED);
      expect(manager.getLiveOrder('BTC', 'ma')).toBeUndefined();
    });

    it('should return terminal orders untouched', async () => {
      await manager.submit(orderRequest());
      const order = await manager.cancel('ma-BTC-1-entry');
      expect(order.status).toBe(OrderStatus.FILLED);
      expect(exchange.callCount('cancelOrder')).toBe(0);
    });

    it('should throw for an unknown id', async () => {
      await expect(manager.cancel('nope')).rejects.toThrow('Unknown order: nope');
    });
  });

  describe('reconcile', () => {
    it('should pick up a fill that happened on the exchange', async () => {
      await manager.submit(orderRequest({ type: 'limit', price: 90, size: 1 }));
      exchange.setMark('BTC', 89);

      const snapshot = await manager.fetchSnapshot();
      expect(snapshot.openOrders).toEqual([]);
      expect(snapshot.resolvedOrders.map(r => r.status)).toEqual(['filled']);

      const report = await manager.reconcile(snapshot);
      expect(report.updated).toEqual(['ma-BTC-1-entry']);
      expect(report.mismatches).toHaveLength(1);
      expect(manager.getOrder('ma-BTC-1-entry')?.status).toBe(OrderStatus.FILLED);
      expect(fills.map(f => [f.size, f.price])).toEqual([[1, 90]]);
    });

    it('should cancel exchange orders nothing local owns', async () => {
      exchange.injectOpenOrder(orderRequest({ clientOrderId: 'stray', type: 'limit', price: 50 }));

      const report = await manager.reconcile(await manager.fetchSnapshot());

      expect(report.orphansCancelled).toEqual(['stray']);
      expect(await exchange.getOpenOrders()).toEqual([]);
    });

    it('should close out local orders the exchange has never seen', async () => {
      const pending = createOrder(orderRequest({ clientOrderId: 'lost-pending' }), 0);
      const open = createOrder(orderRequest({ clientOrderId: 'lost-open', strategyId: 'rsi' }), 0);
      transitionOrder(open, OrderStatus.OPEN, 0);
      manager.restore([pending, open]);

      const report = await manager.reconcile(await manager.fetchSnapshot());

      expect(report.updated).toEqual(['lost-pending', 'lost-open']);
      expect(manager.getOrder('lost-pending')?.status).toBe(OrderStatus.REJECTED);
      expect(manager.getOrder('lost-pending')?.rejectionReason).toBe('Not found on exchange');
      expect(manager.getOrder('lost-open')?.status).toBe(OrderStatus.CANCELLED);
    });

    it('should report nothing when local and exchange agree', async () => {
      await manager.submit(orderRequest({ type: 'limit', price: 90 }));
      const report = await manager.reconcile(await manager.fetchSnapshot());
      expect(report).toEqual({ mismatches: [], updated: [], orphansCancelled: [] });
    });
  });

  describe('sweep', () => {
    it('should reject PENDING orders past the acknowledgement timeout', async () => {
      manager.restore([createOrder(orderRequest({ clientOrderId: 'stuck' }), 0)]);

      expect(await manager.sweep(60_000)).toEqual([]);
      expect(await manager.sweep(60_001)).toEqual(['stuck']);
      expect(manager.getOrder('stuck')?.rejectionReason).toBe('No exchange acknowledgement after 60001ms');
    });

    it('should cancel live orders past their TTL', async () => {
      await manager.submit(orderRequest({ type: 'limit', price: 90 }));

      expect(await manager.sweep(1_000 + 300_001)).toEqual(['ma-BTC-1-entry']);
      expect(manager.getOrder('ma-BTC-1-entry')?.status).toBe(OrderStatus.CANCELLED);
    });
  });

  describe('restore', () => {
    it('should reclaim the pair slot of a restored live order', () => {
      const order = createOrder(orderRequest(), 0);
      transitionOrder(order, OrderStatus.OPEN, 0);
      manager.restore([order]);

      expect(manager.getLiveOrder('BTC', 'ma')?.clientOrderId).toBe('ma-BTC-1-entry');
      expect(pairKey('BTC', 'ma')).toBe('BTC:ma');
    });
  });
});
