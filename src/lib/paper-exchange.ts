/**
 * Paper Exchange
 *
 * In-process perpetuals venue implementing ExchangeClient: candle feeds,
 * market and limit fills against a mark price, net positions with cash
 * settlement of realized PnL, and fault injection for tests and dry runs.
 */

import { ExchangeRejection } from './errors';
import type { ExchangeClient, ExchangeMethod } from './exchange';
import type {
  AccountState,
  Candle,
  ExchangeOrderReport,
  ExchangePosition,
  OrderRequest,
} from './types';

export interface PaperExchangeOptions {
  initialEquity?: number;
  /** Maintenance margin as a fraction of notional */
  marginRequirement?: number;
  /** Highest account leverage the venue accepts */
  maxLeverage?: number;
}

interface PaperPosition {
  netSize: number;
  entryPrice: number;
}

interface PaperOrder {
  request: OrderRequest;
  exchangeOrderId: string;
  status: ExchangeOrderReport['status'];
  filledSize: number;
  avgFillPrice?: number;
}

export class PaperExchange implements ExchangeClient {
  private cash: number;
  private readonly marginRequirement: number;
  private readonly maxLeverage: number;
  private candles: Map<string, Candle[]> = new Map();
  private marks: Map<string, number> = new Map();
  private positions: Map<string, PaperPosition> = new Map();
  private orders: Map<string, PaperOrder> = new Map();
  private faults: Map<ExchangeMethod, unknown[]> = new Map();
  private calls: Map<ExchangeMethod, number> = new Map();
  private sequence = 0;

  constructor(options: PaperExchangeOptions = {}) {
    this.cash = options.initialEquity ?? 10_000;
    this.marginRequirement = options.marginRequirement ?? 0.1;
    this.maxLeverage = options.maxLeverage ?? 10;
  }

  // ============================================
  // SIMULATION CONTROLS
  // ============================================

  setCandles(symbol: string, candles: readonly Candle[]): void {
    this.candles.set(symbol, [...candles]);
    const last = candles[candles.length - 1];
    if (last) this.setMark(symbol, last.close);
  }

  appendCandle(symbol: string, candle: Candle): void {
    const series = this.candles.get(symbol) ?? [];
    series.push(candle);
    this.candles.set(symbol, series);
    this.setMark(symbol, candle.close);
  }

  /**
   * Move the mark price; resting limit orders that cross it fill
   */
  setMark(symbol: string, price: number): void {
    this.marks.set(symbol, price);
    for (const order of this.orders.values()) {
      if (order.status !== 'open' || order.request.symbol !== symbol) continue;
      if (this.limitCrosses(order.request, price)) {
        this.fill(order, order.request.price ?? price);
      }
    }
  }

  /**
   * Make the next `times` calls to `method` throw `error`
   */
  failNext(method: ExchangeMethod, error: unknown, times: number = 1): void {
    const queue = this.faults.get(method) ?? [];
    for (let i = 0; i < times; i++) queue.push(error);
    this.faults.set(method, queue);
  }

  callCount(method: ExchangeMethod): number {
    return this.calls.get(method) ?? 0;
  }

  /**
   * Place state behind the engine's back (manual trade, restart drift)
   */
  setPosition(symbol: string, netSize: number, entryPrice: number): void {
    if (netSize === 0) {
      this.positions.delete(symbol);
    } else {
      this.positions.set(symbol, { netSize, entryPrice });
    }
  }

  injectOpenOrder(request: OrderRequest): void {
    this.orders.set(request.clientOrderId, {
      request,
      exchangeOrderId: this.nextId(),
      status: 'open',
      filledSize: 0,
    });
  }

  // ============================================
  // ExchangeClient
  // ============================================

  async getCandles(symbol: string, _timeframe: string, lookback: number): Promise<Candle[]> {
    this.enter('getCandles');
    const series = this.candles.get(symbol) ?? [];
    return series.slice(-lookback);
  }

  async getAccountState(): Promise<AccountState> {
    this.enter('getAccountState');
    return this.account();
  }

  private account(): AccountState {
    let unrealized = 0;
    let totalNotional = 0;
    for (const [symbol, position] of this.positions) {
      const mark = this.markFor(symbol, position.entryPrice);
      unrealized += position.netSize * (mark - position.entryPrice);
      totalNotional += Math.abs(position.netSize) * mark;
    }
    const equity = this.cash + unrealized;
    const marginUsed = totalNotional * this.marginRequirement;
    return { equity, marginUsed, available: equity - marginUsed, totalNotional };
  }

  async submitOrder(request: OrderRequest): Promise<ExchangeOrderReport> {
    this.enter('submitOrder');
    const existing = this.orders.get(request.clientOrderId);
    if (existing) return this.report(existing);

    if (!(request.size > 0)) {
      throw new ExchangeRejection(`Invalid order size ${request.size}`);
    }
    const mark = this.marks.get(request.symbol);
    if (mark === undefined) {
      throw new ExchangeRejection(`Unknown market ${request.symbol}`);
    }
    if (request.type === 'limit' && request.price === undefined) {
      throw new ExchangeRejection('Limit order requires a price');
    }

    const position = this.positions.get(request.symbol);
    const netSize = position?.netSize ?? 0;
    const signed = request.side === 'buy' ? request.size : -request.size;
    if (request.reduceOnly && (netSize === 0 || Math.sign(netSize) === Math.sign(signed))) {
      throw new ExchangeRejection('Reduce-only order would increase position');
    }

    if (!request.reduceOnly) {
      const account = this.account();
      const notional = request.size * (request.price ?? mark);
      if (account.totalNotional + notional > account.equity * this.maxLeverage) {
        throw new ExchangeRejection('Insufficient margin');
      }
    }

    const order: PaperOrder = {
      request: request.reduceOnly
        ? { ...request, size: Math.min(request.size, Math.abs(netSize)) }
        : { ...request },
      exchangeOrderId: this.nextId(),
      status: 'open',
      filledSize: 0,
    };
    this.orders.set(request.clientOrderId, order);

    if (request.type === 'market') {
      this.fill(order, mark);
    } else if (this.limitCrosses(request, mark)) {
      this.fill(order, request.price ?? mark);
    }
    return this.report(order);
  }

  async cancelOrder(_symbol: string, clientOrderId: string): Promise<ExchangeOrderReport> {
    this.enter('cancelOrder');
    const order = this.orders.get(clientOrderId);
    if (!order) {
      throw new ExchangeRejection(`Unknown order ${clientOrderId}`);
    }
    if (order.status === 'open') {
      order.status = 'cancelled';
    }
    return this.report(order);
  }

  async getOpenOrders(): Promise<ExchangeOrderReport[]> {
    this.enter('getOpenOrders');
    return Array.from(this.orders.values())
      .filter(o => o.status === 'open')
      .map(o => this.report(o));
  }

  async getPositions(): Promise<ExchangePosition[]> {
    this.enter('getPositions');
    return Array.from(this.positions.entries()).map(([symbol, p]) => ({
      symbol,
      netSize: p.netSize,
      entryPrice: p.entryPrice,
      markPrice: this.markFor(symbol, p.entryPrice),
    }));
  }

  async getOrderStatus(clientOrderId: string): Promise<ExchangeOrderReport | null> {
    this.enter('getOrderStatus');
    const order = this.orders.get(clientOrderId);
    return order ? this.report(order) : null;
  }

  // ============================================
  // INTERNALS
  // ============================================

  private enter(method: ExchangeMethod): void {
    this.calls.set(method, this.callCount(method) + 1);
    const queue = this.faults.get(method);
    if (queue && queue.length > 0) {
      throw queue.shift();
    }
  }

  private limitCrosses(request: OrderRequest, mark: number): boolean {
    if (request.type !== 'limit' || request.price === undefined) return false;
    return request.side === 'buy' ? mark <= request.price : mark >= request.price;
  }

  private fill(order: PaperOrder, price: number): void {
    const { symbol, side } = order.request;
    const size = order.request.size - order.filledSize;
    const signed = side === 'buy' ? size : -size;
    const position = this.positions.get(symbol) ?? { netSize: 0, entryPrice: 0 };
    const current = position.netSize;

    if (current === 0 || Math.sign(current) === Math.sign(signed)) {
      const next = current + signed;
      position.entryPrice = (Math.abs(current) * position.entryPrice + size * price) / Math.abs(next);
      position.netSize = next;
    } else {
      const closing = Math.min(size, Math.abs(current));
      this.cash += closing * (price - position.entryPrice) * Math.sign(current);
      const remaining = current + signed;
      if (remaining !== 0 && Math.sign(remaining) !== Math.sign(current)) {
        position.entryPrice = price;
      }
      position.netSize = remaining;
    }
    this.setPosition(symbol, position.netSize, position.entryPrice);

    const filledBefore = order.filledSize;
    order.filledSize = order.request.size;
    order.avgFillPrice = filledBefore === 0
      ? price
      : ((order.avgFillPrice ?? price) * filledBefore + price * size) / order.filledSize;
    order.status = 'filled';
  }

  private markFor(symbol: string, fallback: number): number {
    return this.marks.get(symbol) ?? fallback;
  }

  private report(order: PaperOrder): ExchangeOrderReport {
    return {
      clientOrderId: order.request.clientOrderId,
      exchangeOrderId: order.exchangeOrderId,
      symbol: order.request.symbol,
      side: order.request.side,
      status: order.status,
      size: order.request.size,
      filledSize: order.filledSize,
      avgFillPrice: order.avgFillPrice,
      price: order.request.price,
      reduceOnly: order.request.reduceOnly,
    };
  }

  private nextId(): string {
    this.sequence += 1;
    return `paper-${this.sequence}`;
  }
}
