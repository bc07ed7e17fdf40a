/**
 * Order Manager
 *
 * Owns the order lifecycle: idempotent submission keyed by clientOrderId,
 * cancellation, and reconciliation against exchange snapshots.
 *
 * - An order is registered synchronously, before the first exchange call,
 *   so a concurrent resubmission of the same key never reaches the exchange.
 * - At most one live order exists per (symbol, strategyId).
 * - Transport failures are retried by the shared RetryPolicy; exhaustion or
 *   an exchange rejection ends the order in REJECTED. Nothing is dropped.
 * - Exchange state wins every disagreement.
 */

import { EXECUTION_DEFAULTS } from './constants';
import { ExchangeRejection, LiveOrderConflictError, ReconciliationMismatch } from './errors';
import type { ExchangeClient } from './exchange';
import { createLogger, serializeError, type Logger } from './logger';
import {
  OrderStatus,
  createOrder,
  isTerminalStatus,
  isValidTransition,
  statusFromReport,
  transitionOrder,
  type Order,
} from './order-state';
import { RateLimiter } from './rate-limiter';
import { RetryExhaustedError, RetryPolicy } from './retry';
import type { ExchangeOrderReport, ExchangeSnapshot, FillEvent, OrderRequest } from './types';

// ============================================
// TYPES
// ============================================

export type OrderListener = (order: Order) => void;
export type FillListener = (fill: FillEvent) => void;

export interface OrderManagerOptions {
  exchange: ExchangeClient;
  retry?: RetryPolicy;
  rateLimiter?: RateLimiter;
  logger?: Logger;
  now?: () => number;
  /** Live orders older than this are cancelled by the sweep */
  orderTtlMs?: number;
  /** PENDING orders with no call in flight older than this are rejected by the sweep */
  pendingTimeoutMs?: number;
}

export interface ReconciliationReport {
  mismatches: ReconciliationMismatch[];
  /** Local orders whose state changed */
  updated: string[];
  /** Exchange orders cancelled because nothing local owns them */
  orphansCancelled: string[];
}

export function pairKey(symbol: string, strategyId: string): string {
  return `${symbol}:${strategyId}`;
}

function copyOrder(order: Order): Order {
  return { ...order, transitions: [...order.transitions] };
}

// ============================================
// ORDER MANAGER
// ============================================

export class OrderManager {
  private orders: Map<string, Order> = new Map();
  private liveByPair: Map<string, string> = new Map();
  private inFlight: Map<string, Promise<Order>> = new Map();
  private cancelsInFlight: Map<string, Promise<Order>> = new Map();
  private orderListeners: OrderListener[] = [];
  private fillListeners: FillListener[] = [];

  private readonly exchange: ExchangeClient;
  private readonly retry: RetryPolicy;
  private readonly limiter: RateLimiter;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly orderTtlMs: number;
  private readonly pendingTimeoutMs: number;

  constructor(options: OrderManagerOptions) {
    this.exchange = options.exchange;
    this.retry = options.retry ?? new RetryPolicy();
    this.limiter = options.rateLimiter ?? new RateLimiter();
    this.log = options.logger ?? createLogger('order-manager');
    this.now = options.now ?? Date.now;
    this.orderTtlMs = options.orderTtlMs ?? EXECUTION_DEFAULTS.orderTtlMs;
    this.pendingTimeoutMs = options.pendingTimeoutMs ?? EXECUTION_DEFAULTS.pendingTimeoutMs;
  }

  onOrderUpdate(listener: OrderListener): void {
    this.orderListeners.push(listener);
  }

  onFill(listener: FillListener): void {
    this.fillListeners.push(listener);
  }

  // ============================================
  // SUBMIT / CANCEL
  // ============================================

  /**
   * Submit an order. A known clientOrderId returns the existing order (or
   * the in-flight submission of it) without touching the exchange.
   */
  submit(request: OrderRequest): Promise<Order> {
    const existing = this.orders.get(request.clientOrderId);
    if (existing) {
      this.log.debug('Duplicate submission ignored', { clientOrderId: request.clientOrderId, status: existing.status });
      return this.inFlight.get(request.clientOrderId) ?? Promise.resolve(copyOrder(existing));
    }

    const pair = pairKey(request.symbol, request.strategyId);
    const liveId = this.liveByPair.get(pair);
    if (liveId) {
      return Promise.reject(new LiveOrderConflictError(pair, liveId));
    }

    const order = createOrder(request, this.now());
    this.orders.set(order.clientOrderId, order);
    this.liveByPair.set(pair, order.clientOrderId);
    this.log.info('Submitting order', {
      clientOrderId: order.clientOrderId,
      symbol: order.symbol,
      side: order.side,
      type: order.type,
      size: order.size,
      reduceOnly: order.reduceOnly,
    });

    const submission = this.send(order, request).finally(() => {
      this.inFlight.delete(order.clientOrderId);
    });
    this.inFlight.set(order.clientOrderId, submission);
    return submission;
  }

  /**
   * Cancel a live order. Terminal orders are returned as they are.
   */
  async cancel(clientOrderId: string): Promise<Order> {
    const order = this.orders.get(clientOrderId);
    if (!order) {
      throw new Error(`Unknown order: ${clientOrderId}`);
    }

    const submitting = this.inFlight.get(clientOrderId);
    if (submitting) await submitting;
    if (isTerminalStatus(order.status)) return copyOrder(order);

    const running = this.cancelsInFlight.get(clientOrderId);
    if (running) return running;

    const cancellation = this.sendCancel(order).finally(() => {
      this.cancelsInFlight.delete(clientOrderId);
    });
    this.cancelsInFlight.set(clientOrderId, cancellation);
    return cancellation;
  }

  // ============================================
  // RECONCILIATION
  // ============================================

  /**
   * Gather what reconciliation needs: open orders, positions, account, and
   * the final status of local live orders the exchange no longer lists.
   */
  async fetchSnapshot(): Promise<ExchangeSnapshot> {
    const openOrders = await this.call(() => this.exchange.getOpenOrders());
    const positions = await this.call(() => this.exchange.getPositions());
    const account = await this.call(() => this.exchange.getAccountState());

    const openIds = new Set(openOrders.map(o => o.clientOrderId));
    const resolvedOrders: ExchangeOrderReport[] = [];
    for (const order of this.liveOrders()) {
      if (openIds.has(order.clientOrderId) || this.inFlight.has(order.clientOrderId)) continue;
      const report = await this.call(() => this.exchange.getOrderStatus(order.clientOrderId));
      if (report) resolvedOrders.push(report);
    }

    return { openOrders, resolvedOrders, positions, account, fetchedAt: this.now() };
  }

  /**
   * Correct local orders from the snapshot and cancel exchange orders
   * nothing local owns.
   */
  async reconcile(snapshot: ExchangeSnapshot): Promise<ReconciliationReport> {
    const report: ReconciliationReport = { mismatches: [], updated: [], orphansCancelled: [] };
    const reports = new Map<string, ExchangeOrderReport>();
    for (const r of snapshot.resolvedOrders) reports.set(r.clientOrderId, r);
    for (const r of snapshot.openOrders) reports.set(r.clientOrderId, r);

    for (const order of this.liveOrders()) {
      if (this.inFlight.has(order.clientOrderId)) continue;
      const exchangeReport = reports.get(order.clientOrderId);

      if (exchangeReport) {
        const exchangeStatus = statusFromReport(exchangeReport);
        if (exchangeStatus !== order.status || exchangeReport.filledSize !== order.filledSize) {
          this.recordMismatch(report, order, exchangeReport);
          if (this.applyReport(order, exchangeReport)) report.updated.push(order.clientOrderId);
        }
        continue;
      }

      // unknown to the exchange: never placed, or gone without a trace
      const target = order.status === OrderStatus.PENDING ? OrderStatus.REJECTED : OrderStatus.CANCELLED;
      this.recordMismatch(report, order, null);
      transitionOrder(order, target, snapshot.fetchedAt, 'Not found on exchange');
      this.settle(order);
      report.updated.push(order.clientOrderId);
    }

    for (const open of snapshot.openOrders) {
      const local = this.orders.get(open.clientOrderId);
      if (local && !isTerminalStatus(local.status)) continue;
      if (this.inFlight.has(open.clientOrderId)) continue;

      const mismatch = new ReconciliationMismatch(`order ${open.clientOrderId}`, local?.status ?? null, 'open');
      report.mismatches.push(mismatch);
      this.log.warn('Cancelling orphan exchange order', {
        clientOrderId: open.clientOrderId,
        symbol: open.symbol,
        localStatus: local?.status ?? null,
      });
      try {
        await this.call(() => this.exchange.cancelOrder(open.symbol, open.clientOrderId));
        report.orphansCancelled.push(open.clientOrderId);
      } catch (error) {
        this.log.error('Failed to cancel orphan order', { clientOrderId: open.clientOrderId, ...serializeError(error) });
      }
    }

    return report;
  }

  /**
   * Push stuck orders to a terminal state: PENDING past the timeout is
   * rejected, live orders past their TTL are cancelled.
   */
  async sweep(now: number = this.now()): Promise<string[]> {
    const touched: string[] = [];
    for (const order of this.liveOrders()) {
      if (this.inFlight.has(order.clientOrderId)) continue;
      const age = now - order.createdAt;

      if (order.status === OrderStatus.PENDING && age > this.pendingTimeoutMs) {
        transitionOrder(order, OrderStatus.REJECTED, now, `No exchange acknowledgement after ${age}ms`);
        this.log.error('Pending order timed out', { clientOrderId: order.clientOrderId, ageMs: age });
        this.settle(order);
        touched.push(order.clientOrderId);
      } else if (order.status !== OrderStatus.PENDING && age > this.orderTtlMs) {
        this.log.info('Order TTL expired, cancelling', { clientOrderId: order.clientOrderId, ageMs: age });
        await this.cancel(order.clientOrderId);
        touched.push(order.clientOrderId);
      }
    }
    return touched;
  }

  // ============================================
  // QUERIES
  // ============================================

  getOrder(clientOrderId: string): Order | undefined {
    const order = this.orders.get(clientOrderId);
    return order ? copyOrder(order) : undefined;
  }

  getLiveOrder(symbol: string, strategyId: string): Order | undefined {
    const id = this.liveByPair.get(pairKey(symbol, strategyId));
    return id ? this.getOrder(id) : undefined;
  }

  all(): Order[] {
    return Array.from(this.orders.values()).map(copyOrder);
  }

  /**
   * Resolves once every submission in flight has settled
   */
  async waitForInFlight(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values(), ...this.cancelsInFlight.values()]);
  }

  /**
   * Load orders persisted before a restart
   */
  restore(orders: readonly Order[]): void {
    for (const order of orders) {
      if (this.orders.has(order.clientOrderId)) continue;
      const copy = copyOrder(order);
      this.orders.set(copy.clientOrderId, copy);
      if (!isTerminalStatus(copy.status)) {
        this.liveByPair.set(pairKey(copy.symbol, copy.strategyId), copy.clientOrderId);
      }
    }
  }

  // ============================================
  // INTERNALS
  // ============================================

  private call<T>(fn: () => Promise<T>): Promise<T> {
    return this.retry.execute(() => this.limiter.schedule(fn));
  }

  private liveOrders(): Order[] {
    return Array.from(this.orders.values()).filter(o => !isTerminalStatus(o.status));
  }

  private async send(order: Order, request: OrderRequest): Promise<Order> {
    try {
      const ack = await this.retry.execute(attempt => {
        order.attempts = attempt;
        return this.limiter.schedule(() => this.exchange.submitOrder(request));
      });
      this.applyReport(order, ack);
    } catch (error) {
      this.rejectAfterFailure(order, error);
    }
    return copyOrder(order);
  }

  private rejectAfterFailure(order: Order, error: unknown): void {
    let reason: string;
    if (error instanceof ExchangeRejection) {
      reason = `Exchange rejected: ${error.message}`;
    } else if (error instanceof RetryExhaustedError) {
      const last = error.lastError instanceof Error ? error.lastError.message : String(error.lastError);
      reason = `Transport failed after ${error.attempts} attempts: ${last}`;
    } else {
      reason = `Submission failed: ${error instanceof Error ? error.message : String(error)}`;
    }

    transitionOrder(order, OrderStatus.REJECTED, this.now(), reason);
    this.log.error('Order rejected', {
      clientOrderId: order.clientOrderId,
      symbol: order.symbol,
      attempts: order.attempts,
      reason,
      ...serializeError(error),
    });
    this.settle(order);
  }

  private async sendCancel(order: Order): Promise<Order> {
    try {
      const report = await this.call(() => this.exchange.cancelOrder(order.symbol, order.clientOrderId));
      this.applyReport(order, report);
    } catch (error) {
      if (error instanceof ExchangeRejection && !isTerminalStatus(order.status)) {
        // the exchange does not know it, so it is not resting anywhere
        transitionOrder(order, OrderStatus.CANCELLED, this.now(), `Cancel refused: ${error.message}`);
        this.settle(order);
      } else {
        this.log.error('Cancel failed, sweep will retry', { clientOrderId: order.clientOrderId, ...serializeError(error) });
      }
    }
    return copyOrder(order);
  }

  /**
   * Fold an exchange report into the local order. Returns true on any change.
   */
  private applyReport(order: Order, report: ExchangeOrderReport): boolean {
    const now = this.now();
    let changed = false;

    if (report.exchangeOrderId && order.exchangeOrderId !== report.exchangeOrderId) {
      order.exchangeOrderId = report.exchangeOrderId;
      changed = true;
    }

    if (report.filledSize > order.filledSize) {
      this.emitFill(order, report, now);
      changed = true;
    }

    const target = statusFromReport(report);
    if (target !== order.status) {
      if (isValidTransition(order.status, target)) {
        transitionOrder(order, target, now, report.reason ?? `Exchange reported ${report.status}`);
        changed = true;
      } else {
        this.log.warn('Ignoring exchange status that would reverse a transition', {
          clientOrderId: order.clientOrderId,
          local: order.status,
          exchange: target,
        });
      }
    }

    if (changed) {
      order.updatedAt = now;
      this.settle(order);
    }
    return changed;
  }

  private emitFill(order: Order, report: ExchangeOrderReport, now: number): void {
    const previousFilled = order.filledSize;
    const previousCost = (order.avgFillPrice ?? 0) * previousFilled;
    const delta = report.filledSize - previousFilled;
    const avg = report.avgFillPrice ?? report.price ?? order.price ?? order.avgFillPrice ?? 0;
    const deltaPrice = report.avgFillPrice !== undefined
      ? (report.avgFillPrice * report.filledSize - previousCost) / delta
      : avg;

    order.filledSize = report.filledSize;
    order.avgFillPrice = avg;

    const fill: FillEvent = {
      fillId: `${order.clientOrderId}:${report.filledSize}`,
      clientOrderId: order.clientOrderId,
      symbol: order.symbol,
      strategyId: order.strategyId,
      side: order.side,
      size: delta,
      price: deltaPrice,
      timestamp: now,
    };
    for (const listener of this.fillListeners) {
      listener(fill);
    }
  }

  private recordMismatch(report: ReconciliationReport, order: Order, exchange: ExchangeOrderReport | null): void {
    const mismatch = new ReconciliationMismatch(
      `order ${order.clientOrderId}`,
      { status: order.status, filledSize: order.filledSize },
      exchange ? { status: exchange.status, filledSize: exchange.filledSize } : null
    );
    report.mismatches.push(mismatch);
    this.log.warn(mismatch.message, { local: mismatch.local, exchange: mismatch.exchange });
  }

  /**
   * Release the pair slot of a terminal order and notify listeners
   */
  private settle(order: Order): void {
    if (isTerminalStatus(order.status)) {
      const pair = pairKey(order.symbol, order.strategyId);
      if (this.liveByPair.get(pair) === order.clientOrderId) {
        this.liveByPair.delete(pair);
      }
    }
    const snapshot = copyOrder(order);
    for (const listener of this.orderListeners) {
      listener(snapshot);
    }
  }
}
