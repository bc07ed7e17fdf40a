/**
 * Position Tracker
 *
 * In-process view of net exposure per symbol. Changes only through
 * confirmed fills or a reconciliation overwrite; pending orders never move
 * it. Unrealized PnL is recomputed on every read from the latest mark.
 */

import { ReconciliationMismatch } from './errors';
import { createLogger, type Logger } from './logger';
import type { ExchangePosition, FillEvent, Position } from './types';

const SIZE_EPSILON = 1e-9;

interface PositionRecord {
  symbol: string;
  netSize: number;
  entryPrice: number;
  markPrice: number;
  realizedPnl: number;
  updatedAt: number;
  reconciledAt?: number;
}

export interface PositionTrackerOptions {
  logger?: Logger;
  now?: () => number;
}

function utcDay(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

function normalizeSize(size: number): number {
  return Math.abs(size) < SIZE_EPSILON ? 0 : size;
}

export class PositionTracker {
  private positions: Map<string, PositionRecord> = new Map();
  private appliedFills: Set<string> = new Set();
  private daily = { day: '', realized: 0 };
  private lastReconciled?: number;
  private log: Logger;
  private now: () => number;

  constructor(options: PositionTrackerOptions = {}) {
    this.log = options.logger ?? createLogger('position-tracker');
    this.now = options.now ?? Date.now;
  }

  /**
   * Apply a confirmed fill. Returns false for a fill already applied.
   */
  applyFill(fill: FillEvent): boolean {
    if (this.appliedFills.has(fill.fillId)) {
      this.log.debug('Duplicate fill ignored', { fillId: fill.fillId });
      return false;
    }
    if (fill.size <= 0 || fill.price <= 0) {
      throw new RangeError(`Fill ${fill.fillId} has non-positive size or price`);
    }
    this.appliedFills.add(fill.fillId);

    const record = this.record(fill.symbol);
    const signed = fill.side === 'buy' ? fill.size : -fill.size;
    const current = record.netSize;

    if (current === 0 || Math.sign(current) === Math.sign(signed)) {
      const nextSize = current + signed;
      record.entryPrice = (Math.abs(current) * record.entryPrice + fill.size * fill.price) / Math.abs(nextSize);
      record.netSize = normalizeSize(nextSize);
    } else {
      const closing = Math.min(Math.abs(signed), Math.abs(current));
      const pnl = closing * (fill.price - record.entryPrice) * Math.sign(current);
      record.realizedPnl += pnl;
      this.addRealized(pnl, fill.timestamp);

      const remaining = normalizeSize(current + signed);
      if (remaining === 0) {
        record.entryPrice = 0;
      } else if (Math.sign(remaining) !== Math.sign(current)) {
        // flipped through zero: the excess opens at the fill price
        record.entryPrice = fill.price;
      }
      record.netSize = remaining;
    }

    record.markPrice = fill.price;
    record.updatedAt = fill.timestamp;
    this.log.info('Fill applied', {
      fillId: fill.fillId,
      symbol: fill.symbol,
      side: fill.side,
      size: fill.size,
      price: fill.price,
      netSize: record.netSize,
    });
    return true;
  }

  /**
   * Overwrite local state with the exchange snapshot. Symbols the exchange
   * does not report are flat. Returns the corrections made.
   */
  reconcile(snapshot: readonly ExchangePosition[], reconciledAt: number = this.now()): ReconciliationMismatch[] {
    const mismatches: ReconciliationMismatch[] = [];
    const reported = new Map(snapshot.map(p => [p.symbol, p]));

    for (const symbol of new Set([...this.positions.keys(), ...reported.keys()])) {
      const record = this.record(symbol);
      const exchange = reported.get(symbol);
      const netSize = exchange ? normalizeSize(exchange.netSize) : 0;
      const entryPrice = netSize === 0 ? 0 : exchange?.entryPrice ?? 0;

      if (Math.abs(record.netSize - netSize) > SIZE_EPSILON || Math.abs(record.entryPrice - entryPrice) > SIZE_EPSILON) {
        const mismatch = new ReconciliationMismatch(
          `position ${symbol}`,
          { netSize: record.netSize, entryPrice: record.entryPrice },
          { netSize, entryPrice }
        );
        mismatches.push(mismatch);
        this.log.warn(mismatch.message, { local: mismatch.local, exchange: mismatch.exchange });
      }

      record.netSize = netSize;
      record.entryPrice = entryPrice;
      if (exchange?.markPrice !== undefined) record.markPrice = exchange.markPrice;
      record.reconciledAt = reconciledAt;
      record.updatedAt = reconciledAt;
    }

    this.lastReconciled = reconciledAt;
    return mismatches;
  }

  get(symbol: string): Position {
    const record = this.positions.get(symbol);
    if (!record) {
      return {
        symbol,
        netSize: 0,
        entryPrice: 0,
        markPrice: 0,
        unrealizedPnl: 0,
        realizedPnl: 0,
        updatedAt: 0,
        reconciledAt: this.lastReconciled,
      };
    }
    const mark = record.markPrice > 0 ? record.markPrice : record.entryPrice;
    return {
      ...record,
      markPrice: mark,
      unrealizedPnl: record.netSize === 0 ? 0 : record.netSize * (mark - record.entryPrice),
    };
  }

  all(): Position[] {
    return Array.from(this.positions.keys()).map(symbol => this.get(symbol));
  }

  updateMark(symbol: string, price: number): void {
    if (price <= 0) return;
    const record = this.record(symbol);
    record.markPrice = price;
  }

  /**
   * Realized PnL booked on the current UTC day
   */
  realizedPnlToday(now: number = this.now()): number {
    return this.daily.day === utcDay(now) ? this.daily.realized : 0;
  }

  get lastReconciledAt(): number | undefined {
    return this.lastReconciled;
  }

  /**
   * Seed from persisted state after a restart. The next reconciliation overwrites it.
   */
  restore(positions: readonly Position[], realizedToday?: { day: string; realized: number }): void {
    for (const p of positions) {
      this.positions.set(p.symbol, {
        symbol: p.symbol,
        netSize: p.netSize,
        entryPrice: p.entryPrice,
        markPrice: p.markPrice,
        realizedPnl: p.realizedPnl,
        updatedAt: p.updatedAt,
        reconciledAt: p.reconciledAt,
      });
    }
    if (realizedToday) this.daily = { ...realizedToday };
  }

  dailySnapshot(): { day: string; realized: number } {
    return { ...this.daily };
  }

  private addRealized(pnl: number, timestamp: number): void {
    const day = utcDay(timestamp);
    if (this.daily.day !== day) {
      this.daily = { day, realized: 0 };
    }
    this.daily.realized += pnl;
  }

  private record(symbol: string): PositionRecord {
    let record = this.positions.get(symbol);
    if (!record) {
      record = { symbol, netSize: 0, entryPrice: 0, markPrice: 0, realizedPnl: 0, updatedAt: this.now() };
      this.positions.set(symbol, record);
    }
    return record;
  }
}
