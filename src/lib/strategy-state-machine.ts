/**
 * Strategy State Machine
 *
 * Turns signals into entry/exit intents for one (symbol, strategy) pair.
 *
 * States:
 *   FLAT → ENTERING → IN_POSITION → EXITING → FLAT
 *
 * Entries need a signal strictly stronger than the entry threshold.
 * Exits fire on an opposing signal or on a take-profit / stop-loss breach
 * measured against the entry price. A REJECTED order drops the machine to
 * FLAT from any state; reconciliation re-adopts any position still open.
 */

import type { StrategyKind } from './strategies/types';
import type { Candle, Intent, OrderSide, Position, Signal } from './types';
import { OrderStatus, type Order } from './order-state';
import { createLogger, type Logger } from './logger';

// ============================================
// TYPES
// ============================================

export type StrategyState = 'FLAT' | 'ENTERING' | 'IN_POSITION' | 'EXITING';
export type PositionSide = 'LONG' | 'SHORT';

export interface StrategyMachineConfig {
  symbol: string;
  strategyId: string;
  kind: StrategyKind;
  positionSizeUsd: number;
  takeProfitPct: number;
  stopLossPct: number;
  entryThreshold: number;
  exitThreshold: number;
  allowShort: boolean;
  /** breakout: consecutive breakout candles required before entering */
  confirmationBars?: number;
  /** grid: candles after which consumed levels are released */
  regridAfterBars?: number;
  /** grid: anchor drift (percent) that starts a fresh grid */
  gridSpacingPct?: number;
}

export interface GridSubState {
  anchor?: number;
  barsSinceRegrid: number;
  consumedLevels: number[];
}

export interface BreakoutSubState {
  direction: 'LONG' | 'SHORT' | 'FLAT';
  count: number;
}

export interface StrategyMachineSnapshot {
  state: StrategyState;
  side?: PositionSide;
  entryPrice?: number;
  pendingClientOrderId?: string;
  lastCandleTime?: number;
  grid: GridSubState;
  breakout: BreakoutSubState;
}

export interface SignalContext {
  /** Last closed candle; its close is the reference price */
  candle: Candle;
  /** Position as of this cycle's reconciliation */
  position?: Position;
  now?: number;
}

type Rollback = Omit<StrategyMachineSnapshot, 'lastCandleTime' | 'breakout'>;

function cloneGrid(grid: GridSubState): GridSubState {
  return { ...grid, consumedLevels: [...grid.consumedLevels] };
}

export function sideForEntry(side: PositionSide): OrderSide {
  return side === 'LONG' ? 'buy' : 'sell';
}

export function sideForExit(side: PositionSide): OrderSide {
  return side === 'LONG' ? 'sell' : 'buy';
}

// ============================================
// STATE MACHINE
// ============================================

export class StrategyStateMachine {
  readonly config: StrategyMachineConfig;
  private snapshot: StrategyMachineSnapshot = {
    state: 'FLAT',
    grid: { barsSinceRegrid: 0, consumedLevels: [] },
    breakout: { direction: 'FLAT', count: 0 },
  };
  private rollback: Rollback | null = null;
  private log: Logger;

  constructor(config: StrategyMachineConfig, logger?: Logger) {
    this.config = config;
    this.log = (logger ?? createLogger('strategy')).child(`${config.symbol}:${config.strategyId}`);
  }

  get state(): StrategyState {
    return this.snapshot.state;
  }

  get side(): PositionSide | undefined {
    return this.snapshot.side;
  }

  get entryPrice(): number | undefined {
    return this.snapshot.entryPrice;
  }

  get lastCandleTime(): number | undefined {
    return this.snapshot.lastCandleTime;
  }

  /**
   * Consume one closed candle's signal. Returns the intent to act on, if any.
   * A candle already consumed is ignored.
   */
  onSignal(signal: Signal, context: SignalContext): Intent | null {
    const { lastCandleTime } = this.snapshot;
    if (lastCandleTime !== undefined && signal.evaluatedAt <= lastCandleTime) {
      return null;
    }
    this.snapshot.lastCandleTime = signal.evaluatedAt;
    this.updateBreakoutCounter(signal);
    this.updateGrid(signal);

    switch (this.snapshot.state) {
      case 'FLAT':
        return this.considerEntry(signal, context);
      case 'IN_POSITION':
        return this.considerExit(signal, context);
      default:
        // ENTERING / EXITING wait for the order to resolve
        return null;
    }
  }

  /**
   * Remember which order carries the current transition
   */
  markSubmitted(clientOrderId: string): void {
    this.snapshot.pendingClientOrderId = clientOrderId;
  }

  /**
   * Risk refused the intent: undo the tentative transition
   */
  onRiskRejected(reason: string): void {
    if (!this.rollback) return;
    const from = this.snapshot.state;
    this.snapshot = {
      ...this.rollback,
      grid: cloneGrid(this.rollback.grid),
      lastCandleTime: this.snapshot.lastCandleTime,
      breakout: this.snapshot.breakout,
    };
    this.rollback = null;
    this.log.info('Transition rolled back after risk rejection', { from, to: this.snapshot.state, reason });
  }

  /**
   * Follow the order carrying the current transition
   */
  onOrderUpdate(order: Order): void {
    if (order.clientOrderId !== this.snapshot.pendingClientOrderId) return;
    const { state } = this.snapshot;

    switch (order.status) {
      case OrderStatus.FILLED:
        if (state === 'ENTERING') {
          this.transition('IN_POSITION', { entryPrice: order.avgFillPrice ?? order.price ?? this.snapshot.entryPrice });
        } else if (state === 'EXITING') {
          this.transition('FLAT');
        }
        break;
      case OrderStatus.CANCELLED:
        if (state === 'ENTERING') {
          if (order.filledSize > 0) {
            this.transition('IN_POSITION', { entryPrice: order.avgFillPrice ?? this.snapshot.entryPrice });
          } else {
            this.transition('FLAT');
          }
        } else if (state === 'EXITING') {
          this.transition('IN_POSITION');
        }
        break;
      case OrderStatus.REJECTED:
        this.onFatalFailure(order.rejectionReason ?? 'order rejected');
        break;
      default:
        break;
    }
  }

  /**
   * Fail safe: the order path is broken, stop assuming any exposure
   */
  onFatalFailure(reason: string): void {
    this.log.warn('Fatal order failure, returning to FLAT', { from: this.snapshot.state, reason });
    this.transition('FLAT');
  }

  /**
   * Align with the reconciled position. Adopts an unexpected position so its
   * exits are managed, and drops to FLAT when the position is gone.
   * Adoption is off when several strategies share the symbol's net position.
   */
  syncPosition(position: Position | undefined, options: { adopt?: boolean } = {}): void {
    const netSize = position?.netSize ?? 0;
    const { state } = this.snapshot;
    const adopt = options.adopt ?? true;

    if (netSize !== 0 && (state === 'ENTERING' || (state === 'FLAT' && adopt))) {
      const side: PositionSide = netSize > 0 ? 'LONG' : 'SHORT';
      if (state === 'FLAT') {
        this.log.warn('Adopting reconciled position', { netSize, entryPrice: position?.entryPrice });
      }
      this.transition('IN_POSITION', { side, entryPrice: position?.entryPrice });
    } else if (netSize === 0 && (state === 'IN_POSITION' || state === 'EXITING')) {
      this.transition('FLAT');
    } else if (netSize !== 0 && state === 'IN_POSITION' && position) {
      // exchange entry price is authoritative
      this.snapshot.side = netSize > 0 ? 'LONG' : 'SHORT';
      this.snapshot.entryPrice = position.entryPrice;
    }
  }

  /**
   * Exit intent for shutdown flattening, regardless of signals
   */
  flattenIntent(position: Position, now: number = Date.now()): Intent | null {
    if (position.netSize === 0 || this.snapshot.state !== 'IN_POSITION') return null;
    const side: PositionSide = position.netSize > 0 ? 'LONG' : 'SHORT';
    this.beginTransition('EXITING');
    return this.buildIntent('EXIT', sideForExit(side), Math.abs(position.netSize) * position.markPrice, position.markPrice, 'Flatten on shutdown', now);
  }

  toSnapshot(): StrategyMachineSnapshot {
    return {
      ...this.snapshot,
      grid: cloneGrid(this.snapshot.grid),
      breakout: { ...this.snapshot.breakout },
    };
  }

  restore(snapshot: StrategyMachineSnapshot): void {
    this.snapshot = {
      ...snapshot,
      grid: cloneGrid(snapshot.grid),
      breakout: { ...snapshot.breakout },
    };
    this.rollback = null;
  }

  // ============================================
  // INTERNALS
  // ============================================

  private considerEntry(signal: Signal, context: SignalContext): Intent | null {
    if (signal.direction === 'FLAT') return null;
    if (signal.direction === 'SHORT' && !this.config.allowShort) return null;
    if (!(signal.strength > this.config.entryThreshold)) return null;

    if (this.config.kind === 'breakout') {
      const required = this.config.confirmationBars ?? 1;
      if (this.snapshot.breakout.count < required) {
        this.log.debug('Breakout awaiting confirmation', { count: this.snapshot.breakout.count, required });
        return null;
      }
    }

    const levelIndex = signal.meta?.levelIndex;
    if (this.config.kind === 'grid_trading' && levelIndex !== undefined) {
      if (this.snapshot.grid.consumedLevels.includes(levelIndex)) {
        this.log.debug('Grid level already used', { levelIndex });
        return null;
      }
    }

    const side: PositionSide = signal.direction;
    this.beginTransition('ENTERING', { side, entryPrice: context.candle.close });
    if (this.config.kind === 'grid_trading' && levelIndex !== undefined) {
      this.snapshot.grid.consumedLevels.push(levelIndex);
    }

    return this.buildIntent(
      'ENTRY',
      sideForEntry(side),
      this.config.positionSizeUsd,
      context.candle.close,
      signal.reason,
      context.now ?? Date.now()
    );
  }

  private considerExit(signal: Signal, context: SignalContext): Intent | null {
    const { side, entryPrice } = this.snapshot;
    if (!side) return null;
    const close = context.candle.close;
    let reason: string | null = null;

    if (entryPrice !== undefined && entryPrice > 0) {
      const movePct = ((close - entryPrice) / entryPrice) * 100;
      const pnlPct = side === 'LONG' ? movePct : -movePct;
      if (pnlPct >= this.config.takeProfitPct) {
        reason = `Take profit hit (${pnlPct.toFixed(2)}%)`;
      } else if (pnlPct <= -this.config.stopLossPct) {
        reason = `Stop loss hit (${pnlPct.toFixed(2)}%)`;
      }
    }

    const opposing = (side === 'LONG' && signal.direction === 'SHORT') || (side === 'SHORT' && signal.direction === 'LONG');
    if (!reason && opposing && signal.strength > this.config.exitThreshold) {
      reason = `Opposing signal: ${signal.reason}`;
    }
    if (!reason) return null;

    const netSize = context.position?.netSize ?? 0;
    const notional = netSize !== 0 ? Math.abs(netSize) * close : this.config.positionSizeUsd;
    this.beginTransition('EXITING');
    return this.buildIntent('EXIT', sideForExit(side), notional, close, reason, context.now ?? Date.now());
  }

  private updateBreakoutCounter(signal: Signal): void {
    if (this.config.kind !== 'breakout') return;
    const counter = this.snapshot.breakout;
    if (signal.direction !== 'FLAT' && signal.direction === counter.direction) {
      counter.count += 1;
    } else {
      this.snapshot.breakout = { direction: signal.direction, count: signal.direction === 'FLAT' ? 0 : 1 };
    }
  }

  private updateGrid(signal: Signal): void {
    if (this.config.kind !== 'grid_trading') return;
    const grid = this.snapshot.grid;
    grid.barsSinceRegrid += 1;

    const anchor = signal.meta?.anchor;
    const driftLimit = this.config.gridSpacingPct ?? 0;
    const drifted = anchor !== undefined && grid.anchor !== undefined && grid.anchor > 0
      && (Math.abs(anchor - grid.anchor) / grid.anchor) * 100 > driftLimit;
    const expired = this.config.regridAfterBars !== undefined && grid.barsSinceRegrid > this.config.regridAfterBars;

    if (grid.anchor === undefined || drifted || expired) {
      if (grid.consumedLevels.length > 0) {
        this.log.info('Grid reset', { anchor, previousAnchor: grid.anchor, released: grid.consumedLevels.length });
      }
      this.snapshot.grid = { anchor, barsSinceRegrid: 0, consumedLevels: [] };
    }
  }

  private beginTransition(to: StrategyState, patch: Partial<StrategyMachineSnapshot> = {}): void {
    const { lastCandleTime: _lastCandleTime, breakout: _breakout, ...current } = this.snapshot;
    this.rollback = { ...current, grid: cloneGrid(current.grid) };
    this.transition(to, patch);
  }

  private transition(to: StrategyState, patch: Partial<StrategyMachineSnapshot> = {}): void {
    const from = this.snapshot.state;
    const next: StrategyMachineSnapshot = { ...this.snapshot, ...patch, state: to };

    if (to === 'FLAT') {
      delete next.side;
      delete next.entryPrice;
    }
    if (to === 'FLAT' || to === 'IN_POSITION') {
      delete next.pendingClientOrderId;
      this.rollback = null;
    }
    if (patch.entryPrice === undefined && 'entryPrice' in patch) {
      next.entryPrice = this.snapshot.entryPrice;
    }

    this.snapshot = next;
    if (from !== to) {
      this.log.info('Strategy state transition', { from, to });
    }
  }

  private buildIntent(
    action: Intent['action'],
    side: OrderSide,
    requestedNotional: number,
    referencePrice: number,
    reason: string,
    now: number
  ): Intent {
    return {
      symbol: this.config.symbol,
      strategyId: this.config.strategyId,
      side,
      action,
      requestedNotional,
      referencePrice,
      reason,
      createdAt: now,
      reduceOnly: action === 'EXIT',
    };
  }
}

