/**
 * Orchestrator
 *
 * Drives one evaluation loop per (symbol, strategy) pair at the pair's
 * timeframe cadence:
 *
 *   candles → closed & contiguous → reconcile → signal → state machine
 *     → risk → submit → reconcile → persist
 *
 * Cycles for different pairs run concurrently; cycles for the same pair are
 * serialized by a keyed mutex. Any failure is contained to the pair's cycle
 * and reported in its CycleResult.
 */

import { assertContiguous, closedCandles, nextBoundary } from './candles';
import { minOrderNotionalFor, sizeDecimalsFor, type BotConfig, type StrategyConfig } from './config';
import { InsufficientHistoryError, LiveOrderConflictError } from './errors';
import type { ExchangeClient } from './exchange';
import { KeyedMutex } from './keyed-mutex';
import { createLogger, serializeError, type Logger } from './logger';
import { validateMinimumBalance, validateStrategyMargin, type MarginValidationResult } from './margin-validator';
import { OrderManager, pairKey } from './order-manager';
import { isTerminalStatus, type Order } from './order-state';
import { PositionTracker } from './position-tracker';
import { RateLimiter } from './rate-limiter';
import { RetryPolicy } from './retry';
import { EquityTracker, evaluateRisk } from './risk-manager';
import {
  JsonFileStateStore,
  MemoryStateStore,
  isPairStateRecord,
  type PairStateRecord,
  type PersistedState,
  type StateStore,
} from './state-store';
import { createStrategy } from './strategies/strategy-factory';
import type { SignalStrategy } from './strategies/types';
import { StrategyStateMachine, type StrategyMachineConfig, type StrategyState } from './strategy-state-machine';
import type {
  AccountState,
  Candle,
  Intent,
  OrderRequest,
  Position,
  RiskAccountState,
  RiskDecision,
  Signal,
} from './types';

// ============================================
// TYPES
// ============================================

export type CycleOutcome =
  | 'submitted'
  | 'no_signal'
  | 'no_new_candle'
  | 'insufficient_history'
  | 'live_order'
  | 'risk_rejected'
  | 'dry_run'
  | 'error';

export interface CycleResult {
  symbol: string;
  strategyId: string;
  outcome: CycleOutcome;
  state: StrategyState;
  signal?: Signal;
  intent?: Intent;
  decision?: RiskDecision;
  order?: Order;
  error?: string;
}

export interface OrchestratorOptions {
  config: BotConfig;
  exchange: ExchangeClient;
  store?: StateStore;
  logger?: Logger;
  now?: () => number;
  /** Resolves after `ms` or as soon as `signal` aborts */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  retry?: RetryPolicy;
  rateLimiter?: RateLimiter;
}

export interface StopOptions {
  /** Overrides config.shutdown.flattenOnShutdown */
  flatten?: boolean;
}

interface TradingPair {
  key: string;
  symbol: string;
  strategy: StrategyConfig;
  signals: SignalStrategy;
  machine: StrategyStateMachine;
}

/** Terminal orders kept per pair in the persisted snapshot */
const PERSISTED_TERMINAL_ORDERS = 20;
const RECONCILE_LOCK = '__reconcile__';
const PERSIST_LOCK = '__persist__';

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, Math.max(0, ms));
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Order size in base units for a USD notional, floored to the exchange step
 */
export function sizeForNotional(notional: number, price: number, decimals: number): number {
  if (!(price > 0) || !(notional > 0)) return 0;
  const factor = 10 ** decimals;
  return Math.floor((notional / price) * factor + 1e-9) / factor;
}

/**
 * Deterministic per candle and action, so a cycle replayed after a restart
 * reuses the key instead of placing a second order.
 */
export function clientOrderIdFor(strategyId: string, symbol: string, candleTime: number, action: Intent['action']): string {
  return `${strategyId}-${symbol}-${candleTime}-${action.toLowerCase()}`;
}

function machineConfigFor(symbol: string, strategy: StrategyConfig): StrategyMachineConfig {
  const config: StrategyMachineConfig = {
    symbol,
    strategyId: strategy.id,
    kind: strategy.spec.kind,
    positionSizeUsd: strategy.positionSizeUsd,
    takeProfitPct: strategy.takeProfitPct,
    stopLossPct: strategy.stopLossPct,
    entryThreshold: strategy.entryThreshold,
    exitThreshold: strategy.exitThreshold,
    allowShort: strategy.allowShort,
  };
  if (strategy.spec.kind === 'breakout') {
    config.confirmationBars = strategy.spec.params.confirmationBars;
  } else if (strategy.spec.kind === 'grid_trading') {
    config.regridAfterBars = strategy.spec.params.regridAfterBars;
    config.gridSpacingPct = strategy.spec.params.gridSpacingPct;
  }
  return config;
}

// ============================================
// ORCHESTRATOR
// ============================================

export class Orchestrator {
  readonly config: BotConfig;
  readonly orderManager: OrderManager;
  readonly positions: PositionTracker;

  private readonly exchange: ExchangeClient;
  private readonly store: StateStore;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly retry: RetryPolicy;
  private readonly limiter: RateLimiter;
  private readonly mutex = new KeyedMutex();
  private readonly pairs: Map<string, TradingPair> = new Map();
  private readonly strategiesPerSymbol: Map<string, number> = new Map();

  private equity = new EquityTracker();
  private account?: AccountState;
  private abort?: AbortController;
  private running?: Promise<void>;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.exchange = options.exchange;
    this.log = options.logger ?? createLogger('orchestrator');
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
    this.store = options.store
      ?? (this.config.statePath ? new JsonFileStateStore(this.config.statePath, this.log.child('state')) : new MemoryStateStore());
    this.retry = options.retry ?? new RetryPolicy(this.config.retry, {
      onRetry: (attempt, error, delayMs) => {
        this.log.warn('Exchange call failed, retrying', { attempt, delayMs, ...serializeError(error) });
      },
    });
    this.limiter = options.rateLimiter ?? new RateLimiter(this.config.rateLimit, {
      now: this.now,
      logger: this.log.child('rate-limiter'),
    });

    this.orderManager = new OrderManager({
      exchange: this.exchange,
      retry: this.retry,
      rateLimiter: this.limiter,
      logger: this.log.child('orders'),
      now: this.now,
      orderTtlMs: this.config.execution.orderTtlMs,
      pendingTimeoutMs: this.config.execution.pendingTimeoutMs,
    });
    this.positions = new PositionTracker({ logger: this.log.child('positions'), now: this.now });

    for (const strategy of this.config.strategies) {
      for (const symbol of strategy.symbols) {
        const key = pairKey(symbol, strategy.id);
        this.pairs.set(key, {
          key,
          symbol,
          strategy,
          signals: createStrategy(strategy.id, strategy.spec),
          machine: new StrategyStateMachine(machineConfigFor(symbol, strategy), this.log.child('strategy')),
        });
        this.strategiesPerSymbol.set(symbol, (this.strategiesPerSymbol.get(symbol) ?? 0) + 1);
      }
    }

    this.orderManager.onOrderUpdate(order => {
      this.pairs.get(pairKey(order.symbol, order.strategyId))?.machine.onOrderUpdate(order);
    });
    this.orderManager.onFill(fill => {
      try {
        this.positions.applyFill(fill);
      } catch (error) {
        this.log.error('Fill could not be applied, reconciliation will correct', {
          fillId: fill.fillId,
          ...serializeError(error),
        });
      }
    });
  }

  get isRunning(): boolean {
    return this.abort !== undefined;
  }

  pairKeys(): string[] {
    return Array.from(this.pairs.keys());
  }

  getMachine(symbol: string, strategyId: string): StrategyStateMachine | undefined {
    return this.pairs.get(pairKey(symbol, strategyId))?.machine;
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /**
   * Restore persisted state, reconcile, run the margin preflight and start
   * every pair's loop. The returned promise settles once `stop()` has ended
   * the loops.
   */
  async start(): Promise<void> {
    if (this.abort) {
      throw new Error('Orchestrator already running');
    }
    const abort = new AbortController();
    this.abort = abort;

    try {
      await this.restore();
    } catch (error) {
      this.log.error('Persisted state unreadable, starting from exchange state', serializeError(error));
    }
    try {
      await this.reconcile();
      await this.preflight();
    } catch (error) {
      this.log.error('Startup reconciliation failed, loops will retry', serializeError(error));
    }

    this.log.info('Trading loops started', {
      pairs: this.pairKeys(),
      dryRun: this.config.dryRun,
    });
    this.running = Promise.all(
      Array.from(this.pairs.values()).map(pair => this.runPairLoop(pair, abort.signal))
    ).then(() => undefined);
    return this.running;
  }

  /**
   * Stop taking new cycles, let in-flight cycles and submissions settle,
   * optionally flatten open positions, then reconcile and persist.
   */
  async stop(options: StopOptions = {}): Promise<void> {
    const flatten = options.flatten ?? this.config.shutdown.flattenOnShutdown;
    this.log.info('Shutdown requested', { flatten });
    this.abort?.abort();
    await this.running;
    await this.mutex.drain();
    await this.orderManager.waitForInFlight();

    if (flatten) {
      await this.flattenAll();
    }

    try {
      await this.reconcile();
      this.syncMachines();
    } catch (error) {
      this.log.error('Final reconciliation failed', serializeError(error));
    }
    await this.persist();

    this.abort = undefined;
    this.running = undefined;
    this.log.info('Shutdown complete');
  }

  /**
   * Seed machines, orders and positions from the state store. The next
   * reconciliation overwrites whatever the exchange disagrees with.
   */
  async restore(): Promise<boolean> {
    const state = await this.store.load();
    if (!state) return false;

    const positions: Position[] = [];
    let restored = 0;
    for (const [key, record] of Object.entries(state.pairs)) {
      const pair = this.pairs.get(key);
      if (!pair) {
        this.log.warn('Ignoring persisted state for unconfigured pair', { pair: key });
        continue;
      }
      if (!isPairStateRecord(record) || record.symbol !== pair.symbol || record.strategyId !== pair.strategy.id) {
        this.log.warn('Ignoring malformed persisted state', { pair: key });
        continue;
      }
      restored += 1;
      pair.machine.restore(record.machine);
      this.orderManager.restore(record.orders);
      if (!positions.some(p => p.symbol === record.symbol)) {
        positions.push(record.position);
      }
    }
    this.positions.restore(positions, state.dailyRealized);
    this.equity = new EquityTracker(state.peakEquity);

    this.log.info('State restored', { pairs: restored, peakEquity: state.peakEquity });
    return true;
  }

  /**
   * Log whether the account can carry every configured strategy
   */
  async preflight(): Promise<MarginValidationResult[]> {
    const account = this.account ?? await this.call(() => this.exchange.getAccountState());
    const { execution } = this.config;
    const smallestOrder = Math.min(...this.config.symbols.map(symbol => minOrderNotionalFor(execution, symbol)));
    const results = [validateMinimumBalance(account.equity, smallestOrder)];
    if (!results[0].isValid) {
      this.log.warn(results[0].message, { recommendations: results[0].recommendations });
    }
    for (const strategy of this.config.strategies) {
      results.push(validateStrategyMargin(strategy, account, execution, this.log.child('margin')));
    }
    return results;
  }

  // ============================================
  // CYCLE
  // ============================================

  /**
   * One evaluation cycle for a pair. Never throws for exchange or strategy
   * failures; those end up in the result.
   */
  async runCycle(symbol: string, strategyId: string, now: number = this.now()): Promise<CycleResult> {
    const pair = this.pairs.get(pairKey(symbol, strategyId));
    if (!pair) {
      throw new Error(`Unknown pair: ${pairKey(symbol, strategyId)}`);
    }

    return this.mutex.runExclusive(pair.key, async () => {
      try {
        return await this.cycle(pair, now);
      } catch (error) {
        this.log.error('Cycle failed', { pair: pair.key, ...serializeError(error) });
        return this.result(pair, 'error', { error: error instanceof Error ? error.message : String(error) });
      }
    });
  }

  /**
   * Run every pair's cycle once, concurrently
   */
  async runAll(now: number = this.now()): Promise<CycleResult[]> {
    return Promise.all(
      Array.from(this.pairs.values()).map(pair => this.runCycle(pair.symbol, pair.strategy.id, now))
    );
  }

  private async cycle(pair: TradingPair, now: number): Promise<CycleResult> {
    const { symbol, strategy, machine } = pair;

    // 1. closed, contiguous candles
    const fetched = await this.call(() =>
      this.exchange.getCandles(symbol, strategy.timeframe, this.config.execution.candleLookback)
    );
    const candles = closedCandles(fetched, strategy.timeframeMs, now);
    const latest: Candle | undefined = candles[candles.length - 1];
    if (!latest || (machine.lastCandleTime !== undefined && latest.openTime <= machine.lastCandleTime)) {
      return this.result(pair, 'no_new_candle');
    }
    assertContiguous(candles, strategy.timeframeMs);

    // 2. reconcile so risk reads this cycle's position
    await this.orderManager.sweep(now);
    await this.reconcile();
    this.positions.updateMark(symbol, latest.close);
    const position = this.positions.get(symbol);
    machine.syncPosition(position, { adopt: this.strategiesPerSymbol.get(symbol) === 1 });

    // 3. signal
    let signal: Signal;
    try {
      signal = pair.signals.evaluate(candles);
    } catch (error) {
      if (error instanceof InsufficientHistoryError) {
        this.log.debug('Skipping cycle', { pair: pair.key, required: error.required, available: error.available });
        return this.result(pair, 'insufficient_history');
      }
      throw error;
    }

    // 4. state machine
    const intent = machine.onSignal(signal, { candle: latest, position, now });
    if (!intent) {
      await this.persist();
      return this.result(pair, 'no_signal', { signal });
    }

    const live = this.orderManager.getLiveOrder(symbol, strategy.id);
    if (live) {
      machine.onRiskRejected(`Live order ${live.clientOrderId} pending`);
      return this.result(pair, 'live_order', { signal, intent });
    }

    // 5. risk
    const decision = evaluateRisk(intent, position, this.riskAccount(now), this.config.risk, {
      minOrderNotionalUsd: minOrderNotionalFor(this.config.execution, symbol),
    });
    const size = decision.approved ? this.orderSize(intent, decision, position) : 0;
    if (!decision.approved || size <= 0) {
      const reason = decision.rejectionReason ?? 'Order size rounds to zero';
      machine.onRiskRejected(reason);
      this.log.info('Intent rejected by risk', { pair: pair.key, action: intent.action, reason, code: decision.code });
      await this.persist();
      return this.result(pair, 'risk_rejected', { signal, intent, decision });
    }

    if (this.config.dryRun) {
      machine.onRiskRejected('Dry run');
      this.log.info('Dry run: order not sent', { pair: pair.key, action: intent.action, side: intent.side, size });
      return this.result(pair, 'dry_run', { signal, intent, decision });
    }

    // 6. submit
    const request: OrderRequest = {
      clientOrderId: clientOrderIdFor(strategy.id, symbol, latest.openTime, intent.action),
      symbol,
      strategyId: strategy.id,
      side: intent.side,
      type: intent.action === 'ENTRY' ? this.config.execution.entryOrderType : 'market',
      size,
      reduceOnly: intent.reduceOnly,
    };
    if (request.type === 'limit') request.price = intent.referencePrice;

    machine.markSubmitted(request.clientOrderId);
    let order: Order;
    try {
      order = await this.orderManager.submit(request);
    } catch (error) {
      if (error instanceof LiveOrderConflictError) {
        machine.onRiskRejected(error.message);
        return this.result(pair, 'live_order', { signal, intent, decision });
      }
      throw error;
    }

    // 7. reconcile and persist
    await this.reconcile();
    await this.persist();
    return this.result(pair, 'submitted', { signal, intent, decision, order });
  }

  private orderSize(intent: Intent, decision: RiskDecision, position: Position): number {
    const decimals = sizeDecimalsFor(this.config.execution, intent.symbol);
    if (intent.action === 'EXIT') {
      const held = Math.abs(position.netSize);
      // a full exit closes the exact size held, not a rounded-down one
      if (decision.sizedNotional >= held * intent.referencePrice * (1 - 1e-9)) return held;
      return Math.min(held, sizeForNotional(decision.sizedNotional, intent.referencePrice, decimals));
    }
    return sizeForNotional(decision.sizedNotional, intent.referencePrice, decimals);
  }

  private riskAccount(now: number): RiskAccountState {
    if (!this.account) {
      throw new Error('Account state unavailable before reconciliation');
    }
    return {
      ...this.account,
      peakEquity: this.equity.peakEquity,
      realizedPnlToday: this.positions.realizedPnlToday(now),
    };
  }

  private result(pair: TradingPair, outcome: CycleOutcome, extra: Partial<CycleResult> = {}): CycleResult {
    return {
      symbol: pair.symbol,
      strategyId: pair.strategy.id,
      outcome,
      state: pair.machine.state,
      ...extra,
    };
  }

  // ============================================
  // SHARED STATE
  // ============================================

  /**
   * Fetch an exchange snapshot and overwrite local orders and positions with it
   */
  async reconcile(): Promise<void> {
    await this.mutex.runExclusive(RECONCILE_LOCK, async () => {
      const snapshot = await this.orderManager.fetchSnapshot();
      const report = await this.orderManager.reconcile(snapshot);
      const positionMismatches = this.positions.reconcile(snapshot.positions, snapshot.fetchedAt);
      this.account = snapshot.account;
      this.equity.update(snapshot.account.equity);

      const corrections = report.mismatches.length + positionMismatches.length;
      if (corrections > 0) {
        this.log.warn('Reconciliation corrected local state', {
          orderMismatches: report.mismatches.length,
          positionMismatches: positionMismatches.length,
          orphansCancelled: report.orphansCancelled,
        });
      }
    });
  }

  /**
   * Write the crash-recovery snapshot for every pair
   */
  async persist(): Promise<void> {
    await this.mutex.runExclusive(PERSIST_LOCK, async () => {
      const savedAt = this.now();
      const orders = this.orderManager.all();
      const pairs: Record<string, PairStateRecord> = {};

      for (const pair of this.pairs.values()) {
        const own = orders.filter(o => o.symbol === pair.symbol && o.strategyId === pair.strategy.id);
        const live = own.filter(o => !isTerminalStatus(o.status));
        const recent = own
          .filter(o => isTerminalStatus(o.status))
          .sort((a, b) => b.updatedAt - a.updatedAt)
          .slice(0, PERSISTED_TERMINAL_ORDERS);
        pairs[pair.key] = {
          symbol: pair.symbol,
          strategyId: pair.strategy.id,
          machine: pair.machine.toSnapshot(),
          position: this.positions.get(pair.symbol),
          orders: [...live, ...recent],
          savedAt,
        };
      }

      const state: PersistedState = {
        version: 1,
        pairs,
        peakEquity: this.equity.peakEquity,
        dailyRealized: this.positions.dailySnapshot(),
      };
      try {
        await this.store.save(state);
      } catch (error) {
        this.log.error('Failed to persist state', serializeError(error));
      }
    });
  }

  private syncMachines(): void {
    for (const pair of this.pairs.values()) {
      pair.machine.syncPosition(this.positions.get(pair.symbol), { adopt: false });
    }
  }

  // ============================================
  // LOOPS
  // ============================================

  private async runPairLoop(pair: TradingPair, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const now = this.now();
      const wakeAt = nextBoundary(now, pair.strategy.timeframeMs) + this.config.execution.closeDelayMs;
      await this.sleep(wakeAt - now, signal);
      if (signal.aborted) break;

      const result = await this.runCycle(pair.symbol, pair.strategy.id);
      if (result.outcome !== 'no_new_candle') {
        this.log.debug('Cycle complete', { pair: pair.key, outcome: result.outcome, state: result.state });
      }
    }
  }

  /**
   * Market-exit every pair holding a position. A symbol shared by several
   * strategies is closed once.
   */
  private async flattenAll(): Promise<void> {
    for (const pair of this.pairs.values()) {
      const live = this.orderManager.getLiveOrder(pair.symbol, pair.strategy.id);
      if (live) await this.orderManager.cancel(live.clientOrderId);
    }
    try {
      await this.reconcile();
    } catch (error) {
      this.log.error('Reconciliation before flatten failed', serializeError(error));
    }

    const flattened = new Set<string>();
    for (const pair of this.pairs.values()) {
      if (flattened.has(pair.symbol) || pair.machine.state !== 'IN_POSITION') continue;
      const position = this.positions.get(pair.symbol);
      const now = this.now();
      const intent = pair.machine.flattenIntent(position, now);
      if (!intent) continue;

      flattened.add(pair.symbol);
      const request: OrderRequest = {
        clientOrderId: `${pair.strategy.id}-${pair.symbol}-${now}-flatten`,
        symbol: pair.symbol,
        strategyId: pair.strategy.id,
        side: intent.side,
        type: 'market',
        size: Math.abs(position.netSize),
        reduceOnly: true,
      };
      pair.machine.markSubmitted(request.clientOrderId);
      try {
        const order = await this.orderManager.submit(request);
        this.log.info('Flatten order submitted', { pair: pair.key, status: order.status, size: request.size });
      } catch (error) {
        pair.machine.onFatalFailure(error instanceof Error ? error.message : String(error));
        this.log.error('Flatten failed', { pair: pair.key, ...serializeError(error) });
      }
    }
  }

  private call<T>(fn: () => Promise<T>): Promise<T> {
    return this.retry.execute(() => this.limiter.schedule(fn));
  }
}
