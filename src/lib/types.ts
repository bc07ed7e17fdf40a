/**
 * Core data model shared by the engine components.
 */

// ============================================
// MARKET DATA
// ============================================

/** OHLCV bar; immutable once closed. Times are epoch milliseconds. */
export interface Candle {
  readonly openTime: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

// ============================================
// SIGNALS & INTENTS
// ============================================

export type SignalDirection = 'LONG' | 'SHORT' | 'FLAT';

export interface Signal {
  direction: SignalDirection;
  /** 0..1 */
  strength: number;
  sourceStrategyId: string;
  /** openTime of the last candle evaluated */
  evaluatedAt: number;
  reason: string;
  meta?: Record<string, number>;
}

export type OrderSide = 'buy' | 'sell';
export type IntentAction = 'ENTRY' | 'EXIT';

export interface Intent {
  symbol: string;
  strategyId: string;
  side: OrderSide;
  action: IntentAction;
  requestedNotional: number;
  referencePrice: number;
  reason: string;
  createdAt: number;
  reduceOnly: boolean;
}

export interface RiskCheck {
  name: string;
  passed: boolean;
  details?: string;
}

export interface RiskDecision {
  approved: boolean;
  sizedNotional: number;
  rejectionReason?: string;
  code?: 'RISK_REJECTED' | 'SIZE_TOO_SMALL';
  checks: RiskCheck[];
}

// ============================================
// ORDERS
// ============================================

export type OrderType = 'market' | 'limit';

export interface OrderRequest {
  clientOrderId: string;
  symbol: string;
  strategyId: string;
  side: OrderSide;
  type: OrderType;
  size: number;
  price?: number;
  reduceOnly: boolean;
}

/** What the exchange reports about one order */
export interface ExchangeOrderReport {
  clientOrderId: string;
  exchangeOrderId?: string;
  symbol: string;
  side: OrderSide;
  status: 'open' | 'filled' | 'cancelled' | 'rejected';
  size: number;
  filledSize: number;
  avgFillPrice?: number;
  price?: number;
  reduceOnly?: boolean;
  reason?: string;
}

export interface FillEvent {
  /** Unique per filled increment; duplicates are ignored by the tracker */
  fillId: string;
  clientOrderId: string;
  symbol: string;
  strategyId: string;
  side: OrderSide;
  size: number;
  price: number;
  timestamp: number;
}

// ============================================
// POSITIONS & ACCOUNT
// ============================================

export interface Position {
  symbol: string;
  /** Signed: positive long, negative short */
  netSize: number;
  entryPrice: number;
  markPrice: number;
  unrealizedPnl: number;
  realizedPnl: number;
  updatedAt: number;
  reconciledAt?: number;
}

export interface ExchangePosition {
  symbol: string;
  netSize: number;
  entryPrice: number;
  markPrice?: number;
}

export interface AccountState {
  equity: number;
  marginUsed: number;
  available: number;
  totalNotional: number;
}

export interface RiskAccountState extends AccountState {
  peakEquity: number;
  realizedPnlToday: number;
}

export interface RiskLimits {
  maxLeverage: number;
  maxPositionUsd: number;
  maxDailyLossUsd: number;
  /** Percent of peak equity, e.g. 10 = 10% */
  maxDrawdownPct: number;
}

export interface ExchangeSnapshot {
  openOrders: ExchangeOrderReport[];
  /** Latest status of local live orders the exchange no longer lists as open */
  resolvedOrders: ExchangeOrderReport[];
  positions: ExchangePosition[];
  account: AccountState;
  fetchedAt: number;
}
