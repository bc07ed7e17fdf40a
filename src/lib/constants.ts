/**
 * Trading Engine Constants
 *
 * Centralized defaults for every tunable threshold. Each can be overridden
 * through an environment variable; the YAML config overrides these again.
 */

import { getNumericEnv, getBooleanEnv } from './env';

// =============================================================================
// STRATEGY PARAMETERS
// =============================================================================

export const SIMPLE_MA_DEFAULTS = {
  fastPeriod: getNumericEnv('SMA_FAST_PERIOD', 10),
  slowPeriod: getNumericEnv('SMA_SLOW_PERIOD', 30),
} as const;

export const RSI_DEFAULTS = {
  rsiPeriod: getNumericEnv('RSI_PERIOD', 14),
  oversold: getNumericEnv('RSI_OVERSOLD', 30),
  overbought: getNumericEnv('RSI_OVERBOUGHT', 70),
} as const;

export const BOLLINGER_DEFAULTS = {
  period: getNumericEnv('BB_PERIOD', 20),
  stdDev: getNumericEnv('BB_STD_DEV', 2),
  squeezeThreshold: getNumericEnv('BB_SQUEEZE_THRESHOLD', 0.02),
} as const;

export const MACD_DEFAULTS = {
  fastPeriod: getNumericEnv('MACD_FAST', 12),
  slowPeriod: getNumericEnv('MACD_SLOW', 26),
  signalPeriod: getNumericEnv('MACD_SIGNAL', 9),
  divergenceLookback: getNumericEnv('MACD_DIVERGENCE_LOOKBACK', 20),
} as const;

export const GRID_DEFAULTS = {
  gridLevels: getNumericEnv('GRID_LEVELS', 10),
  gridSpacingPct: getNumericEnv('GRID_SPACING_PCT', 0.5),
  rangePeriod: getNumericEnv('GRID_RANGE_PERIOD', 100),
  /** Range wider than this (percent of low) is trending, not ranging */
  maxRangePct: getNumericEnv('GRID_MAX_RANGE_PCT', 10),
  /** Annualization-free stdev of returns, as a fraction */
  maxVolatility: getNumericEnv('GRID_MAX_VOLATILITY', 0.15),
  regridAfterBars: getNumericEnv('GRID_REGRID_AFTER_BARS', 50),
  /** Candles required before the grid is computed at all */
  minCandles: 50,
} as const;

export const BREAKOUT_DEFAULTS = {
  lookbackPeriod: getNumericEnv('BREAKOUT_LOOKBACK', 20),
  volumeMultiplier: getNumericEnv('BREAKOUT_VOLUME_MULTIPLIER', 1.5),
  confirmationBars: getNumericEnv('BREAKOUT_CONFIRMATION_BARS', 2),
  atrPeriod: getNumericEnv('BREAKOUT_ATR_PERIOD', 14),
} as const;

/** Shared by every strategy unless overridden per strategy */
export const COMMON_STRATEGY_DEFAULTS = {
  positionSizeUsd: getNumericEnv('POSITION_SIZE_USD', 100),
  takeProfitPct: getNumericEnv('TAKE_PROFIT_PCT', 5),
  stopLossPct: getNumericEnv('STOP_LOSS_PCT', 2),
  entryThreshold: getNumericEnv('ENTRY_THRESHOLD', 0.5),
  exitThreshold: getNumericEnv('EXIT_THRESHOLD', 0.5),
  allowShort: getBooleanEnv('ALLOW_SHORT', false),
  timeframe: '1h',
} as const;

// =============================================================================
// RISK LIMITS
// =============================================================================

export const DEFAULT_RISK_LIMITS = {
  maxLeverage: getNumericEnv('RISK_MAX_LEVERAGE', 3),
  maxPositionUsd: getNumericEnv('RISK_MAX_POSITION_USD', 1000),
  maxDailyLossUsd: getNumericEnv('RISK_MAX_DAILY_LOSS_USD', 100),
  maxDrawdownPct: getNumericEnv('RISK_MAX_DRAWDOWN_PCT', 10),
} as const;

// =============================================================================
// EXECUTION
// =============================================================================

export const EXECUTION_DEFAULTS = {
  orderTtlMs: getNumericEnv('ORDER_TTL_MS', 5 * 60_000),
  pendingTimeoutMs: getNumericEnv('ORDER_PENDING_TIMEOUT_MS', 60_000),
  sizeDecimals: getNumericEnv('ORDER_SIZE_DECIMALS', 4),
  minOrderNotionalUsd: getNumericEnv('MIN_ORDER_NOTIONAL_USD', 10),
  closeDelayMs: getNumericEnv('CANDLE_CLOSE_DELAY_MS', 2_000),
  candleLookback: getNumericEnv('CANDLE_LOOKBACK', 200),
} as const;

export const RETRY_DEFAULTS = {
  maxAttempts: getNumericEnv('RETRY_MAX_ATTEMPTS', 3),
  baseDelayMs: getNumericEnv('RETRY_BASE_DELAY_MS', 500),
  maxDelayMs: getNumericEnv('RETRY_MAX_DELAY_MS', 10_000),
  backoffMultiplier: 2,
  jitter: true,
} as const;

export const RATE_LIMIT_DEFAULTS = {
  requestsPerSecond: getNumericEnv('RATE_LIMIT_RPS', 1.5),
  burst: getNumericEnv('RATE_LIMIT_BURST', 3),
  backoffFactor: 2,
  maxBackoffMs: getNumericEnv('RATE_LIMIT_MAX_BACKOFF_MS', 30_000),
} as const;

// =============================================================================
// MARGIN PREFLIGHT
// =============================================================================

/** Extra headroom by strategy kind; unknown kinds use 1.0 */
const STRATEGY_RISK_MULTIPLIERS: Readonly<Record<string, number>> = {
  grid_trading: 2.0,
  breakout: 1.5,
  bollinger_bands: 1.2,
};

export const MARGIN_CONFIG = {
  /** Fraction of notional required as maintenance margin */
  MARGIN_REQUIREMENT: 0.1,
  INITIAL_MARGIN_MULTIPLIER: 3,
  SAFETY_BUFFER: 1.5,
  STRATEGY_RISK_MULTIPLIERS,
} as const;

// =============================================================================
// TIMEFRAMES
// =============================================================================

export const TIMEFRAME_MS = {
  '1m': 60_000,
  '5m': 5 * 60_000,
  '15m': 15 * 60_000,
  '30m': 30 * 60_000,
  '1h': 60 * 60_000,
  '4h': 4 * 60 * 60_000,
  '1d': 24 * 60 * 60_000,
} as const;

export type Timeframe = keyof typeof TIMEFRAME_MS;
