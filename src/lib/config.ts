/**
 * Bot Configuration
 *
 * Loaded once from YAML, validated, merged with defaults and environment
 * overrides, then deep-frozen. The same BotConfig reference is handed to
 * the orchestrator, risk evaluation and the order manager.
 *
 * Precedence: environment variable > YAML > built-in default.
 */

import { promises as fs } from 'fs';
import yaml from 'yaml';
import { timeframeToMs } from './candles';
import {
  BOLLINGER_DEFAULTS,
  BREAKOUT_DEFAULTS,
  COMMON_STRATEGY_DEFAULTS,
  DEFAULT_RISK_LIMITS,
  EXECUTION_DEFAULTS,
  GRID_DEFAULTS,
  MACD_DEFAULTS,
  RATE_LIMIT_DEFAULTS,
  RETRY_DEFAULTS,
  RSI_DEFAULTS,
  SIMPLE_MA_DEFAULTS,
} from './constants';
import { getBooleanEnv, getListEnv, getNumericEnv, getOptionalEnv, getRequiredEnv, type Env } from './env';
import { ConfigError } from './errors';
import type { RateLimiterConfig } from './rate-limiter';
import type { RetryConfig } from './retry';
import { createStrategy } from './strategies/strategy-factory';
import { STRATEGY_KINDS, type StrategyKind, type StrategySpec } from './strategies/types';
import type { OrderType, RiskLimits } from './types';
import {
  isRecord,
  validateBoolean,
  validateEnum,
  validateNumber,
  validateOrderType,
  validatePositiveNumber,
  validateString,
  validateSymbolList,
  type ValidationResult,
} from './validation';

// ============================================
// TYPES
// ============================================

export interface StrategyConfig {
  id: string;
  spec: StrategySpec;
  /** Symbols this strategy trades; defaults to the top-level list */
  symbols: readonly string[];
  timeframe: string;
  timeframeMs: number;
  positionSizeUsd: number;
  takeProfitPct: number;
  stopLossPct: number;
  entryThreshold: number;
  exitThreshold: number;
  allowShort: boolean;
}

export interface ExecutionConfig {
  entryOrderType: OrderType;
  orderTtlMs: number;
  pendingTimeoutMs: number;
  /** Order size step in decimals, unless the symbol has its own */
  sizeDecimals: number;
  sizeDecimalsBySymbol: Readonly<Partial<Record<string, number>>>;
  /** Exchange minimum order notional, unless the symbol has its own */
  minOrderNotionalUsd: number;
  minOrderNotionalBySymbol: Readonly<Partial<Record<string, number>>>;
  candleLookback: number;
  closeDelayMs: number;
}

export interface BotConfig {
  symbols: readonly string[];
  strategies: readonly StrategyConfig[];
  risk: RiskLimits;
  execution: ExecutionConfig;
  retry: RetryConfig;
  rateLimit: RateLimiterConfig;
  shutdown: { flattenOnShutdown: boolean };
  dryRun: boolean;
  statePath?: string;
}

// ============================================
// FIELD HELPERS
// ============================================

class Problems {
  readonly list: string[] = [];

  take<T>(result: ValidationResult<T>, fallback: T): T {
    if (result.valid) return result.value;
    this.list.push(result.error);
    return fallback;
  }
}

function section(raw: Record<string, unknown>, key: string, problems: Problems): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    problems.list.push(`${key} must be a mapping`);
    return {};
  }
  return value;
}

function num(
  raw: Record<string, unknown>,
  key: string,
  fallback: number,
  problems: Problems,
  path: string,
  options: { integer?: boolean; allowZero?: boolean; max?: number } = {}
): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  const result = validatePositiveNumber(value, `${path}.${key}`, options);
  if (result.valid && options.max !== undefined) {
    return problems.take(validateNumber(result.value, `${path}.${key}`, { max: options.max }), fallback);
  }
  return problems.take(result, fallback);
}

/**
 * Mapping of symbol to number, e.g. `{ BTC: 5, DOGE: 0 }`. Keys are
 * uppercased and must be configured symbols.
 */
function symbolNumbers(
  raw: Record<string, unknown>,
  key: string,
  symbols: readonly string[],
  problems: Problems,
  path: string,
  options: { integer?: boolean; allowZero?: boolean; max?: number } = {}
): Partial<Record<string, number>> {
  const entries = section(raw, key, problems);
  const result: Partial<Record<string, number>> = {};
  const unknown: string[] = [];
  for (const [rawSymbol, value] of Object.entries(entries)) {
    const symbol = rawSymbol.toUpperCase();
    if (!symbols.includes(symbol)) unknown.push(symbol);
    const parsed = num({ [symbol]: value }, symbol, Number.NaN, problems, `${path}.${key}`, options);
    if (!Number.isNaN(parsed)) result[symbol] = parsed;
  }
  if (unknown.length > 0) {
    problems.list.push(`${path}.${key} not in top-level symbols: ${unknown.join(', ')}`);
  }
  return result;
}

function bool(raw: Record<string, unknown>, key: string, fallback: boolean, problems: Problems, path: string): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  return problems.take(validateBoolean(value, `${path}.${key}`), fallback);
}

// ============================================
// STRATEGIES
// ============================================

function parseStrategySpec(kind: StrategyKind, raw: Record<string, unknown>, problems: Problems, path: string): StrategySpec {
  const int = { integer: true };
  switch (kind) {
    case 'simple_ma': {
      const d = SIMPLE_MA_DEFAULTS;
      const params = {
        fastPeriod: num(raw, 'fastPeriod', d.fastPeriod, problems, path, int),
        slowPeriod: num(raw, 'slowPeriod', d.slowPeriod, problems, path, int),
      };
      if (params.fastPeriod >= params.slowPeriod) problems.list.push(`${path}: fastPeriod must be below slowPeriod`);
      return { kind, params };
    }
    case 'rsi': {
      const d = RSI_DEFAULTS;
      const params = {
        rsiPeriod: num(raw, 'rsiPeriod', d.rsiPeriod, problems, path, int),
        oversold: num(raw, 'oversold', d.oversold, problems, path, { max: 100 }),
        overbought: num(raw, 'overbought', d.overbought, problems, path, { max: 100 }),
      };
      if (params.oversold >= params.overbought) problems.list.push(`${path}: oversold must be below overbought`);
      return { kind, params };
    }
    case 'bollinger_bands': {
      const d = BOLLINGER_DEFAULTS;
      return {
        kind,
        params: {
          period: num(raw, 'period', d.period, problems, path, int),
          stdDev: num(raw, 'stdDev', d.stdDev, problems, path),
          squeezeThreshold: num(raw, 'squeezeThreshold', d.squeezeThreshold, problems, path, { allowZero: true }),
        },
      };
    }
    case 'macd': {
      const d = MACD_DEFAULTS;
      const params = {
        fastPeriod: num(raw, 'fastPeriod', d.fastPeriod, problems, path, int),
        slowPeriod: num(raw, 'slowPeriod', d.slowPeriod, problems, path, int),
        signalPeriod: num(raw, 'signalPeriod', d.signalPeriod, problems, path, int),
        divergenceLookback: num(raw, 'divergenceLookback', d.divergenceLookback, problems, path, int),
      };
      if (params.fastPeriod >= params.slowPeriod) problems.list.push(`${path}: fastPeriod must be below slowPeriod`);
      return { kind, params };
    }
    case 'grid_trading': {
      const d = GRID_DEFAULTS;
      return {
        kind,
        params: {
          gridLevels: num(raw, 'gridLevels', d.gridLevels, problems, path, int),
          gridSpacingPct: num(raw, 'gridSpacingPct', d.gridSpacingPct, problems, path),
          rangePeriod: num(raw, 'rangePeriod', d.rangePeriod, problems, path, int),
          maxRangePct: num(raw, 'maxRangePct', d.maxRangePct, problems, path),
          maxVolatility: num(raw, 'maxVolatility', d.maxVolatility, problems, path),
          regridAfterBars: num(raw, 'regridAfterBars', d.regridAfterBars, problems, path, int),
        },
      };
    }
    case 'breakout': {
      const d = BREAKOUT_DEFAULTS;
      return {
        kind,
        params: {
          lookbackPeriod: num(raw, 'lookbackPeriod', d.lookbackPeriod, problems, path, int),
          volumeMultiplier: num(raw, 'volumeMultiplier', d.volumeMultiplier, problems, path),
          confirmationBars: num(raw, 'confirmationBars', d.confirmationBars, problems, path, int),
          atrPeriod: num(raw, 'atrPeriod', d.atrPeriod, problems, path, int),
        },
      };
    }
  }
}

function parseStrategy(
  raw: unknown,
  index: number,
  symbols: readonly string[],
  problems: Problems
): StrategyConfig | null {
  const path = `strategies[${index}]`;
  if (!isRecord(raw)) {
    problems.list.push(`${path} must be a mapping`);
    return null;
  }

  const kindResult = validateEnum(raw.kind, `${path}.kind`, STRATEGY_KINDS);
  if (!kindResult.valid) {
    problems.list.push(kindResult.error);
    return null;
  }
  const kind = kindResult.value;
  const id = raw.id === undefined
    ? kind
    : problems.take(validateString(raw.id, `${path}.id`, { minLength: 1, maxLength: 64, pattern: /^[\w.-]+$/ }), kind);

  const strategySymbols = raw.symbols === undefined
    ? symbols
    : problems.take(validateSymbolList(raw.symbols, `${path}.symbols`), symbols);
  const unknownSymbols = strategySymbols.filter(s => !symbols.includes(s));
  if (unknownSymbols.length > 0) {
    problems.list.push(`${path}.symbols not in top-level symbols: ${unknownSymbols.join(', ')}`);
  }

  const timeframe = raw.timeframe === undefined
    ? COMMON_STRATEGY_DEFAULTS.timeframe
    : problems.take(validateString(raw.timeframe, `${path}.timeframe`), COMMON_STRATEGY_DEFAULTS.timeframe);
  let timeframeMs = 0;
  try {
    timeframeMs = timeframeToMs(timeframe);
  } catch (error) {
    problems.list.push(`${path}.timeframe: ${error instanceof Error ? error.message : String(error)}`);
  }

  const params = section(raw, 'params', problems);
  const d = COMMON_STRATEGY_DEFAULTS;
  return {
    id,
    spec: parseStrategySpec(kind, params, problems, `${path}.params`),
    symbols: strategySymbols,
    timeframe,
    timeframeMs,
    positionSizeUsd: num(raw, 'positionSizeUsd', d.positionSizeUsd, problems, path),
    takeProfitPct: num(raw, 'takeProfitPct', d.takeProfitPct, problems, path),
    stopLossPct: num(raw, 'stopLossPct', d.stopLossPct, problems, path),
    entryThreshold: num(raw, 'entryThreshold', d.entryThreshold, problems, path, { allowZero: true, max: 1 }),
    exitThreshold: num(raw, 'exitThreshold', d.exitThreshold, problems, path, { allowZero: true, max: 1 }),
    allowShort: bool(raw, 'allowShort', d.allowShort, problems, path),
  };
}

// ============================================
// FREEZE
// ============================================

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// ============================================
// PER-SYMBOL LOOKUPS
// ============================================

export function sizeDecimalsFor(execution: ExecutionConfig, symbol: string): number {
  return execution.sizeDecimalsBySymbol[symbol] ?? execution.sizeDecimals;
}

export function minOrderNotionalFor(execution: ExecutionConfig, symbol: string): number {
  return execution.minOrderNotionalBySymbol[symbol] ?? execution.minOrderNotionalUsd;
}

// ============================================
// ENTRY POINTS
// ============================================

/**
 * Parse and validate a YAML config document. Throws ConfigError listing every problem.
 */
export function parseConfig(text: string, env: Env = process.env): BotConfig {
  const problems = new Problems();
  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    throw new ConfigError([`YAML parse error: ${error instanceof Error ? error.message : String(error)}`]);
  }
  const raw = isRecord(document) ? document : {};
  if (!isRecord(document)) problems.list.push('config must be a mapping');

  const envSymbols = getListEnv('TRADING_SYMBOLS', env);
  const symbols = envSymbols
    ? problems.take(validateSymbolList(envSymbols, 'TRADING_SYMBOLS'), [])
    : problems.take(validateSymbolList(raw.symbols, 'symbols'), []);

  const rawStrategies = raw.strategies;
  const strategies: StrategyConfig[] = [];
  // strategies that parsed cleanly, checked against the candle lookback below
  const parsedCleanly: Array<{ index: number; strategy: StrategyConfig }> = [];
  if (!Array.isArray(rawStrategies) || rawStrategies.length === 0) {
    problems.list.push('strategies must be a non-empty list');
  } else {
    rawStrategies.forEach((item, index) => {
      const before = problems.list.length;
      const strategy = parseStrategy(item, index, symbols, problems);
      if (!strategy) return;
      strategies.push(strategy);
      if (problems.list.length === before) parsedCleanly.push({ index, strategy });
    });
  }
  const ids = strategies.map(s => s.id);
  const duplicates = ids.filter((id, i) => ids.indexOf(id) !== i);
  if (duplicates.length > 0) problems.list.push(`duplicate strategy ids: ${[...new Set(duplicates)].join(', ')}`);

  const riskRaw = section(raw, 'risk', problems);
  const risk: RiskLimits = {
    maxLeverage: getNumericEnv('RISK_MAX_LEVERAGE', num(riskRaw, 'maxLeverage', DEFAULT_RISK_LIMITS.maxLeverage, problems, 'risk'), env),
    maxPositionUsd: getNumericEnv('RISK_MAX_POSITION_USD', num(riskRaw, 'maxPositionUsd', DEFAULT_RISK_LIMITS.maxPositionUsd, problems, 'risk'), env),
    maxDailyLossUsd: getNumericEnv('RISK_MAX_DAILY_LOSS_USD', num(riskRaw, 'maxDailyLossUsd', DEFAULT_RISK_LIMITS.maxDailyLossUsd, problems, 'risk'), env),
    maxDrawdownPct: getNumericEnv('RISK_MAX_DRAWDOWN_PCT', num(riskRaw, 'maxDrawdownPct', DEFAULT_RISK_LIMITS.maxDrawdownPct, problems, 'risk', { max: 100 }), env),
  };

  const execRaw = section(raw, 'execution', problems);
  const e = EXECUTION_DEFAULTS;
  const execution: ExecutionConfig = {
    entryOrderType: execRaw.entryOrderType === undefined
      ? 'market'
      : problems.take(validateOrderType(execRaw.entryOrderType, 'execution.entryOrderType'), 'market'),
    orderTtlMs: num(execRaw, 'orderTtlMs', e.orderTtlMs, problems, 'execution', { integer: true }),
    pendingTimeoutMs: num(execRaw, 'pendingTimeoutMs', e.pendingTimeoutMs, problems, 'execution', { integer: true }),
    sizeDecimals: num(execRaw, 'sizeDecimals', e.sizeDecimals, problems, 'execution', { integer: true, allowZero: true, max: 12 }),
    sizeDecimalsBySymbol: symbolNumbers(execRaw, 'sizeDecimalsBySymbol', symbols, problems, 'execution', { integer: true, allowZero: true, max: 12 }),
    minOrderNotionalUsd: num(execRaw, 'minOrderNotionalUsd', e.minOrderNotionalUsd, problems, 'execution', { allowZero: true }),
    minOrderNotionalBySymbol: symbolNumbers(execRaw, 'minOrderNotionalBySymbol', symbols, problems, 'execution', { allowZero: true }),
    candleLookback: num(execRaw, 'candleLookback', e.candleLookback, problems, 'execution', { integer: true }),
    closeDelayMs: num(execRaw, 'closeDelayMs', e.closeDelayMs, problems, 'execution', { integer: true, allowZero: true }),
  };

  for (const { index, strategy } of parsedCleanly) {
    const { minHistory } = createStrategy(strategy.id, strategy.spec);
    // the newest fetched candle may still be forming
    if (minHistory >= execution.candleLookback) {
      problems.list.push(
        `strategies[${index}] needs ${minHistory} closed candles; execution.candleLookback must be above ${minHistory}`
      );
    }
  }

  const retryRaw = section(raw, 'retry', problems);
  const retry: RetryConfig = {
    maxAttempts: num(retryRaw, 'maxAttempts', RETRY_DEFAULTS.maxAttempts, problems, 'retry', { integer: true, max: 10 }),
    baseDelayMs: num(retryRaw, 'baseDelayMs', RETRY_DEFAULTS.baseDelayMs, problems, 'retry', { allowZero: true }),
    maxDelayMs: num(retryRaw, 'maxDelayMs', RETRY_DEFAULTS.maxDelayMs, problems, 'retry', { allowZero: true }),
    backoffMultiplier: num(retryRaw, 'backoffMultiplier', RETRY_DEFAULTS.backoffMultiplier, problems, 'retry'),
    jitter: bool(retryRaw, 'jitter', RETRY_DEFAULTS.jitter, problems, 'retry'),
  };

  const rateRaw = section(raw, 'rateLimit', problems);
  const rateLimit: RateLimiterConfig = {
    requestsPerSecond: num(rateRaw, 'requestsPerSecond', RATE_LIMIT_DEFAULTS.requestsPerSecond, problems, 'rateLimit'),
    burst: num(rateRaw, 'burst', RATE_LIMIT_DEFAULTS.burst, problems, 'rateLimit', { integer: true }),
    backoffFactor: num(rateRaw, 'backoffFactor', RATE_LIMIT_DEFAULTS.backoffFactor, problems, 'rateLimit'),
    maxBackoffMs: num(rateRaw, 'maxBackoffMs', RATE_LIMIT_DEFAULTS.maxBackoffMs, problems, 'rateLimit'),
  };

  const shutdownRaw = section(raw, 'shutdown', problems);
  const flattenOnShutdown = getBooleanEnv(
    'FLATTEN_ON_SHUTDOWN',
    bool(shutdownRaw, 'flattenOnShutdown', false, problems, 'shutdown'),
    env
  );
  const dryRun = getBooleanEnv('TRADING_DRY_RUN', bool(raw, 'dryRun', false, problems, 'config'), env);

  const yamlStatePath = raw.statePath === undefined
    ? ''
    : problems.take(validateString(raw.statePath, 'statePath', { minLength: 1 }), '');
  const statePath = getOptionalEnv('TRADING_STATE_PATH', yamlStatePath, env);

  if (problems.list.length > 0) {
    throw new ConfigError(problems.list);
  }

  const config: BotConfig = {
    symbols,
    strategies,
    risk,
    execution,
    retry,
    rateLimit,
    shutdown: { flattenOnShutdown },
    dryRun,
  };
  if (statePath) config.statePath = statePath;
  return deepFreeze(config);
}

/**
 * Read and parse the config file at `filePath` (default: $TRADING_CONFIG_PATH)
 */
export async function loadConfig(filePath?: string, env: Env = process.env): Promise<BotConfig> {
  const target = filePath ?? getRequiredEnv('TRADING_CONFIG_PATH', env);
  const text = await fs.readFile(target, 'utf-8');
  return parseConfig(text, env);
}
