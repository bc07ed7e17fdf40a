/**
 * Domain errors for the trading engine.
 *
 * Each carries a stable `code` that ends up in structured logs.
 */

export type TradingErrorCode =
  | 'INSUFFICIENT_HISTORY'
  | 'CANDLE_GAP'
  | 'RISK_REJECTED'
  | 'SIZE_TOO_SMALL'
  | 'TRANSIENT_TRANSPORT'
  | 'RATE_LIMITED'
  | 'EXCHANGE_REJECTED'
  | 'RECONCILIATION_MISMATCH'
  | 'LIVE_ORDER_CONFLICT'
  | 'INVALID_TRANSITION'
  | 'CONFIG_INVALID';

export class TradingError extends Error {
  readonly code: TradingErrorCode;

  constructor(code: TradingErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

export class InsufficientHistoryError extends TradingError {
  constructor(readonly required: number, readonly available: number) {
    super('INSUFFICIENT_HISTORY', `Need ${required} closed candles, have ${available}`);
  }
}

export class CandleGapError extends TradingError {
  constructor(readonly previousOpenTime: number, readonly openTime: number, readonly timeframeMs: number) {
    super(
      'CANDLE_GAP',
      `Candle series not contiguous: ${previousOpenTime} -> ${openTime} (timeframe ${timeframeMs}ms)`
    );
  }
}

export class RiskRejection extends TradingError {
  constructor(message: string, code: 'RISK_REJECTED' | 'SIZE_TOO_SMALL' = 'RISK_REJECTED') {
    super(code, message);
  }
}

export class SizeTooSmallError extends RiskRejection {
  constructor(readonly sizedNotional: number, readonly minimumNotional: number) {
    super(
      `Sized notional $${sizedNotional.toFixed(2)} below exchange minimum $${minimumNotional.toFixed(2)}`,
      'SIZE_TOO_SMALL'
    );
  }
}

export class TransientTransportError extends TradingError {
  constructor(message: string, code: 'TRANSIENT_TRANSPORT' | 'RATE_LIMITED' = 'TRANSIENT_TRANSPORT') {
    super(code, message);
  }
}

export class RateLimitedError extends TransientTransportError {
  constructor(message: string = 'Exchange rate limit hit (429)') {
    super(message, 'RATE_LIMITED');
  }
}

export class ExchangeRejection extends TradingError {
  constructor(message: string) {
    super('EXCHANGE_REJECTED', message);
  }
}

export class ReconciliationMismatch extends TradingError {
  constructor(readonly subject: string, readonly local: unknown, readonly exchange: unknown) {
    super('RECONCILIATION_MISMATCH', `Local state for ${subject} disagreed with exchange`);
  }
}

export class LiveOrderConflictError extends TradingError {
  constructor(readonly pairKey: string, readonly liveClientOrderId: string) {
    super('LIVE_ORDER_CONFLICT', `Order ${liveClientOrderId} is still live for ${pairKey}`);
  }
}

export class InvalidTransitionError extends TradingError {
  constructor(readonly from: string, readonly to: string) {
    super('INVALID_TRANSITION', `Invalid transition: ${from} → ${to}`);
  }
}

export class ConfigError extends TradingError {
  constructor(readonly problems: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`);
  }
}

/**
 * Only transport failures are worth another attempt
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof TransientTransportError;
}
