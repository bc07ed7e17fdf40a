/**
 * Exchange client contract consumed by the engine.
 *
 * Implementations translate transport failures into TransientTransportError
 * (RateLimitedError for 429s) and business refusals into ExchangeRejection.
 * `submitOrder` must be idempotent per clientOrderId: a repeated id returns
 * the existing order instead of placing a new one.
 */

import type {
  AccountState,
  Candle,
  ExchangeOrderReport,
  ExchangePosition,
  OrderRequest,
} from './types';

export interface ExchangeClient {
  getCandles(symbol: string, timeframe: string, lookback: number): Promise<Candle[]>;
  getAccountState(): Promise<AccountState>;
  submitOrder(request: OrderRequest): Promise<ExchangeOrderReport>;
  cancelOrder(symbol: string, clientOrderId: string): Promise<ExchangeOrderReport>;
  getOpenOrders(): Promise<ExchangeOrderReport[]>;
  getPositions(): Promise<ExchangePosition[]>;
  /** null when the exchange has never seen the id */
  getOrderStatus(clientOrderId: string): Promise<ExchangeOrderReport | null>;
}

export type ExchangeMethod = keyof ExchangeClient;
