/**
 * Order Lifecycle
 *
 * States:
 *   PENDING → [OPEN → PARTIALLY_FILLED] → FILLED | CANCELLED | REJECTED
 *
 * Transitions are explicit and validated; terminal states are final.
 */

import { InvalidTransitionError } from './errors';
import type { ExchangeOrderReport, OrderRequest, OrderSide, OrderType } from './types';

// ============================================
// TYPES
// ============================================

export enum OrderStatus {
  PENDING = 'PENDING',                   // Registered locally, exchange has not acknowledged
  OPEN = 'OPEN',                         // Resting on the exchange
  PARTIALLY_FILLED = 'PARTIALLY_FILLED',
  FILLED = 'FILLED',                     // Terminal
  CANCELLED = 'CANCELLED',               // Terminal
  REJECTED = 'REJECTED',                 // Terminal
}

export interface OrderTransition {
  from: OrderStatus;
  to: OrderStatus;
  timestamp: number;
  details?: string;
}

export interface Order {
  clientOrderId: string;
  exchangeOrderId?: string;
  symbol: string;
  strategyId: string;
  side: OrderSide;
  type: OrderType;
  price?: number;
  size: number;
  filledSize: number;
  avgFillPrice?: number;
  reduceOnly: boolean;
  status: OrderStatus;
  rejectionReason?: string;
  /** Exchange submission attempts made */
  attempts: number;
  createdAt: number;
  updatedAt: number;
  transitions: OrderTransition[];
}

// ============================================
// STATE MACHINE
// ============================================

const VALID_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  [OrderStatus.PENDING]: [
    OrderStatus.OPEN,
    OrderStatus.PARTIALLY_FILLED,
    OrderStatus.FILLED,
    OrderStatus.CANCELLED,
    OrderStatus.REJECTED,
  ],
  [OrderStatus.OPEN]: [OrderStatus.PARTIALLY_FILLED, OrderStatus.FILLED, OrderStatus.CANCELLED, OrderStatus.REJECTED],
  [OrderStatus.PARTIALLY_FILLED]: [OrderStatus.FILLED, OrderStatus.CANCELLED],
  [OrderStatus.FILLED]: [],
  [OrderStatus.CANCELLED]: [],
  [OrderStatus.REJECTED]: [],
};

export const TERMINAL_STATUSES: readonly OrderStatus[] = [
  OrderStatus.FILLED,
  OrderStatus.CANCELLED,
  OrderStatus.REJECTED,
];

/**
 * Check if a status transition is valid
 */
export function isValidTransition(from: OrderStatus, to: OrderStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Check if status is terminal
 */
export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isLiveStatus(status: OrderStatus): boolean {
  return !isTerminalStatus(status);
}

/**
 * New local order in PENDING
 */
export function createOrder(request: OrderRequest, now: number): Order {
  return {
    clientOrderId: request.clientOrderId,
    symbol: request.symbol,
    strategyId: request.strategyId,
    side: request.side,
    type: request.type,
    price: request.price,
    size: request.size,
    filledSize: 0,
    reduceOnly: request.reduceOnly,
    status: OrderStatus.PENDING,
    attempts: 0,
    createdAt: now,
    updatedAt: now,
    transitions: [],
  };
}

/**
 * Move an order to `to`. Same-status updates are no-ops; anything the
 * table does not allow throws InvalidTransitionError.
 */
export function transitionOrder(order: Order, to: OrderStatus, now: number, details?: string): boolean {
  if (order.status === to) return false;
  if (!isValidTransition(order.status, to)) {
    throw new InvalidTransitionError(order.status, to);
  }
  order.transitions.push({ from: order.status, to, timestamp: now, details });
  order.status = to;
  order.updatedAt = now;
  if (to === OrderStatus.REJECTED && details) {
    order.rejectionReason = details;
  }
  return true;
}

/**
 * Local status implied by an exchange report
 */
export function statusFromReport(report: ExchangeOrderReport): OrderStatus {
  switch (report.status) {
    case 'filled':
      return OrderStatus.FILLED;
    case 'cancelled':
      return OrderStatus.CANCELLED;
    case 'rejected':
      return OrderStatus.REJECTED;
    case 'open':
      return report.filledSize > 0 ? OrderStatus.PARTIALLY_FILLED : OrderStatus.OPEN;
  }
}
