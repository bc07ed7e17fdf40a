/**
 * Risk Manager
 *
 * Pure per-call evaluation of an intent against account-level limits.
 * Entry checks run in order and stop at the first failure:
 *   1. leverage headroom
 *   2. position cap headroom
 *   3. daily realized loss
 *   4. drawdown from peak equity
 * Passing entries are sized down to fit 1 and 2. Exits skip the checks and
 * are capped at the open position's notional.
 */

import { RiskRejection, SizeTooSmallError } from './errors';
import type { Intent, Position, RiskAccountState, RiskCheck, RiskDecision, RiskLimits } from './types';

export interface RiskEvaluationOptions {
  /** Exchange minimum order notional in USD */
  minOrderNotionalUsd: number;
}

function reject(checks: RiskCheck[], reason: string, code: RiskDecision['code'] = 'RISK_REJECTED'): RiskDecision {
  return { approved: false, sizedNotional: 0, rejectionReason: reason, code, checks };
}

function evaluateExit(intent: Intent, position: Position | undefined): RiskDecision {
  const netSize = position?.netSize ?? 0;
  const positionNotional = Math.abs(netSize) * intent.referencePrice;
  const closesPosition = (netSize > 0 && intent.side === 'sell') || (netSize < 0 && intent.side === 'buy');
  const check: RiskCheck = {
    name: 'exit_reduces_position',
    passed: closesPosition,
    details: closesPosition
      ? `Exit of up to $${positionNotional.toFixed(2)} permitted`
      : `No ${intent.side === 'sell' ? 'long' : 'short'} position to exit`,
  };
  if (!check.passed) {
    return reject([check], check.details ?? 'No position to exit');
  }
  return {
    approved: true,
    sizedNotional: Math.min(intent.requestedNotional, positionNotional),
    checks: [check],
  };
}

/**
 * Evaluate an intent against the most recently reconciled position and account state
 */
export function evaluateRisk(
  intent: Intent,
  position: Position | undefined,
  account: RiskAccountState,
  limits: RiskLimits,
  options: RiskEvaluationOptions
): RiskDecision {
  if (intent.action === 'EXIT') {
    return evaluateExit(intent, position);
  }

  const checks: RiskCheck[] = [];
  const netSize = position?.netSize ?? 0;
  const positionNotional = Math.abs(netSize) * intent.referencePrice;
  const sameDirection = netSize === 0 || (netSize > 0) === (intent.side === 'buy');

  // Check 1: leverage headroom across the whole account
  const exposure = Math.max(account.totalNotional, positionNotional);
  const leverageHeadroom = limits.maxLeverage * account.equity - exposure;
  const leverageCheck: RiskCheck = {
    name: 'leverage',
    passed: leverageHeadroom > 0,
    details: `Exposure $${exposure.toFixed(2)} of $${(limits.maxLeverage * account.equity).toFixed(2)} allowed at ${limits.maxLeverage}x`,
  };
  checks.push(leverageCheck);
  if (!leverageCheck.passed) {
    return reject(checks, `Leverage limit reached: ${leverageCheck.details}`);
  }

  // Check 2: position cap for this symbol
  const capHeadroom = sameDirection
    ? limits.maxPositionUsd - positionNotional
    : limits.maxPositionUsd + positionNotional;
  const capCheck: RiskCheck = {
    name: 'position_cap',
    passed: capHeadroom > 0,
    details: `Position $${positionNotional.toFixed(2)} against cap $${limits.maxPositionUsd.toFixed(2)}`,
  };
  checks.push(capCheck);
  if (!capCheck.passed) {
    return reject(checks, `Position cap reached: ${capCheck.details}`);
  }

  // Check 3: daily realized loss
  const dailyLossHit = account.realizedPnlToday <= -limits.maxDailyLossUsd;
  const dailyLossCheck: RiskCheck = {
    name: 'daily_loss',
    passed: !dailyLossHit,
    details: `Realized today $${account.realizedPnlToday.toFixed(2)}, limit -$${limits.maxDailyLossUsd.toFixed(2)}`,
  };
  checks.push(dailyLossCheck);
  if (dailyLossHit) {
    return reject(checks, `Daily loss limit reached: ${dailyLossCheck.details}`);
  }

  // Check 4: drawdown from peak equity
  const drawdownPct = account.peakEquity > 0
    ? ((account.peakEquity - account.equity) / account.peakEquity) * 100
    : 0;
  const drawdownHit = drawdownPct >= limits.maxDrawdownPct;
  const drawdownCheck: RiskCheck = {
    name: 'drawdown',
    passed: !drawdownHit,
    details: `Drawdown ${drawdownPct.toFixed(2)}%, limit ${limits.maxDrawdownPct}%`,
  };
  checks.push(drawdownCheck);
  if (drawdownHit) {
    return reject(checks, `Drawdown limit reached: ${drawdownCheck.details}`);
  }

  const sizedNotional = Math.min(intent.requestedNotional, leverageHeadroom, capHeadroom);
  if (sizedNotional < options.minOrderNotionalUsd) {
    const error = new SizeTooSmallError(sizedNotional, options.minOrderNotionalUsd);
    checks.push({ name: 'minimum_size', passed: false, details: error.message });
    return reject(checks, error.message, 'SIZE_TOO_SMALL');
  }

  return { approved: true, sizedNotional, checks };
}

/**
 * Error matching a rejected decision, for logging and control flow
 */
export function riskError(decision: RiskDecision): RiskRejection | null {
  if (decision.approved) return null;
  const reason = decision.rejectionReason ?? 'Risk rejected';
  return decision.code === 'SIZE_TOO_SMALL'
    ? new RiskRejection(reason, 'SIZE_TOO_SMALL')
    : new RiskRejection(reason);
}

/**
 * High-water mark of account equity, for drawdown
 */
export class EquityTracker {
  private peak: number;

  constructor(initialPeak: number = 0) {
    this.peak = initialPeak;
  }

  update(equity: number): number {
    if (equity > this.peak) this.peak = equity;
    return this.peak;
  }

  get peakEquity(): number {
    return this.peak;
  }
}
