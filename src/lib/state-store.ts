/**
 * Crash-recovery state, one record per (symbol, strategyId), overwritten
 * after each successful reconciliation.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { createLogger, type Logger } from './logger';
import type { Order } from './order-state';
import type { StrategyMachineSnapshot } from './strategy-state-machine';
import type { Position } from './types';
import { isRecord } from './validation';

export interface PairStateRecord {
  symbol: string;
  strategyId: string;
  machine: StrategyMachineSnapshot;
  position: Position;
  orders: Order[];
  savedAt: number;
}

export interface PersistedState {
  version: 1;
  pairs: Record<string, PairStateRecord>;
  peakEquity: number;
  dailyRealized: { day: string; realized: number };
}

export interface StateStore {
  load(): Promise<PersistedState | null>;
  save(state: PersistedState): Promise<void>;
}

export function emptyState(): PersistedState {
  return { version: 1, pairs: {}, peakEquity: 0, dailyRealized: { day: '', realized: 0 } };
}

const MACHINE_STATES: readonly unknown[] = ['FLAT', 'ENTERING', 'IN_POSITION', 'EXITING'];

function isPersistedState(value: unknown): value is PersistedState {
  return isRecord(value)
    && value.version === 1
    && isRecord(value.pairs)
    && typeof value.peakEquity === 'number'
    && isRecord(value.dailyRealized)
    && typeof value.dailyRealized.day === 'string'
    && typeof value.dailyRealized.realized === 'number';
}

function isPersistedOrder(value: unknown): boolean {
  return isRecord(value)
    && typeof value.clientOrderId === 'string'
    && typeof value.symbol === 'string'
    && typeof value.strategyId === 'string'
    && typeof value.status === 'string'
    && Array.isArray(value.transitions);
}

/**
 * Shape check for one pair's record; restore skips records that fail it
 */
export function isPairStateRecord(value: unknown): value is PairStateRecord {
  if (!isRecord(value)) return false;
  const { machine, position, orders } = value;
  return typeof value.symbol === 'string'
    && typeof value.strategyId === 'string'
    && isRecord(machine)
    && MACHINE_STATES.includes(machine.state)
    && isRecord(machine.grid)
    && Array.isArray(machine.grid.consumedLevels)
    && isRecord(machine.breakout)
    && isRecord(position)
    && position.symbol === value.symbol
    && typeof position.netSize === 'number'
    && typeof position.entryPrice === 'number'
    && Array.isArray(orders)
    && orders.every(isPersistedOrder);
}

export class MemoryStateStore implements StateStore {
  private state: PersistedState | null = null;
  saves = 0;

  async load(): Promise<PersistedState | null> {
    return this.state ? structuredClone(this.state) : null;
  }

  async save(state: PersistedState): Promise<void> {
    this.state = structuredClone(state);
    this.saves += 1;
  }
}

/**
 * JSON file store. Writes go to a temp file renamed over the target so a
 * crash mid-write leaves the previous state intact.
 */
export class JsonFileStateStore implements StateStore {
  private log: Logger;

  constructor(private readonly filePath: string, logger?: Logger) {
    this.log = logger ?? createLogger('state-store');
  }

  async load(): Promise<PersistedState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isRecord(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isPersistedState(parsed)) {
      this.log.warn('Ignoring unrecognized state file', { filePath: this.filePath });
      return null;
    }
    return parsed;
  }

  async save(state: PersistedState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(state, null, 2), 'utf-8');
    await fs.rename(tmp, this.filePath);
  }
}
