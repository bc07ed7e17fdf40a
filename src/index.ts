export * from './lib/candles';
export * from './lib/config';
export * from './lib/constants';
export * from './lib/env';
export * from './lib/errors';
export * from './lib/exchange';
export * from './lib/indicators';
export * from './lib/keyed-mutex';
export * from './lib/logger';
export * from './lib/margin-validator';
export * from './lib/orchestrator';
export * from './lib/order-manager';
export * from './lib/order-state';
export * from './lib/paper-exchange';
export * from './lib/position-tracker';
export * from './lib/rate-limiter';
export * from './lib/retry';
export * from './lib/risk-manager';
export * from './lib/state-store';
export * from './lib/strategies';
export * from './lib/strategy-state-machine';
export * from './lib/types';
export * from './lib/validation';
