export * from './lib/quotaGate';
export * from './lib/quotaGuard';
export * from './lib/keys';
export * from './lib/errors';
export * from './lib/windows';
export * from './lib/logger';
export * from './lib/metrics';
export * from './lib/prometheus';
export * from './lib/config';
export * from './stores/memoryStore';
export * from './stores/redisStore';
export type { QuotaConfig, CheckResult, Ceiling, CounterStore, IncrementOp, CallOptions } from './types';
