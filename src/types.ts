export interface QuotaConfig {
  requestsPerMinute: number;
  tokensPerMinute: number;
  requestsPerDay: number;
}

export type Ceiling = 'requests_per_minute' | 'tokens_per_minute' | 'requests_per_day';

export interface CheckResult {
  // undefined for usage reads, which assert no decision
  allowed?: boolean;
  currentRequests: number;
  currentTokens: number;
  currentDayRequests: number;
  resetMinuteMs: number;
  resetDayMs: number;
  rejectionReason?: string;
  violated?: Ceiling;
}

export interface IncrementOp {
  key: string;
  delta: number;
  ttlMs: number;
}

export interface CounterStore {
  // one round trip; absent keys map to undefined
  batchGet(keys: readonly string[]): Promise<Map<string, string | undefined>>;
  // one round trip; creates missing counters at delta
  batchIncrementAndExpire(ops: readonly IncrementOp[]): Promise<void>;
  delete(keys: readonly string[]): Promise<void>;
}

export interface CallOptions {
  signal?: AbortSignal;
}
