import type { CallOptions, Ceiling, CheckResult, CounterStore, IncrementOp, QuotaConfig } from '../types';
import { withCancellation } from './abort';
import { ConfigError, InvalidTokenCostError, QuotaCancelledError, StoreUnavailableError, type StorePhase } from './errors';
import { silentLogger, type Logger } from './logger';
import type { QuotaMetrics } from './metrics';
import {
  DAY_KEY_TTL_MS,
  MINUTE_KEY_TTL_MS,
  msUntilNextDay,
  msUntilNextMinute,
  windowKeys,
  type WindowKeys,
} from './windows';

export const DEFAULT_PREFIX = 'quota';

export type QuotaGateOptions = {
  prefix?: string;
  now?: () => number; // epoch ms
  timeoutMs?: number; // per store round trip
  logger?: Logger;
  metrics?: QuotaMetrics;
};

type Counters = {
  minuteRequests: number;
  minuteTokens: number;
  dayRequests: number;
};

/**
 * Fixed-window quota check over three ceilings: requests per minute, tokens
 * per minute and requests per day. All shared state lives in the injected
 * store, so one instance may be used concurrently and many processes may
 * share a prefix.
 *
 * The read and the increment are separate round trips. Callers racing inside
 * that gap can each be admitted, so a ceiling can be overshot by up to the
 * number of racing callers minus one.
 */
export class QuotaGate {
  readonly config: Readonly<QuotaConfig>;
  readonly prefix: string;
  private readonly now: () => number;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private readonly metrics?: QuotaMetrics;

  constructor(
    private readonly store: CounterStore,
    config: QuotaConfig,
    options: QuotaGateOptions = {},
  ) {
    this.config = Object.freeze(validateConfig(config));
    this.prefix = options.prefix ?? DEFAULT_PREFIX;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics;
    if (options.timeoutMs !== undefined) {
      if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
        throw new ConfigError([`timeoutMs must be a positive number, got ${options.timeoutMs}`]);
      }
      this.timeoutMs = options.timeoutMs;
    }
  }

  /**
   * A gate over the same store and ceilings under `{prefix}:{namespace}`.
   * The namespace is URI-encoded so a caller-supplied `:` cannot reach into
   * another namespace's keys.
   */
  scoped(namespace: string): QuotaGate {
    return new QuotaGate(this.store, this.config, {
      prefix: `${this.prefix}:${encodeURIComponent(namespace)}`,
      now: this.now,
      timeoutMs: this.timeoutMs,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  async checkAndIncrement(tokenCost: number, options: CallOptions = {}): Promise<CheckResult> {
    if (!Number.isSafeInteger(tokenCost) || tokenCost < 0) {
      throw new InvalidTokenCostError(tokenCost);
    }
    const now = this.now();
    const keys = windowKeys(this.prefix, now);
    const current = await this.readCounters(keys, options);

    const result: CheckResult = {
      allowed: false,
      currentRequests: current.minuteRequests,
      currentTokens: current.minuteTokens,
      currentDayRequests: current.dayRequests,
      resetMinuteMs: 0,
      resetDayMs: 0,
    };
    const { requestsPerMinute, tokensPerMinute, requestsPerDay } = this.config;

    // Request ceilings reject when already at the limit; the token ceiling
    // rejects only when this cost would push past it.
    if (current.minuteRequests >= requestsPerMinute) {
      return this.reject(result, 'requests_per_minute',
        `requests per minute limit exceeded (${current.minuteRequests}/${requestsPerMinute})`, now);
    }
    if (current.minuteTokens + tokenCost > tokensPerMinute) {
      return this.reject(result, 'tokens_per_minute',
        `tokens per minute limit exceeded (${current.minuteTokens}+${tokenCost} > ${tokensPerMinute})`, now);
    }
    if (current.dayRequests >= requestsPerDay) {
      return this.reject(result, 'requests_per_day',
        `requests per day limit exceeded (${current.dayRequests}/${requestsPerDay})`, now);
    }

    const ops: IncrementOp[] = [
      { key: keys.minuteRequests, delta: 1, ttlMs: MINUTE_KEY_TTL_MS },
      { key: keys.minuteTokens, delta: tokenCost, ttlMs: MINUTE_KEY_TTL_MS },
      { key: keys.dayRequests, delta: 1, ttlMs: DAY_KEY_TTL_MS },
    ];
    await this.roundTrip('write', () => this.store.batchIncrementAndExpire(ops), options);

    this.metrics?.recordAllowed();
    // Report our own deltas rather than re-reading, which would pick up other writers
    return {
      ...result,
      allowed: true,
      currentRequests: current.minuteRequests + 1,
      currentTokens: current.minuteTokens + tokenCost,
      currentDayRequests: current.dayRequests + 1,
      resetMinuteMs: msUntilNextMinute(now),
      resetDayMs: msUntilNextDay(now),
    };
  }

  async getCurrentUsage(options: CallOptions = {}): Promise<CheckResult> {
    const now = this.now();
    const current = await this.readCounters(windowKeys(this.prefix, now), options);
    return {
      currentRequests: current.minuteRequests,
      currentTokens: current.minuteTokens,
      currentDayRequests: current.dayRequests,
      resetMinuteMs: msUntilNextMinute(now),
      resetDayMs: msUntilNextDay(now),
    };
  }

  /** Clears the current minute and day windows only; older buckets expire on their own. */
  async reset(options: CallOptions = {}): Promise<void> {
    const keys = windowKeys(this.prefix, this.now());
    await this.roundTrip(
      'delete',
      () => this.store.delete([keys.minuteRequests, keys.minuteTokens, keys.dayRequests]),
      options,
    );
    this.logger.info('quota windows reset', { prefix: this.prefix });
  }

  private async readCounters(keys: WindowKeys, options: CallOptions): Promise<Counters> {
    const values = await this.roundTrip(
      'read',
      () => this.store.batchGet([keys.minuteRequests, keys.minuteTokens, keys.dayRequests]),
      options,
    );
    return {
      minuteRequests: parseCount(values.get(keys.minuteRequests)),
      minuteTokens: parseCount(values.get(keys.minuteTokens)),
      dayRequests: parseCount(values.get(keys.dayRequests)),
    };
  }

  private reject(result: CheckResult, violated: Ceiling, reason: string, now: number): CheckResult {
    const rejected: CheckResult = { ...result, allowed: false, violated, rejectionReason: reason };
    if (violated === 'requests_per_day') {
      rejected.resetDayMs = msUntilNextDay(now);
    } else {
      rejected.resetMinuteMs = msUntilNextMinute(now);
    }
    this.metrics?.recordRejected(violated);
    this.logger.debug('quota check rejected', { prefix: this.prefix, violated, reason });
    return rejected;
  }

  private async roundTrip<T>(phase: StorePhase, work: () => Promise<T>, options: CallOptions): Promise<T> {
    try {
      return await withCancellation(work, options.signal, this.timeoutMs);
    } catch (error) {
      if (error instanceof QuotaCancelledError) {
        this.metrics?.recordCancelled();
        this.logger.warn('quota store round trip cancelled', { prefix: this.prefix, phase, error });
        throw error;
      }
      this.metrics?.recordStoreError();
      this.logger.error('quota store round trip failed', { prefix: this.prefix, phase, error });
      throw new StoreUnavailableError(phase, error);
    }
  }
}

function validateConfig(config: QuotaConfig): QuotaConfig {
  const issues: string[] = [];
  const check = (name: keyof QuotaConfig) => {
    const value = config[name];
    if (!Number.isSafeInteger(value) || value < 0) {
      issues.push(`${name} must be a non-negative integer, got ${value}`);
    }
  };
  check('requestsPerMinute');
  check('tokensPerMinute');
  check('requestsPerDay');
  if (issues.length > 0) throw new ConfigError(issues);
  return {
    requestsPerMinute: config.requestsPerMinute,
    tokensPerMinute: config.tokensPerMinute,
    requestsPerDay: config.requestsPerDay,
  };
}

// Anything but a plain non-negative integer reads as zero rather than failing the check
function parseCount(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) return 0;
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : 0;
}
