export type QuotaErrorCode = 'store_unavailable' | 'cancelled' | 'invalid_token_cost' | 'invalid_config';

export class QuotaError extends Error {
  constructor(
    readonly code: QuotaErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type StorePhase = 'read' | 'write' | 'delete';

/**
 * The store could not complete a batched round trip. Quota state is unknown:
 * the caller must not treat this as either allowed or denied.
 */
export class StoreUnavailableError extends QuotaError {
  constructor(
    readonly phase: StorePhase,
    cause: unknown,
  ) {
    super('store_unavailable', `counter store ${phase} failed: ${describeCause(cause)}`, { cause });
  }
}

/**
 * Raised when the caller's signal aborts while a round trip is outstanding.
 * A write may still have been applied by the store.
 */
export class QuotaCancelledError extends QuotaError {
  constructor(reason: unknown) {
    super('cancelled', `quota operation cancelled: ${describeCause(reason)}`, { cause: reason });
  }
}

export class InvalidTokenCostError extends QuotaError {
  constructor(readonly tokenCost: number) {
    super('invalid_token_cost', `token cost must be a non-negative integer, got ${tokenCost}`);
  }
}

export class ConfigError extends QuotaError {
  constructor(readonly issues: string[]) {
    super('invalid_config', `invalid quota configuration: ${issues.join('; ')}`);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
